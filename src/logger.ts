export type LogSink = (msg: string) => void;

export class Logger {
  private startTime: number;
  private stdout: LogSink;
  private stderr: LogSink;
  private verbose: boolean;

  constructor(opts: { stdout?: LogSink; stderr?: LogSink; debug?: boolean } = {}) {
    this.startTime = Date.now();
    this.stdout = opts.stdout ?? ((msg) => console.log(msg));
    this.stderr = opts.stderr ?? ((msg) => console.error(msg));
    this.verbose = opts.debug ?? process.env.CODERELAY_DEBUG === "1";
  }

  private ts(): string {
    const elapsed = Math.floor((Date.now() - this.startTime) / 1000);
    const h = Math.floor(elapsed / 3600);
    const m = Math.floor((elapsed % 3600) / 60);
    const s = elapsed % 60;
    return [h, m, s].map((n) => String(n).padStart(2, "0")).join(":");
  }

  log(msg: string): void {
    this.stdout(`[${this.ts()}] ${msg}`);
  }

  ok(msg: string): void {
    this.stdout(`[${this.ts()}] OK: ${msg}`);
  }

  warn(msg: string): void {
    this.stdout(`[${this.ts()}] WARN: ${msg}`);
  }

  err(msg: string): void {
    this.stderr(`[${this.ts()}] ERROR: ${msg}`);
  }

  debug(msg: string): void {
    if (this.verbose) this.stdout(`[${this.ts()}] DEBUG: ${msg}`);
  }
}

/** Drops everything. Handy default for embedded use and tests. */
export const silentLogger = new Logger({ stdout: () => {}, stderr: () => {}, debug: false });
