import path from "node:path";
import fs from "node:fs/promises";
import type { FileHandle } from "node:fs/promises";
import type { Stats } from "node:fs";
import crypto from "node:crypto";
import fg from "fast-glob";
import { IOError, LedgerCorruptionError, NotFoundError, StaleStateError, errorMessage } from "../errors.js";
import type { Logger } from "../logger.js";
import { sleep } from "../retry.js";
import { describeIssues, VersionSchema } from "../schemas.js";
import { ensureDir, readYaml, writeYamlAtomic } from "../utils.js";
import type { RecordSchema, RecordStore, Stored } from "./record-store.js";

export type YamlStoreOptions = {
  lockStaleMs: number;
  lockRetries: number;
  lockRetryDelayMs: number;
  logger?: Logger;
};

export const DEFAULT_YAML_STORE: YamlStoreOptions = { lockStaleMs: 30_000, lockRetries: 50, lockRetryDelayMs: 20 };

function hasCode(e: unknown, code: string): boolean {
  return e instanceof Error && "code" in e && e.code === code;
}

/**
 * One YAML document per record under `dir`. Writers take an exclusive-create
 * lock file per record, so CAS holds across processes sharing the directory.
 */
export class YamlRecordStore<T extends { id: string }> implements RecordStore<T> {
  private opts: YamlStoreOptions;

  constructor(
    readonly kind: string,
    readonly dir: string,
    private schema: RecordSchema<T>,
    opts: Partial<YamlStoreOptions> = {},
  ) {
    this.opts = { ...DEFAULT_YAML_STORE, ...opts };
  }

  private fileFor(id: string) {
    if (!/^[A-Za-z0-9._-]+$/.test(id) || id.startsWith(".")) throw new IOError(`invalid ${this.kind} id: ${id}`);
    return path.join(this.dir, `${id}.yml`);
  }

  private async read(id: string, file: string): Promise<Stored<T> | null> {
    let raw: unknown;
    try {
      raw = await readYaml(file);
    } catch (e) {
      if (hasCode(e, "ENOENT")) return null;
      if (e instanceof Error && e.name === "YAMLParseError") throw new LedgerCorruptionError(id, e.message);
      throw new IOError(`failed to read ${file}: ${errorMessage(e)}`, { cause: e });
    }
    const version = VersionSchema.safeParse(raw);
    if (!version.success) throw new LedgerCorruptionError(id, describeIssues(version.error));
    const body = this.schema.safeParse(raw);
    if (!body.success) throw new LedgerCorruptionError(id, describeIssues(body.error));
    if (body.data.id !== id) throw new LedgerCorruptionError(id, `id field is '${body.data.id}'`);
    return { ...body.data, version: version.data.version };
  }

  private async withLock<R>(id: string, fn: () => Promise<R>): Promise<R> {
    const lockPath = `${this.fileFor(id)}.lock`;
    await ensureDir(this.dir);
    for (let attempt = 0; attempt <= this.opts.lockRetries; attempt++) {
      let handle: FileHandle;
      try {
        handle = await fs.open(lockPath, "wx");
      } catch (e) {
        if (!hasCode(e, "EEXIST")) throw new IOError(`cannot lock ${lockPath}: ${errorMessage(e)}`, { cause: e });
        await this.breakIfStale(lockPath);
        await sleep(this.opts.lockRetryDelayMs);
        continue;
      }
      try {
        await handle.writeFile(`${process.pid}\n`, "utf8");
        return await fn();
      } finally {
        await handle.close();
        await fs.rm(lockPath, { force: true });
      }
    }
    throw new IOError(`timed out waiting for lock on ${this.kind} ${id}`);
  }

  /**
   * Move a stale lock aside under a name only this waiter uses, then check it
   * is still the file that was judged stale. A fresh lock moved by mistake is
   * linked back; two waiters can never both remove a lock and take over.
   */
  private async breakIfStale(lockPath: string) {
    const seen = await this.statLock(lockPath);
    if (!seen || Date.now() - seen.mtimeMs <= this.opts.lockStaleMs) return;

    const aside = `${lockPath}.stale-${process.pid}-${crypto.randomBytes(4).toString("hex")}`;
    try {
      await fs.rename(lockPath, aside);
    } catch (e) {
      // another waiter got there first
      if (hasCode(e, "ENOENT")) return;
      throw new IOError(`cannot break ${lockPath}: ${errorMessage(e)}`, { cause: e });
    }
    try {
      const moved = await fs.stat(aside);
      if (moved.ino === seen.ino && moved.mtimeMs === seen.mtimeMs) {
        this.opts.logger?.warn(`breaking stale lock ${lockPath}`);
        return;
      }
      this.opts.logger?.debug(`lock ${lockPath} was replaced before it could be broken; restoring it`);
      await fs.link(aside, lockPath).catch((e: unknown) => {
        if (!hasCode(e, "EEXIST")) throw e;
        this.opts.logger?.warn(`lock ${lockPath} was taken while a live lock was moved aside`);
      });
    } catch (e) {
      throw new IOError(`cannot break ${lockPath}: ${errorMessage(e)}`, { cause: e });
    } finally {
      await fs.rm(aside, { force: true });
    }
  }

  private async statLock(lockPath: string): Promise<Stats | null> {
    try {
      return await fs.stat(lockPath);
    } catch (e) {
      // released between open() and stat()
      if (hasCode(e, "ENOENT")) return null;
      throw new IOError(`cannot inspect ${lockPath}: ${errorMessage(e)}`, { cause: e });
    }
  }

  async get(id: string): Promise<Stored<T> | null> {
    return this.read(id, this.fileFor(id));
  }

  async list(): Promise<Stored<T>[]> {
    let files: string[];
    try {
      files = await fg(["*.yml"], { cwd: this.dir, onlyFiles: true });
    } catch (e) {
      if (hasCode(e, "ENOENT")) return [];
      throw new IOError(`cannot list ${this.dir}: ${errorMessage(e)}`, { cause: e });
    }
    const out: Stored<T>[] = [];
    for (const f of files.sort()) {
      const id = f.replace(/\.yml$/, "");
      try {
        const rec = await this.read(id, path.join(this.dir, f));
        if (rec) out.push(rec);
      } catch (e) {
        // A corrupt record halts only itself
        if (!(e instanceof LedgerCorruptionError)) throw e;
        this.opts.logger?.err(e.message);
      }
    }
    return out;
  }

  async create(record: T): Promise<Stored<T>> {
    const file = this.fileFor(record.id);
    return this.withLock(record.id, async () => {
      if (await this.read(record.id, file)) throw new StaleStateError(record.id, `${this.kind} ${record.id} already exists`);
      const stored: Stored<T> = { ...record, version: 1 };
      await writeYamlAtomic(file, stored);
      return stored;
    });
  }

  async compareAndSwap(id: string, expectedVersion: number, next: T): Promise<Stored<T>> {
    const file = this.fileFor(id);
    return this.withLock(id, async () => {
      const cur = await this.read(id, file);
      if (!cur) throw new NotFoundError(this.kind, id);
      if (cur.version !== expectedVersion) throw new StaleStateError(id);
      const stored: Stored<T> = { ...next, id, version: expectedVersion + 1 };
      await writeYamlAtomic(file, stored);
      return stored;
    });
  }
}
