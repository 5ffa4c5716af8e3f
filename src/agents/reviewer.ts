import type { Engine, PendingReview } from "../engine.js";
import { errorMessage, isExpected } from "../errors.js";
import type { Logger } from "../logger.js";
import { silentLogger } from "../logger.js";
import type { MergeOutcome } from "../merge/coordinator.js";
import { pause } from "./loop.js";

export type Verdict = { approve: true; comment?: string } | { approve: false; comments: string };

/** The review judgment. Supplied by the coordinating process. */
export interface Reviewer {
  review(pending: PendingReview): Promise<Verdict>;
}

export type ReviewRound = {
  reaped: string[];
  outcomes: MergeOutcome[];
  rejected: string[];
};

export type ReviewerOptions = {
  name?: string;
  pollIntervalMs?: number;
  logger?: Logger;
};

/** Coordinator loop: reap expired claims, review open proposals, merge approved ones. */
export class ReviewerAgent {
  readonly name: string;
  private pollIntervalMs: number;
  private logger: Logger;

  constructor(
    private engine: Engine,
    private reviewer: Reviewer,
    opts: ReviewerOptions = {},
  ) {
    this.name = opts.name ?? "reviewer";
    this.pollIntervalMs = opts.pollIntervalMs ?? engine.config.pollIntervalMs;
    this.logger = opts.logger ?? silentLogger;
  }

  async step(): Promise<ReviewRound> {
    const round: ReviewRound = { reaped: await this.engine.reap(), outcomes: [], rejected: [] };
    for (const pending of await this.engine.pendingReviews()) {
      const id = pending.proposal.id;
      try {
        const verdict = await this.reviewer.review(pending);
        if (verdict.approve) {
          round.outcomes.push(await this.engine.approve(id, { reviewer: this.name, comment: verdict.comment }));
        } else {
          await this.engine.reject(id, verdict.comments, this.name);
          round.rejected.push(id);
        }
      } catch (e) {
        // one bad proposal does not hold up the others
        if (isExpected(e)) this.logger.debug(`${id}: ${errorMessage(e)}`);
        else this.logger.err(`review of ${id} failed: ${errorMessage(e)}`);
      }
    }
    return round;
  }

  async run(signal?: AbortSignal): Promise<void> {
    await this.engine.recover();
    while (!signal?.aborted) {
      try {
        await this.step();
      } catch (e) {
        this.logger.err(`${this.name}: ${errorMessage(e)}`);
      }
      if (!(await pause(this.pollIntervalMs, signal))) break;
    }
    await this.engine.drain();
  }
}
