// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@csv-sync/worker/scheduler`
 * Purpose: In-process cron scheduler and manual dispatch for the sync job.
 * Scope: Arms one timer for the next cron fire, runs the job, re-arms. Does not contain sync logic.
 * Invariants:
 *   - A failed run is logged and never stops the schedule
 *   - Without allowOverlap, a trigger arriving while a run is in flight is rejected (schedule: skipped)
 *   - Timers are clamped to the setTimeout ceiling and re-evaluated on wake
 *   - stop() clears the timer and waits for in-flight runs
 * Side-effects: timers
 * Links: utils/cron.ts, health.ts, main.ts
 * @internal
 */

import type { SyncJob, SyncRunResult, SyncTrigger } from "@csv-sync/core";
import type { Logger } from "pino";

import { computeNextCronTime } from "./utils/cron.js";

/** Largest delay setTimeout accepts without overflowing. */
export const MAX_TIMER_DELAY_MS = 2_147_483_647;

export interface SyncSchedulerConfig {
  cron: string;
  timezone: string;
  job: SyncJob;
  logger: Logger;
  /** Let triggers start a run while another is in flight (safe only with ephemeral clones) */
  allowOverlap: boolean;
}

export type DispatchResult =
  | { accepted: true; run: Promise<SyncRunResult | null> }
  | { accepted: false; reason: "run_in_progress" | "stopped" };

export class SyncScheduler {
  private timer: NodeJS.Timeout | null = null;
  private running = false;
  private readonly inFlight = new Set<Promise<SyncRunResult | null>>();
  private _nextRunAt: Date | null = null;

  constructor(private readonly config: SyncSchedulerConfig) {}

  get nextRunAt(): Date | null {
    return this._nextRunAt;
  }

  get activeRuns(): number {
    return this.inFlight.size;
  }

  /**
   * Validates the cron expression and arms the first timer.
   * @throws InvalidCronExpressionError
   */
  start(): void {
    if (this.running) return;
    this.running = true;
    this.arm();
  }

  /**
   * Starts a run now. The returned promise never rejects; failures resolve to null.
   */
  dispatch(trigger: SyncTrigger): DispatchResult {
    if (!this.running) {
      return { accepted: false, reason: "stopped" };
    }
    if (!this.config.allowOverlap && this.inFlight.size > 0) {
      this.config.logger.warn(
        { trigger, activeRuns: this.inFlight.size },
        "Run already in progress, trigger rejected"
      );
      return { accepted: false, reason: "run_in_progress" };
    }
    const run = this.execute(trigger);
    this.inFlight.add(run);
    void run.finally(() => this.inFlight.delete(run));
    return { accepted: true, run };
  }

  async stop(): Promise<void> {
    this.running = false;
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    this._nextRunAt = null;
    await Promise.all([...this.inFlight]);
  }

  private arm(): void {
    const { cron, timezone, logger } = this.config;
    const now = new Date();
    const next = computeNextCronTime(cron, timezone, now);
    this._nextRunAt = next;

    const delay = next.getTime() - now.getTime();
    if (delay > MAX_TIMER_DELAY_MS) {
      this.timer = setTimeout(() => {
        if (this.running) this.arm();
      }, MAX_TIMER_DELAY_MS);
      return;
    }

    logger.info(
      { nextRunAt: next.toISOString(), cron, timezone },
      "Next scheduled run armed"
    );
    this.timer = setTimeout(() => {
      if (!this.running) return;
      this.dispatch("schedule");
      this.arm();
    }, delay);
  }

  private async execute(trigger: SyncTrigger): Promise<SyncRunResult | null> {
    const { job, logger } = this.config;
    try {
      const result = await job({ trigger });
      logger.info(
        {
          runId: result.runId,
          trigger,
          status: result.status,
          commitSha: result.commitSha,
        },
        "Sync run completed"
      );
      return result;
    } catch (err) {
      logger.error({ err, trigger }, "Sync run failed");
      return null;
    }
  }
}
