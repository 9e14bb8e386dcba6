/**
 * Grindboard — src/lib/schedulerHealth.ts
 * WHAT: Runs one scheduled job under its own trace and keeps a per-job health record.
 * FLOWS:
 *  - runScheduled(name, job) → runWithCtx(kind=scheduler) → job → record outcome → alert after repeated failures
 *  - getSchedulerHealthByName(name) / schedulerHealthSummary() for logs and tests
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { logger } from "./logger.js";
import { runWithCtx } from "./reqctx.js";

export type SchedulerName = "leaderboard" | "tierRoles" | "retention";

export interface SchedulerHealth {
  name: SchedulerName;
  lastRunAt: number | null;
  lastSuccessAt: number | null;
  lastErrorAt: number | null;
  lastDurationMs: number | null;
  /** Reset on every success */
  consecutiveFailures: number;
  totalRuns: number;
  totalFailures: number;
}

const FAILURE_ALERT_THRESHOLD = 3;

const health = new Map<SchedulerName, SchedulerHealth>();

function blank(name: SchedulerName): SchedulerHealth {
  return {
    name,
    lastRunAt: null,
    lastSuccessAt: null,
    lastErrorAt: null,
    lastDurationMs: null,
    consecutiveFailures: 0,
    totalRuns: 0,
    totalFailures: 0,
  };
}

export function recordSchedulerRun(name: SchedulerName, success: boolean, durationMs: number, now = Date.now()): void {
  const entry = health.get(name) ?? blank(name);
  entry.lastRunAt = now;
  entry.lastDurationMs = durationMs;
  entry.totalRuns++;
  if (success) {
    entry.lastSuccessAt = now;
    entry.consecutiveFailures = 0;
  } else {
    entry.lastErrorAt = now;
    entry.consecutiveFailures++;
    entry.totalFailures++;
  }
  health.set(name, entry);

  if (entry.consecutiveFailures >= FAILURE_ALERT_THRESHOLD) {
    logger.error(
      { evt: "scheduler_failing", scheduler: name, consecutiveFailures: entry.consecutiveFailures },
      "[scheduler] Multiple consecutive failures - requires attention"
    );
  }
}

/**
 * The job's error is logged and recorded, never rethrown: a timer callback
 * has nobody to hand it to. Resolves to null on failure.
 */
export async function runScheduled<T>(name: SchedulerName, job: () => Promise<T> | T): Promise<T | null> {
  return runWithCtx({ kind: "scheduler", cmd: name }, async () => {
    const startedAt = Date.now();
    try {
      const result = await job();
      recordSchedulerRun(name, true, Date.now() - startedAt);
      return result;
    } catch (err) {
      recordSchedulerRun(name, false, Date.now() - startedAt);
      logger.error({ evt: "scheduler_run_fail", scheduler: name, err }, `[${name}] scheduled run failed`);
      return null;
    }
  });
}

export function getSchedulerHealthByName(name: SchedulerName): SchedulerHealth | undefined {
  const entry = health.get(name);
  return entry ? { ...entry } : undefined;
}

/** One line per job that has run, e.g. "leaderboard: 4 runs, 1 failed". */
export function schedulerHealthSummary(): string[] {
  return [...health.values()].map((h) => `${h.name}: ${h.totalRuns} runs, ${h.totalFailures} failed`);
}

/** Tests only. */
export function _clearAllSchedulerHealth(): void {
  health.clear();
}
