import type { InstanceOutcome } from "../types.js";

export interface StatisticsSnapshot {
  executionErrors: number;
  timeouts: number;
  assertionErrors: number;
  passedInstances: number;
  recordedInstances: number;
}

/**
 * Run-wide counters. Workers share one instance and touch it only through
 * {@link record}, once per instance after all of its I/O; the event loop
 * runs each call to completion, so increments never interleave.
 */
export class RunStatistics {
  private executionErrors = 0;
  private timeouts = 0;
  private assertionErrors = 0;
  private passedInstances = 0;
  private recordedInstances = 0;

  record(outcome: InstanceOutcome): void {
    this.recordedInstances++;
    if (outcome.executionError) this.executionErrors++;
    if (outcome.timeoutError) this.timeouts++;
    if (outcome.assertionError) this.assertionErrors++;
    if (outcome.status === "success") this.passedInstances++;
  }

  snapshot(): StatisticsSnapshot {
    return {
      executionErrors: this.executionErrors,
      timeouts: this.timeouts,
      assertionErrors: this.assertionErrors,
      passedInstances: this.passedInstances,
      recordedInstances: this.recordedInstances,
    };
  }
}

export function totalErrors(stats: StatisticsSnapshot): number {
  return stats.executionErrors + stats.timeouts + stats.assertionErrors;
}

/** Percentage of instances without an error, 0 when there are none. */
export function overallAccuracy(stats: StatisticsSnapshot, totalInstances: number): number {
  if (totalInstances === 0) return 0;
  return ((totalInstances - totalErrors(stats)) / totalInstances) * 100;
}
