import { mkdirSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import type { PredicateVerdict } from "../predicates/schema.js";
import type { InstanceOutcome } from "../types.js";
import type { DurationStats, EnvironmentInfo, InstanceId } from "../utils.js";
import { calculateStats, compareInstanceIds, formatDuration, getEnvironmentInfo } from "../utils.js";
import type { StatisticsSnapshot } from "./stats.js";
import { overallAccuracy, totalErrors } from "./stats.js";

/** An input record next to the outcome it produced. */
export interface ReportEntry {
  instanceId: InstanceId;
  record: Record<string, unknown>;
  outcome: InstanceOutcome;
}

export interface RunSummary {
  timestamp: string;
  totalInstances: number;
  stats: StatisticsSnapshot;
  accuracy: number;
}

export function summarize(stats: StatisticsSnapshot, totalInstances: number): RunSummary {
  return {
    timestamp: new Date().toISOString(),
    totalInstances,
    stats,
    accuracy: overallAccuracy(stats, totalInstances),
  };
}

/**
 * Sort records and outcomes by instance id and pair them up.
 *
 * @throws Error when the two lists do not hold the same ids.
 */
export function correlate(
  records: readonly { instanceId: InstanceId; record: Record<string, unknown> }[],
  outcomes: readonly InstanceOutcome[]
): ReportEntry[] {
  if (records.length !== outcomes.length) {
    throw new Error(
      `Got ${String(outcomes.length)} outcomes for ${String(records.length)} input records`
    );
  }
  const sortedRecords = [...records].sort((a, b) => compareInstanceIds(a.instanceId, b.instanceId));
  const sortedOutcomes = [...outcomes].sort((a, b) => compareInstanceIds(a.instanceId, b.instanceId));

  return sortedRecords.map((entry, index) => {
    const outcome = sortedOutcomes[index];
    if (!outcome || outcome.instanceId !== entry.instanceId) {
      throw new Error(
        `Records and outcomes diverge at index ${String(index)}: ` +
          `record ${String(entry.instanceId)}, outcome ${String(outcome?.instanceId)}`
      );
    }
    return { instanceId: entry.instanceId, record: entry.record, outcome };
  });
}

/** ` | Eval Phase: ...` suffix for every error flag an outcome carries. */
export function phaseNote(outcome: InstanceOutcome): string {
  let note = "";
  if (outcome.executionError) note += " | Eval Phase: Execution Error";
  if (outcome.timeoutError) note += " | Eval Phase: Timeout Error";
  if (outcome.assertionError) note += " | Eval Phase: Assertion Error";
  return note;
}

export function formatInstanceLine(outcome: InstanceOutcome): string {
  const failed = outcome.failedPredicates.length > 0 ? outcome.failedPredicates.join(", ") : "None";
  return (
    `Question_${String(outcome.instanceId)}: ` +
    `(${String(outcome.passedPredicates)}/${String(outcome.totalPredicates)}) test cases passed, ` +
    `failed test cases: ${failed}${phaseNote(outcome)}`
  );
}

export function renderTextReport(summary: RunSummary, entries: readonly ReportEntry[]): string {
  const { stats } = summary;
  const lines = [
    "-".repeat(50),
    "SQL Answer Evaluation Statistics (Postgres):",
    `Number of Instances: ${String(summary.totalInstances)}`,
    `Number of Execution Errors: ${String(stats.executionErrors)}`,
    `Number of Timeouts: ${String(stats.timeouts)}`,
    `Number of Assertion Errors: ${String(stats.assertionErrors)}`,
    `Total Errors: ${String(totalErrors(stats))}`,
    `Overall Accuracy: ${summary.accuracy.toFixed(2)}%`,
    `Timestamp: ${summary.timestamp}`,
    "",
    ...entries.map((entry) => formatInstanceLine(entry.outcome)),
  ];
  return `${lines.join("\n")}\n`;
}

/**
 * The input record with `status` and `error_message` added. The message
 * names failed predicates when there are any, otherwise the phase error.
 */
export function annotateRecord(entry: ReportEntry): Record<string, unknown> {
  const { outcome } = entry;
  let errorMessage: string | null = null;
  if (outcome.status === "failed") {
    if (outcome.failedPredicates.length > 0) {
      errorMessage = `${outcome.failedPredicates.join(", ")} failed`;
    } else {
      errorMessage = outcome.errorMessage ?? phaseNote(outcome);
    }
  }
  return { ...entry.record, status: outcome.status, error_message: errorMessage };
}

interface InstanceReport {
  instanceId: InstanceId;
  status: InstanceOutcome["status"];
  passedPredicates: number;
  totalPredicates: number;
  failedPredicates: readonly string[];
  predicateResults: readonly PredicateVerdict[];
  errorMessage: string | null;
  durationMs: number;
}

export interface JsonReport {
  timestamp: string;
  command: string;
  input: string;
  environment: EnvironmentInfo;
  workers: number;
  summary: StatisticsSnapshot & {
    totalInstances: number;
    totalErrors: number;
    accuracy: number;
  };
  durations: DurationStats;
  instances: InstanceReport[];
}

export function buildJsonReport(
  summary: RunSummary,
  entries: readonly ReportEntry[],
  meta: { command: string; input: string; workers: number }
): JsonReport {
  return {
    timestamp: summary.timestamp,
    command: meta.command,
    input: meta.input,
    environment: getEnvironmentInfo(),
    workers: meta.workers,
    summary: {
      ...summary.stats,
      totalInstances: summary.totalInstances,
      totalErrors: totalErrors(summary.stats),
      accuracy: summary.accuracy,
    },
    durations: calculateStats(entries.map((entry) => entry.outcome.durationMs)),
    instances: entries.map(({ outcome }) => ({
      instanceId: outcome.instanceId,
      status: outcome.status,
      passedPredicates: outcome.passedPredicates,
      totalPredicates: outcome.totalPredicates,
      failedPredicates: outcome.failedPredicates,
      predicateResults: outcome.predicateResults,
      errorMessage: outcome.errorMessage,
      durationMs: outcome.durationMs,
    })),
  };
}

export interface ReportPaths {
  text: string;
  json: string;
}

/** Write `report.txt` and `report.json` into `directory`. */
export function writeReports(
  directory: string,
  summary: RunSummary,
  entries: readonly ReportEntry[],
  meta: { command: string; input: string; workers: number }
): ReportPaths {
  mkdirSync(directory, { recursive: true });
  const paths = { text: join(directory, "report.txt"), json: join(directory, "report.json") };
  writeFileSync(paths.text, renderTextReport(summary, entries));
  writeFileSync(paths.json, JSON.stringify(buildJsonReport(summary, entries, meta), null, 2));
  return paths;
}

/** One-line timing summary in the style of the console output. */
export function formatDurations(entries: readonly ReportEntry[]): string {
  const stats = calculateStats(entries.map((entry) => entry.outcome.durationMs));
  return (
    `min=${formatDuration(stats.min)}, avg=${formatDuration(stats.avg)}, ` +
    `p95=${formatDuration(stats.p95)}, max=${formatDuration(stats.max)}`
  );
}
