import { basename, extname, join } from "node:path";
import type { DatabaseConfig, RunSettings } from "../config.js";
import type { DatabaseAdmin } from "../db/admin.js";
import type { ConnectionProvider } from "../db/connection.js";
import { EphemeralDatabasePool } from "../db/ephemeral-pool.js";
import { describeError } from "../errors.js";
import { writeJsonl } from "../io/jsonl.js";
import type { Logger } from "../logger.js";
import { FileLogger, NullLogger } from "../logger.js";
import { CapabilityRegistry } from "../predicates/capability.js";
import type { PredicateExecutor } from "../predicates/executor.js";
import { InlinePredicateExecutor, ProcessPredicateExecutor } from "../predicates/executor.js";
import type { ReportEntry, ReportPaths, RunSummary } from "../report/report.js";
import { annotateRecord, correlate, formatDurations, summarize, writeReports } from "../report/report.js";
import { RunStatistics } from "../report/stats.js";
import type { InstanceOutcome } from "../types.js";
import type { InstanceId } from "../utils.js";
import { evaluateInstance } from "./evaluate-instance.js";
import { runWithConcurrency } from "./worker-pool.js";

export interface RunOptions {
  settings: RunSettings;
  database: DatabaseConfig;
  /** Path of the JSONL input; its base name names the report directory. */
  inputPath: string;
  /** Command line that reproduces the run, recorded in `report.json`. */
  command?: string;
}

export interface RunDependencies {
  connections: ConnectionProvider;
  admin: DatabaseAdmin;
  logger: Logger;
  /** Replaces the executor chosen from the settings. */
  executor?: PredicateExecutor;
}

export interface RunResult {
  summary: RunSummary;
  entries: ReportEntry[];
  reportDir: string;
  reports: ReportPaths;
  annotatedPath: string | null;
}

/** `instance_id` of a record, or its 1-based position when it has none. */
export function recordId(record: Record<string, unknown>, position: number): InstanceId {
  const id = record.instance_id;
  return typeof id === "string" || typeof id === "number" ? id : position;
}

/** Distinct `selected_database` values across the input, in first-seen order. */
export function collectBaseDatabases(records: readonly Record<string, unknown>[]): string[] {
  const names = new Set<string>();
  for (const record of records) {
    const name = record.selected_database;
    if (typeof name === "string" && name) names.add(name);
  }
  return [...names];
}

export function reportDirectory(outputDir: string, inputPath: string): string {
  return join(outputDir, basename(inputPath, extname(inputPath)));
}

/**
 * Evaluate every record: provision clones, fan instances out over the
 * worker pool, then write the reports. Clones are dropped and pools closed
 * whether or not the run succeeds.
 */
export async function runEvaluation(
  records: readonly Record<string, unknown>[],
  options: RunOptions,
  deps: RunDependencies
): Promise<RunResult> {
  const { settings } = options;
  const { logger, connections } = deps;
  const reportDir = reportDirectory(settings.outputDir, options.inputPath);
  const ids = records.map((record, index) => recordId(record, index + 1));

  const pool = new EphemeralDatabasePool(deps.admin, connections, logger);
  const stats = new RunStatistics();
  const executor = deps.executor ?? createExecutor(options);

  let outcomes: InstanceOutcome[];
  try {
    const baseNames = collectBaseDatabases(records);
    logger.info(`Provisioning ${String(settings.workers)} clone(s) of: ${baseNames.join(", ")}`);
    await pool.provision(baseNames, settings.workers);

    outcomes = await runWithConcurrency(records, settings.workers, (record, index) => {
      const instanceId = ids[index] ?? index + 1;
      return evaluateInstance(record, instanceId, {
        pool,
        connections,
        executor,
        stats,
        logger: instanceLogger(settings, reportDir, instanceId),
        acquireTimeoutMs: settings.acquireTimeoutMs,
        maxRows: settings.maxResultRows,
      });
    });
  } finally {
    await pool.teardown();
    try {
      await connections.closeAll();
    } catch (error) {
      logger.error(`Failed to close database pools: ${describeError(error)}`);
    }
  }

  const entries = correlate(
    records.map((record, index) => ({ instanceId: ids[index] ?? index + 1, record })),
    outcomes
  );
  const summary = summarize(stats.snapshot(), records.length);
  logger.info(`Instance durations: ${formatDurations(entries)}`);

  const reports = writeReports(reportDir, summary, entries, {
    command: options.command ?? "",
    input: options.inputPath,
    workers: settings.workers,
  });

  let annotatedPath: string | null = null;
  if (settings.instanceLogs) {
    annotatedPath = join(reportDir, "output_with_status.jsonl");
    writeJsonl(annotatedPath, entries.map(annotateRecord));
  }

  return { summary, entries, reportDir, reports, annotatedPath };
}

function createExecutor(options: RunOptions): PredicateExecutor {
  const { settings } = options;
  const capabilities = new CapabilityRegistry(settings.capabilities);
  if (settings.inlinePredicates) {
    return new InlinePredicateExecutor({
      capabilities,
      timeoutMs: settings.predicateTimeoutMs,
      maxRows: settings.maxResultRows,
    });
  }
  return new ProcessPredicateExecutor({
    database: options.database,
    capabilities,
    timeoutMs: settings.predicateTimeoutMs,
    statementTimeoutMs: settings.statementTimeoutMs,
    maxRows: settings.maxResultRows,
  });
}

function instanceLogger(settings: RunSettings, reportDir: string, instanceId: InstanceId): Logger {
  if (!settings.instanceLogs) return new NullLogger();
  return new FileLogger(join(reportDir, `instance_${String(instanceId)}.log`));
}
