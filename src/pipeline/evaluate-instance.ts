import { ACQUIRE_TIMEOUT_MS, MAX_RESULT_ROWS } from "../config.js";
import type { Connection, ConnectionProvider } from "../db/connection.js";
import type { EphemeralDatabase, EphemeralDatabasePool } from "../db/ephemeral-pool.js";
import { acquirePhaseConnection, executeSequence } from "../db/execute.js";
import { ResourceExhaustionError, describeError } from "../errors.js";
import type { Logger } from "../logger.js";
import type { PredicateExecutor } from "../predicates/executor.js";
import type { PredicateDefinition, PredicateVerdict } from "../predicates/schema.js";
import { describePredicate } from "../predicates/schema.js";
import type { RunStatistics } from "../report/stats.js";
import type { InstanceOutcome, OutcomeFields } from "../types.js";
import { createOutcome } from "../types.js";
import type { InstanceId } from "../utils.js";
import type { BenchmarkInstance } from "./instance.js";
import { QUERY_CATEGORY, parseInstance, resolvePredicates } from "./instance.js";

export interface PipelineContext {
  pool: EphemeralDatabasePool;
  connections: ConnectionProvider;
  executor: PredicateExecutor;
  stats: RunStatistics;
  logger: Logger;
  acquireTimeoutMs?: number;
  maxRows?: number;
}

/** Mutable state of one instance while its phases run. */
interface PipelineState {
  executionError: boolean;
  timeoutError: boolean;
  assertionError: boolean;
  passedPredicates: number;
  failedPredicates: string[];
  predicateResults: PredicateVerdict[];
  messages: string[];
}

/**
 * Evaluate one input record end to end and record its outcome.
 *
 * The borrowed clone is always reset and returned; a failed reset
 * propagates, since the clone can no longer be trusted.
 */
export async function evaluateInstance(
  record: Record<string, unknown>,
  fallbackId: InstanceId,
  context: PipelineContext
): Promise<InstanceOutcome> {
  const { logger, stats } = context;
  const started = Date.now();
  const parsed = parseInstance(record, fallbackId);

  if (!parsed.ok) {
    const summary = parsed.issues.join("; ");
    logger.error(`Invalid instance ${String(parsed.instanceId)}: ${summary}`);
    return finish(stats, {
      instanceId: parsed.instanceId,
      executionError: true,
      timeoutError: false,
      assertionError: false,
      passedPredicates: 0,
      totalPredicates: parsed.declaredPredicates,
      failedPredicates: [],
      predicateResults: [],
      errorMessage: summary,
      durationMs: Date.now() - started,
    });
  }

  const instance = parsed.instance;
  const predicates = resolvePredicates(instance);
  if (instance.category !== QUERY_CATEGORY && predicates.length === 0) {
    logger.warn(
      `No test cases for instance ${String(instance.instanceId)} with category ${instance.category}`
    );
  }

  let handle: EphemeralDatabase;
  try {
    handle = await context.pool.acquire(instance.database, context.acquireTimeoutMs ?? ACQUIRE_TIMEOUT_MS);
  } catch (error) {
    if (!(error instanceof ResourceExhaustionError)) throw error;
    logger.error(`No available ephemeral databases for base_db: ${instance.database}`);
    return finish(stats, {
      instanceId: instance.instanceId,
      executionError: true,
      timeoutError: false,
      assertionError: false,
      passedPredicates: 0,
      totalPredicates: predicates.length,
      failedPredicates: [],
      predicateResults: [],
      errorMessage: "No available ephemeral databases.",
      durationMs: Date.now() - started,
    });
  }
  logger.info(`Instance ${String(instance.instanceId)} is using ephemeral db: ${handle.name}`);

  const state: PipelineState = {
    executionError: false,
    timeoutError: false,
    assertionError: false,
    passedPredicates: 0,
    failedPredicates: [],
    predicateResults: [],
    messages: [],
  };

  try {
    await runPhases(instance, predicates, handle, state, context);
  } finally {
    await context.pool.recycle(handle);
    logger.info(`Instance ${String(instance.instanceId)} finished. Returned ephemeral db: ${handle.name}`);
  }

  return finish(stats, {
    instanceId: instance.instanceId,
    executionError: state.executionError,
    timeoutError: state.timeoutError,
    assertionError: state.assertionError,
    passedPredicates: state.passedPredicates,
    totalPredicates: predicates.length,
    failedPredicates: state.failedPredicates,
    predicateResults: state.predicateResults,
    errorMessage: state.messages.length > 0 ? state.messages.join("; ") : null,
    durationMs: Date.now() - started,
  });
}

async function runPhases(
  instance: BenchmarkInstance,
  predicates: PredicateDefinition[],
  handle: EphemeralDatabase,
  state: PipelineState,
  context: PipelineContext
): Promise<void> {
  const { logger } = context;
  const options = { maxRows: context.maxRows ?? MAX_RESULT_ROWS };

  logger.info("=== Starting Evaluation Phase ===");
  let connection: Connection | undefined;
  try {
    connection = await acquirePhaseConnection(handle.name, context.connections, logger);

    const preprocess = await executeSequence(instance.preprocess, connection, "Preprocess SQL", logger, options);
    if (preprocess.errorMessage !== null) {
      logger.error(`Preprocess SQL failed, continuing: ${preprocess.errorMessage}`);
    }

    const candidate = await executeSequence(instance.candidate, connection, "Predicted SQL", logger, options);
    if (candidate.executionError || candidate.timeoutError) {
      state.executionError = candidate.executionError;
      state.timeoutError = candidate.timeoutError;
      if (candidate.errorMessage !== null) state.messages.push(candidate.errorMessage);
      logger.info("Skipping test cases because the predicted SQL failed.");
    } else {
      await runPredicates(instance, predicates, handle, connection, state, logger, context.executor);
    }
  } catch (error) {
    state.executionError = true;
    state.messages.push(describeError(error));
    logger.error(`Error during execution for question ${String(instance.instanceId)}: ${describeError(error)}`);
  } finally {
    if (connection) await connection.release();
  }

  if (instance.cleanup.length > 0) {
    await runCleanup(instance, handle, state, context);
  }
  logger.info("=== Evaluation Phase Completed ===");
}

async function runPredicates(
  instance: BenchmarkInstance,
  predicates: PredicateDefinition[],
  handle: EphemeralDatabase,
  connection: Connection,
  state: PipelineState,
  logger: Logger,
  executor: PredicateExecutor
): Promise<void> {
  for (const [index, predicate] of predicates.entries()) {
    const testId = `test_${String(index + 1)}`;
    logger.info(`Running ${testId}: ${describePredicate(predicate)}`);
    const run = await executor.run(
      {
        predicate,
        candidate: [...instance.candidate],
        reference: [...instance.reference],
        baseline: [...instance.baseline],
        database: handle.name,
      },
      connection,
      logger
    );
    state.predicateResults.push(run.verdict);

    if (run.verdict === "passed") {
      state.passedPredicates++;
      logger.info(`${testId} passed in ${String(run.durationMs)}ms`);
    } else {
      state.assertionError = true;
      state.failedPredicates.push(testId);
      logger.error(`${testId} ${run.verdict}: ${run.message ?? "no details"}`);
    }
  }
}

async function runCleanup(
  instance: BenchmarkInstance,
  handle: EphemeralDatabase,
  state: PipelineState,
  context: PipelineContext
): Promise<void> {
  const { logger } = context;
  logger.info("Executing Clean Up SQL after solution phase.");
  let connection: Connection | undefined;
  try {
    connection = await acquirePhaseConnection(handle.name, context.connections, logger);
    const cleanup = await executeSequence(instance.cleanup, connection, "Clean Up SQL", logger, {
      maxRows: context.maxRows ?? MAX_RESULT_ROWS,
    });
    if (cleanup.errorMessage !== null) {
      logger.error(`Clean Up SQL failed: ${cleanup.errorMessage}`);
    }
  } catch (error) {
    state.executionError = true;
    state.messages.push(describeError(error));
    logger.error(`Error during clean up for question ${String(instance.instanceId)}: ${describeError(error)}`);
  } finally {
    if (connection) await connection.release();
  }
}

function finish(stats: RunStatistics, fields: OutcomeFields): InstanceOutcome {
  const outcome = createOutcome(fields);
  stats.record(outcome);
  return outcome;
}
