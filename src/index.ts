export {
  DEFAULT_DATABASE_CONFIG,
  defaultRunSettings,
  resolveDatabaseConfig,
  type DatabaseConfig,
  type RunSettings,
} from "./config.js";
export {
  AdminCommandError,
  EvaluationError,
  ExecutionError,
  PredicateFailure,
  ResourceExhaustionError,
  StatementTimeoutError,
  ValidationError,
  describeError,
} from "./errors.js";
export { ConsoleLogger, FileLogger, NullLogger, TeeLogger, type Logger } from "./logger.js";
export type { Connection, ConnectionProvider, StatementResult } from "./db/connection.js";
export { PostgresConnectionProvider } from "./db/postgres.js";
export { ShellDatabaseAdmin, type DatabaseAdmin } from "./db/admin.js";
export { EphemeralDatabasePool, type EphemeralDatabase } from "./db/ephemeral-pool.js";
export { executeSequence, executeStatement } from "./db/execute.js";
export { SqlDecimal, SqlTemporal } from "./db/values.js";
export { normalizeSql, normalizeStatements } from "./compare/normalize-sql.js";
export { canonicalizeRows, rowsEquivalent } from "./compare/canonicalize.js";
export { compareResults } from "./compare/results.js";
export { compareCost } from "./compare/plan-cost.js";
export { usesAllKeywords } from "./compare/keywords.js";
export {
  predicateSchema,
  type PredicateDefinition,
  type PredicateRequest,
  type PredicateRun,
  type PredicateVerdict,
} from "./predicates/schema.js";
export {
  CapabilityRegistry,
  type CapabilityInput,
  type PredicateCapability,
} from "./predicates/capability.js";
export {
  InlinePredicateExecutor,
  ProcessPredicateExecutor,
  type PredicateExecutor,
} from "./predicates/executor.js";
export { parseInstance, resolvePredicates, type BenchmarkInstance } from "./pipeline/instance.js";
export { evaluateInstance } from "./pipeline/evaluate-instance.js";
export { runEvaluation, type RunResult } from "./pipeline/run.js";
export { RunStatistics, overallAccuracy } from "./report/stats.js";
export { renderTextReport } from "./report/report.js";
export type { InstanceOutcome } from "./types.js";
export { formatDuration, calculateStats } from "./utils.js";
