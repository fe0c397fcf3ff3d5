import { z } from "zod";

export const STATEMENT_TIMEOUT_MS = 60_000;
export const PREDICATE_TIMEOUT_MS = 60_000;
export const ACQUIRE_TIMEOUT_MS = 60_000;
export const ADMIN_COMMAND_TIMEOUT_MS = 60_000;
export const MAX_RESULT_ROWS = 10_000;

const databaseConfigSchema = z.object({
  host: z.string().min(1),
  port: z.number().int().min(1).max(65_535),
  user: z.string().min(1),
  password: z.string().optional(),
  maxConnections: z.number().int().min(1),
});

export type DatabaseConfig = z.infer<typeof databaseConfigSchema>;

export const DEFAULT_DATABASE_CONFIG: DatabaseConfig = {
  host: "localhost",
  port: 5432,
  user: "root",
  maxConnections: 5,
};

/**
 * Resolve connection settings. Explicit overrides win over the environment,
 * which wins over {@link DEFAULT_DATABASE_CONFIG}.
 */
export function resolveDatabaseConfig(
  overrides: Partial<DatabaseConfig> = {},
  env: NodeJS.ProcessEnv = process.env
): DatabaseConfig {
  const fromEnv: Partial<DatabaseConfig> = {};
  if (env.PGHOST) fromEnv.host = env.PGHOST;
  if (env.PGPORT) fromEnv.port = parseInteger(env.PGPORT, "PGPORT");
  if (env.PGUSER) fromEnv.user = env.PGUSER;
  if (env.PGPASSWORD) fromEnv.password = env.PGPASSWORD;
  if (env.SQLEVAL_MAX_CONNECTIONS) {
    fromEnv.maxConnections = parseInteger(env.SQLEVAL_MAX_CONNECTIONS, "SQLEVAL_MAX_CONNECTIONS");
  }

  const defaults = DEFAULT_DATABASE_CONFIG;
  return databaseConfigSchema.parse({
    host: overrides.host ?? fromEnv.host ?? defaults.host,
    port: overrides.port ?? fromEnv.port ?? defaults.port,
    user: overrides.user ?? fromEnv.user ?? defaults.user,
    password: overrides.password ?? fromEnv.password ?? defaults.password,
    maxConnections: overrides.maxConnections ?? fromEnv.maxConnections ?? defaults.maxConnections,
  });
}

/** Settings that shape one evaluation run. */
export interface RunSettings {
  /** Worker pool width, also the number of clones per base database. */
  workers: number;
  statementTimeoutMs: number;
  predicateTimeoutMs: number;
  acquireTimeoutMs: number;
  maxResultRows: number;
  /** Directory receiving reports and per-instance logs. */
  outputDir: string;
  /** Write one log file per instance. */
  instanceLogs: boolean;
  /** Evaluate predicates in-process instead of in forked children. */
  inlinePredicates: boolean;
  /** Capability name to module path or URL. */
  capabilities: Record<string, string>;
}

export function defaultRunSettings(outputDir: string): RunSettings {
  return {
    workers: 4,
    statementTimeoutMs: STATEMENT_TIMEOUT_MS,
    predicateTimeoutMs: PREDICATE_TIMEOUT_MS,
    acquireTimeoutMs: ACQUIRE_TIMEOUT_MS,
    maxResultRows: MAX_RESULT_ROWS,
    outputDir,
    instanceLogs: false,
    inlinePredicates: false,
    capabilities: {},
  };
}

/** Parse number with underscore separators (e.g., 1_000) */
export function parseInteger(value: string, label: string): number {
  const parsed = Number(value.replace(/_/g, ""));
  if (!Number.isInteger(parsed)) {
    throw new Error(`${label} must be an integer, got '${value}'`);
  }
  return parsed;
}
