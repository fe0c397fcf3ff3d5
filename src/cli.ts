#!/usr/bin/env node
import { dirname, join } from "node:path";
import { parseArgs } from "node:util";
import type { DatabaseConfig, RunSettings } from "./config.js";
import { ADMIN_COMMAND_TIMEOUT_MS, defaultRunSettings, parseInteger, resolveDatabaseConfig } from "./config.js";
import { ShellDatabaseAdmin } from "./db/admin.js";
import { PostgresConnectionProvider } from "./db/postgres.js";
import { describeError } from "./errors.js";
import { loadJsonl } from "./io/jsonl.js";
import type { Logger } from "./logger.js";
import { ConsoleLogger, FileLogger, TeeLogger } from "./logger.js";
import { reportDirectory, runEvaluation } from "./pipeline/run.js";

const HELP = `
Usage: sql-answer-eval --input <file.jsonl> [options]

Options:
  -i, --input <path>          JSONL file of benchmark instances (required)
  -n, --limit <n>             Evaluate only the first n instances
  -w, --workers <n>           Concurrent instances and clones per database (default: 4)
  --logging                   Write per-instance logs and output_with_status.jsonl
  --output-dir <path>         Report root (default: directory of the input)
  --db-host <host>            PostgreSQL host (env PGHOST, default: localhost)
  --db-port <port>            PostgreSQL port (env PGPORT, default: 5432)
  --db-user <user>            PostgreSQL user (env PGUSER, default: root)
  --max-connections <n>       Connection pool size per database (default: 5)
  --inline-predicates         Evaluate predicates in this process
  --predicate-timeout <ms>    Budget per predicate (default: 60000)
  --capability <name=path>    Register a predicate capability module (repeatable)
  -h, --help                  Show this help message

The password is read from PGPASSWORD.

Examples:
  sql-answer-eval -i data/answers.jsonl
  sql-answer-eval -i data/answers.jsonl -w 8 --logging
  sql-answer-eval -i data/answers.jsonl --capability trigger_check=./checks/trigger.ts
`;

const { values } = parseArgs({
  options: {
    input: { type: "string", short: "i" },
    limit: { type: "string", short: "n" },
    workers: { type: "string", short: "w", default: "4" },
    logging: { type: "boolean", default: false },
    "output-dir": { type: "string" },
    "db-host": { type: "string" },
    "db-port": { type: "string" },
    "db-user": { type: "string" },
    "max-connections": { type: "string" },
    "inline-predicates": { type: "boolean", default: false },
    "predicate-timeout": { type: "string" },
    capability: { type: "string", multiple: true, default: [] },
    help: { type: "boolean", short: "h", default: false },
  },
});

if (values.help) {
  console.log(HELP);
  process.exit(0);
}

if (!values.input) {
  console.error("Missing required option --input");
  console.error(HELP);
  process.exit(1);
}

const inputPath = values.input;

function parseCapabilities(entries: string[]): Record<string, string> {
  const capabilities: Record<string, string> = {};
  for (const entry of entries) {
    const separator = entry.indexOf("=");
    if (separator <= 0 || separator === entry.length - 1) {
      throw new Error(`--capability expects name=path, got '${entry}'`);
    }
    capabilities[entry.slice(0, separator)] = entry.slice(separator + 1);
  }
  return capabilities;
}

function buildSettings(): RunSettings {
  const settings = defaultRunSettings(values["output-dir"] ?? dirname(inputPath));
  settings.workers = parseInteger(values.workers, "--workers");
  if (settings.workers < 1) throw new Error("--workers must be at least 1");
  settings.instanceLogs = values.logging;
  settings.inlinePredicates = values["inline-predicates"];
  if (values["predicate-timeout"]) {
    settings.predicateTimeoutMs = parseInteger(values["predicate-timeout"], "--predicate-timeout");
  }
  settings.capabilities = parseCapabilities(values.capability);
  return settings;
}

function buildDatabaseConfig(): DatabaseConfig {
  return resolveDatabaseConfig({
    host: values["db-host"],
    port: values["db-port"] ? parseInteger(values["db-port"], "--db-port") : undefined,
    user: values["db-user"],
    maxConnections: values["max-connections"]
      ? parseInteger(values["max-connections"], "--max-connections")
      : undefined,
  });
}

function buildCommand(settings: RunSettings): string {
  const parts = ["sql-answer-eval", `--input ${inputPath}`];
  if (values.limit) parts.push(`--limit ${values.limit}`);
  parts.push(`--workers ${String(settings.workers)}`);
  if (settings.instanceLogs) parts.push("--logging");
  if (settings.inlinePredicates) parts.push("--inline-predicates");
  for (const [name, path] of Object.entries(settings.capabilities)) {
    parts.push(`--capability ${name}=${path}`);
  }
  return parts.join(" ");
}

async function main(): Promise<void> {
  const settings = buildSettings();
  const database = buildDatabaseConfig();

  let records = loadJsonl(inputPath);
  if (values.limit) records = records.slice(0, parseInteger(values.limit, "--limit"));
  if (records.length === 0) {
    console.error(`No instances found in ${inputPath}`);
    process.exit(1);
  }

  const runLogPath = join(reportDirectory(settings.outputDir, inputPath), "run.log");
  const logger: Logger = new TeeLogger(new ConsoleLogger(), new FileLogger(runLogPath));

  logger.info("=== SQL Answer Evaluation ===");
  logger.info(`Input: ${inputPath} (${String(records.length)} instances)`);
  logger.info(
    `Database: ${database.user}@${database.host}:${String(database.port)}, workers: ${String(settings.workers)}`
  );

  const result = await runEvaluation(
    records,
    { settings, database, inputPath, command: buildCommand(settings) },
    {
      connections: new PostgresConnectionProvider(database, {
        statementTimeoutMs: settings.statementTimeoutMs,
        logger,
      }),
      admin: new ShellDatabaseAdmin(database, ADMIN_COMMAND_TIMEOUT_MS),
      logger,
    }
  );

  console.log(`\nOverall Accuracy: ${result.summary.accuracy.toFixed(2)}%`);
  console.log(`Overall report generated: ${result.reports.text}`);
  console.log(`JSON report: ${result.reports.json}`);
  if (result.annotatedPath) console.log(`Annotated output: ${result.annotatedPath}`);
  console.log("\n=== Done ===");
}

main().catch((error: unknown) => {
  console.error("Fatal error:", describeError(error));
  process.exit(1);
});
