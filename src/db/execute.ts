import { MAX_RESULT_ROWS } from "../config.js";
import { StatementTimeoutError, describeError } from "../errors.js";
import type { Logger } from "../logger.js";
import { NullLogger, logSection, logSectionEnd } from "../logger.js";
import type { Connection, ConnectionProvider, StatementResult } from "./connection.js";

export interface ExecuteOptions {
  maxRows?: number;
}

/**
 * Run one statement. Without a connection, one is reserved from the pool of
 * `database`; the caller owns the returned connection and releases it.
 */
export async function executeStatement(
  statement: string,
  database: string,
  connections: ConnectionProvider,
  connection?: Connection,
  options: ExecuteOptions = {}
): Promise<{ result: StatementResult; connection: Connection }> {
  const conn = connection ?? (await connections.acquire(database));
  try {
    const result = await runCapped(conn, statement, options.maxRows ?? MAX_RESULT_ROWS);
    return { result, connection: conn };
  } catch (error) {
    if (!connection) await conn.release();
    throw error;
  }
}

/** Run a statement on a connection, silently dropping rows past `maxRows`. */
export async function runCapped(
  connection: Connection,
  statement: string,
  maxRows: number = MAX_RESULT_ROWS
): Promise<StatementResult> {
  const result = await connection.run(statement);
  if (result.rows.length <= maxRows) return result;
  return { ...result, rows: result.rows.slice(0, maxRows), truncated: true };
}

export interface SequenceResult {
  /** Result of the last statement that ran, or null if none did. */
  result: StatementResult | null;
  executionError: boolean;
  timeoutError: boolean;
  errorMessage: string | null;
}

/**
 * Run statements in order on one connection, stopping at the first failure.
 */
export async function executeSequence(
  statements: readonly string[],
  connection: Connection,
  label: string,
  logger: Logger = new NullLogger(),
  options: ExecuteOptions = {}
): Promise<SequenceResult> {
  logSection(logger, label);
  const outcome: SequenceResult = {
    result: null,
    executionError: false,
    timeoutError: false,
    errorMessage: null,
  };

  for (const [index, statement] of statements.entries()) {
    const position = `${String(index + 1)}/${String(statements.length)}`;
    logger.info(`Executing query ${position}: ${statement}`);
    try {
      outcome.result = await runCapped(connection, statement, options.maxRows);
      logger.info(`Query result: ${previewRows(outcome.result)}`);
    } catch (error) {
      outcome.errorMessage = describeError(error);
      if (error instanceof StatementTimeoutError) {
        logger.error(`Timeout error executing query ${position}: ${outcome.errorMessage}`);
        outcome.timeoutError = true;
      } else {
        logger.error(`Error executing query ${position}: ${outcome.errorMessage}`);
        outcome.executionError = true;
      }
      break;
    } finally {
      logger.info(`[${label}] DB: ${connection.database}`);
    }
  }

  logSectionEnd(logger);
  return outcome;
}

/**
 * Reserve a connection for one pipeline phase and check it is live.
 */
export async function acquirePhaseConnection(
  database: string,
  connections: ConnectionProvider,
  logger: Logger
): Promise<Connection> {
  logger.info(`Acquiring dedicated connection for phase on db: ${database}`);
  const { connection } = await executeStatement("SELECT 1", database, connections);
  return connection;
}

function previewRows(result: StatementResult, max = 5): string {
  const shown = result.rows.slice(0, max).map((row) => JSON.stringify(row, jsonReplacer));
  const more = result.rows.length > max ? ` ... (${String(result.rows.length)} rows)` : "";
  const truncated = result.truncated ? " [truncated]" : "";
  return `[${shown.join(", ")}]${more}${truncated}`;
}

function jsonReplacer(_key: string, value: unknown): unknown {
  return typeof value === "bigint" ? value.toString() : value;
}
