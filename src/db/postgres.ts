import postgres from "postgres";
import type { DatabaseConfig } from "../config.js";
import { STATEMENT_TIMEOUT_MS } from "../config.js";
import { ExecutionError, StatementTimeoutError, describeError } from "../errors.js";
import type { Logger } from "../logger.js";
import { NullLogger } from "../logger.js";
import type { Connection, ConnectionProvider, Row, StatementResult } from "./connection.js";
import {
  DATE_OID,
  NUMERIC_OID,
  SqlDecimal,
  SqlTemporal,
  TIMESTAMPTZ_OID,
  TIMESTAMP_OID,
} from "./values.js";

/** SQLSTATE `query_canceled`, raised when `statement_timeout` fires. */
const QUERY_CANCELED = "57014";
/** SQLSTATE `no_active_sql_transaction`, warned on a COMMIT/ROLLBACK outside a block. */
const NO_ACTIVE_TRANSACTION = "25P01";

export const VALUE_TYPES = {
  numeric: {
    to: NUMERIC_OID,
    from: [NUMERIC_OID],
    serialize: (value: SqlDecimal) => value.text,
    parse: (raw: string) => new SqlDecimal(raw),
  },
  date: {
    to: TIMESTAMPTZ_OID,
    from: [DATE_OID, TIMESTAMP_OID, TIMESTAMPTZ_OID],
    serialize: (value: SqlTemporal) => value.text,
    parse: (raw: string) => new SqlTemporal(raw),
  },
  bigint: postgres.BigInt,
};

function createSql(config: DatabaseConfig, database: string, statementTimeoutMs: number, logger: Logger) {
  return postgres({
    host: config.host,
    port: config.port,
    username: config.user,
    password: config.password,
    database,
    max: config.maxConnections,
    types: VALUE_TYPES,
    // Startup parameters: the timeout applies to every session of the pool.
    connection: { application_name: "sql-answer-eval", statement_timeout: statementTimeoutMs },
    onnotice: (notice) => {
      if (notice.code === NO_ACTIVE_TRANSACTION) return;
      logger.info(`[${database}] NOTICE: ${String(notice.message)}`);
    },
  });
}

type Sql = ReturnType<typeof createSql>;
type ReservedSql = Awaited<ReturnType<Sql["reserve"]>>;

export interface PostgresProviderOptions {
  statementTimeoutMs?: number;
  logger?: Logger;
}

/**
 * Connection pools keyed by database name, created on first use.
 */
export class PostgresConnectionProvider implements ConnectionProvider {
  private readonly pools = new Map<string, Sql>();
  private readonly statementTimeoutMs: number;
  private readonly logger: Logger;

  constructor(
    private readonly config: DatabaseConfig,
    options: PostgresProviderOptions = {}
  ) {
    this.statementTimeoutMs = options.statementTimeoutMs ?? STATEMENT_TIMEOUT_MS;
    this.logger = options.logger ?? new NullLogger();
  }

  async acquire(database: string): Promise<Connection> {
    let sql = this.pools.get(database);
    if (!sql) {
      sql = createSql(this.config, database, this.statementTimeoutMs, this.logger);
      this.pools.set(database, sql);
    }
    try {
      const reserved = await sql.reserve();
      return new PostgresConnection(database, reserved, this.logger);
    } catch (error) {
      throw new ExecutionError(
        `Could not connect to ${database}: ${describeError(error)}`,
        "",
        { cause: error }
      );
    }
  }

  async closePool(database: string): Promise<void> {
    const sql = this.pools.get(database);
    if (!sql) return;
    this.pools.delete(database);
    await sql.end({ timeout: 5 });
  }

  async closeAll(): Promise<void> {
    const names = [...this.pools.keys()];
    await Promise.all(names.map((name) => this.closePool(name)));
  }
}

/**
 * Outside {@link begin} every successful statement is followed by COMMIT,
 * so a statement that opens a transaction block never leaves it open, and
 * every failure by ROLLBACK.
 */
class PostgresConnection implements Connection {
  private inTransaction = false;

  constructor(
    readonly database: string,
    private readonly reserved: ReservedSql,
    private readonly logger: Logger
  ) {}

  async run(statement: string): Promise<StatementResult> {
    try {
      // Without parameters postgres.js uses the simple protocol, so one
      // string may carry several statements; the last result wins.
      const result: unknown = await this.reserved.unsafe(statement).values();
      if (!this.inTransaction) await this.reserved.unsafe("COMMIT");
      return toStatementResult(result);
    } catch (error) {
      if (!this.inTransaction) await this.rollbackAfterFailure();
      throw translateError(error, statement);
    }
  }

  async begin(): Promise<void> {
    await this.reserved.unsafe("BEGIN");
    this.inTransaction = true;
  }

  async rollback(): Promise<void> {
    try {
      await this.reserved.unsafe("ROLLBACK");
    } finally {
      this.inTransaction = false;
    }
  }

  release(): Promise<void> {
    this.reserved.release();
    return Promise.resolve();
  }

  private async rollbackAfterFailure(): Promise<void> {
    try {
      await this.reserved.unsafe("ROLLBACK");
    } catch (rollbackError) {
      this.logger.warn(`[${this.database}] rollback after failure failed: ${describeError(rollbackError)}`);
    }
  }
}

function translateError(error: unknown, statement: string): Error {
  if (error instanceof postgres.PostgresError) {
    if (error.code === QUERY_CANCELED) {
      return new StatementTimeoutError(statement, { cause: error });
    }
    return new ExecutionError(error.message, statement, { cause: error, code: error.code });
  }
  return new ExecutionError(describeError(error), statement, { cause: error });
}

function toStatementResult(result: unknown): StatementResult {
  if (!Array.isArray(result)) {
    return { rows: [], command: "", truncated: false };
  }
  // Several statements in one string come back as a list of result sets.
  const last: unknown = isResultSet(result[0]) ? result[result.length - 1] : result;
  if (!Array.isArray(last)) {
    return { rows: [], command: "", truncated: false };
  }
  const rows: Row[] = last.map((row: unknown) => (Array.isArray(row) ? [...row] : [row]));
  return { rows, command: commandOf(last), truncated: false };
}

function isResultSet(value: unknown): boolean {
  return Array.isArray(value) && commandOf(value) !== "";
}

function commandOf(value: object): string {
  return "command" in value && typeof value.command === "string" ? value.command : "";
}
