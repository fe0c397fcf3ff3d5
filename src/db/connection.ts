/** One row as positional column values. */
export type Row = unknown[];

export interface StatementResult {
  rows: Row[];
  /** Command tag of the last statement, e.g. `SELECT` or `INSERT`. */
  command: string;
  /** Rows beyond the cap were dropped. */
  truncated: boolean;
}

/**
 * A connection reserved for one pipeline phase. Statements run on the same
 * backend session until {@link release} is called.
 *
 * Implementations raise `StatementTimeoutError` when the server cancels a
 * statement and `ExecutionError` for any other failure.
 */
export interface Connection {
  readonly database: string;
  run(statement: string): Promise<StatementResult>;
  /** Open a transaction the caller will end; failed statements inside it are not rolled back. */
  begin(): Promise<void>;
  /** Roll back the transaction opened with {@link begin}. */
  rollback(): Promise<void>;
  release(): Promise<void>;
}

/** Per-database pools of live connections. */
export interface ConnectionProvider {
  acquire(database: string): Promise<Connection>;
  /** Close the pool bound to `database`; later acquires open a new one. */
  closePool(database: string): Promise<void>;
  closeAll(): Promise<void>;
}
