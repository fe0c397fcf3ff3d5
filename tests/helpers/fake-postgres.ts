import type { DatabaseAdmin } from "../../src/db/admin.js";
import type { Connection, ConnectionProvider, Row, StatementResult } from "../../src/db/connection.js";
import { AdminCommandError, ExecutionError, StatementTimeoutError } from "../../src/errors.js";
import { SqlDecimal } from "../../src/db/values.js";

type Tables = Map<string, Row[]>;

/** A scripted answer for one exact statement. */
type Scripted = Row[] | Error;

function cloneTables(tables: Tables): Tables {
  return new Map([...tables].map(([name, rows]) => [name, rows.map((row) => [...row])]));
}

function parseLiteral(text: string): unknown {
  const value = text.trim();
  if (/^null$/i.test(value)) return null;
  if (/^-?\d+$/.test(value)) return Number(value);
  if (/^-?\d+\.\d+$/.test(value)) return new SqlDecimal(value);
  const quoted = /^'(.*)'$/.exec(value);
  if (quoted) return quoted[1] ?? "";
  throw new Error(`unsupported literal ${value}`);
}

function clean(statement: string): string {
  return statement.trim().replace(/;\s*$/, "").trim();
}

/**
 * In-memory stand-in for a PostgreSQL server: databases hold tables of
 * positional rows and understand just enough SQL for the tests.
 */
export class FakeServer {
  readonly databases = new Map<string, Tables>();
  /** Every statement run, as `database: statement`. */
  readonly history: string[] = [];
  private readonly scripted = new Map<string, Scripted>();
  private readonly costs = new Map<string, number>();

  addDatabase(name: string, tables: Record<string, Row[]> = {}): void {
    this.databases.set(name, new Map(Object.entries(tables).map(([t, rows]) => [t, rows.map((r) => [...r])])));
  }

  /** Answer `statement` with fixed rows, or fail with `error`. */
  script(statement: string, answer: Scripted): void {
    this.scripted.set(clean(statement), answer);
  }

  /** Planner cost reported by `EXPLAIN (FORMAT JSON) <statement>`. */
  setCost(statement: string, cost: number): void {
    this.costs.set(clean(statement), cost);
  }

  tables(database: string): Tables {
    const tables = this.databases.get(database);
    if (!tables) throw new ExecutionError(`database "${database}" does not exist`, "");
    return tables;
  }

  rows(database: string, table: string): Row[] {
    return this.tables(database).get(table) ?? [];
  }

  execute(database: string, statement: string): StatementResult {
    const sql = clean(statement);
    this.history.push(`${database}: ${sql}`);
    const tables = this.tables(database);

    const scripted = this.scripted.get(sql);
    if (scripted instanceof Error) throw scripted;
    if (scripted) return { rows: scripted.map((row) => [...row]), command: "SELECT", truncated: false };

    if (/^SET\s/i.test(sql) || sql === "SELECT 1") {
      return { rows: sql === "SELECT 1" ? [[1]] : [], command: "SET", truncated: false };
    }
    if (/pg_sleep/i.test(sql)) throw new StatementTimeoutError(sql);

    const explain = /^EXPLAIN \(FORMAT JSON\)\s+([\s\S]+)$/i.exec(sql);
    if (explain?.[1] !== undefined) {
      const target = clean(explain[1]);
      if (/^SELECT\s+\*\s+FROM\s+missing/i.test(target)) {
        throw new ExecutionError(`relation "missing" does not exist`, sql);
      }
      const cost = this.costs.get(target) ?? 100;
      return { rows: [[[{ Plan: { "Total Cost": cost } }]]], command: "EXPLAIN", truncated: false };
    }

    const create = /^CREATE TABLE (\w+)/i.exec(sql);
    if (create?.[1] !== undefined) {
      if (tables.has(create[1])) throw new ExecutionError(`relation "${create[1]}" already exists`, sql);
      tables.set(create[1], []);
      return { rows: [], command: "CREATE", truncated: false };
    }

    const drop = /^DROP TABLE (?:IF EXISTS )?(\w+)/i.exec(sql);
    if (drop?.[1] !== undefined) {
      tables.delete(drop[1]);
      return { rows: [], command: "DROP", truncated: false };
    }

    const insert = /^INSERT INTO (\w+) VALUES\s*([\s\S]+)$/i.exec(sql);
    if (insert?.[1] !== undefined && insert[2] !== undefined) {
      const table = this.table(tables, insert[1], sql);
      for (const tuple of insert[2].matchAll(/\(([^)]*)\)/g)) {
        table.push((tuple[1] ?? "").split(",").map(parseLiteral));
      }
      return { rows: [], command: "INSERT", truncated: false };
    }

    const remove = /^DELETE FROM (\w+)$/i.exec(sql);
    if (remove?.[1] !== undefined) {
      this.table(tables, remove[1], sql).length = 0;
      return { rows: [], command: "DELETE", truncated: false };
    }

    const count = /^SELECT COUNT\(\*\) FROM (\w+)$/i.exec(sql);
    if (count?.[1] !== undefined) {
      const n = this.table(tables, count[1], sql).length;
      return { rows: [[BigInt(n)]], command: "SELECT", truncated: false };
    }

    const selectAll = /^SELECT \* FROM (\w+)$/i.exec(sql);
    if (selectAll?.[1] !== undefined) {
      const rows = this.table(tables, selectAll[1], sql).map((row) => [...row]);
      return { rows, command: "SELECT", truncated: false };
    }

    throw new ExecutionError(`syntax error at or near "${sql.split(/\s+/)[0] ?? ""}"`, sql, {
      code: "42601",
    });
  }

  private table(tables: Tables, name: string, sql: string): Row[] {
    const rows = tables.get(name);
    if (!rows) throw new ExecutionError(`relation "${name}" does not exist`, sql, { code: "42P01" });
    return rows;
  }
}

export class FakeConnection implements Connection {
  released = false;
  private transaction: Tables | undefined;
  private readonly savepoints: Tables[] = [];

  constructor(
    private readonly server: FakeServer,
    readonly database: string
  ) {}

  run(statement: string): Promise<StatementResult> {
    try {
      return Promise.resolve(this.runSync(clean(statement)));
    } catch (error) {
      return Promise.reject(error instanceof Error ? error : new Error(String(error)));
    }
  }

  begin(): Promise<void> {
    this.transaction = cloneTables(this.server.tables(this.database));
    return Promise.resolve();
  }

  rollback(): Promise<void> {
    if (this.transaction) this.server.databases.set(this.database, this.transaction);
    this.transaction = undefined;
    this.savepoints.length = 0;
    return Promise.resolve();
  }

  release(): Promise<void> {
    this.released = true;
    return Promise.resolve();
  }

  private runSync(sql: string): StatementResult {
    if (/^SAVEPOINT\s/i.test(sql)) {
      this.savepoints.push(cloneTables(this.server.tables(this.database)));
      return { rows: [], command: "SAVEPOINT", truncated: false };
    }
    if (/^RELEASE SAVEPOINT\s/i.test(sql)) {
      this.savepoints.pop();
      return { rows: [], command: "RELEASE", truncated: false };
    }
    if (/^ROLLBACK TO SAVEPOINT\s/i.test(sql)) {
      const snapshot = this.savepoints[this.savepoints.length - 1];
      if (snapshot) this.server.databases.set(this.database, cloneTables(snapshot));
      return { rows: [], command: "ROLLBACK", truncated: false };
    }
    return this.server.execute(this.database, sql);
  }
}

export class FakeConnectionProvider implements ConnectionProvider {
  readonly opened: FakeConnection[] = [];
  readonly closedPools: string[] = [];

  constructor(private readonly server: FakeServer) {}

  acquire(database: string): Promise<Connection> {
    if (!this.server.databases.has(database)) {
      return Promise.reject(new ExecutionError(`Could not connect to ${database}: no such database`, ""));
    }
    const connection = new FakeConnection(this.server, database);
    this.opened.push(connection);
    return Promise.resolve(connection);
  }

  closePool(database: string): Promise<void> {
    this.closedPools.push(database);
    return Promise.resolve();
  }

  closeAll(): Promise<void> {
    return Promise.resolve();
  }

  /** Connections acquired but never released. */
  get leaked(): FakeConnection[] {
    return this.opened.filter((connection) => !connection.released);
  }
}

/** Clones databases inside a {@link FakeServer}, the way `createdb --template` would. */
export class FakeAdmin implements DatabaseAdmin {
  readonly calls: string[] = [];
  /** Databases whose creation fails. */
  readonly failCreate = new Set<string>();

  constructor(private readonly server: FakeServer) {}

  terminateConnections(database: string): Promise<void> {
    this.calls.push(`terminate ${database}`);
    return Promise.resolve();
  }

  dropDatabase(database: string, ifExists: boolean): Promise<void> {
    this.calls.push(`drop ${database}`);
    if (!this.server.databases.delete(database) && !ifExists) {
      return Promise.reject(
        new AdminCommandError("dropdb", [database], 1, `database "${database}" does not exist`)
      );
    }
    return Promise.resolve();
  }

  createDatabase(database: string, template: string): Promise<void> {
    this.calls.push(`create ${database} from ${template}`);
    const source = this.server.databases.get(template);
    if (!source || this.failCreate.has(database)) {
      return Promise.reject(
        new AdminCommandError("createdb", [database, "--template", template], 1, "createdb: error")
      );
    }
    this.server.databases.set(database, cloneTables(source));
    return Promise.resolve();
  }
}
