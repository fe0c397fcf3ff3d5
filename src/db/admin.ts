import { execFile } from "node:child_process";
import type { DatabaseConfig } from "../config.js";
import { ADMIN_COMMAND_TIMEOUT_MS } from "../config.js";
import { AdminCommandError } from "../errors.js";

/**
 * Database administration used to cut and recycle clones.
 */
export interface DatabaseAdmin {
  /** Terminate every backend connected to `database` except our own. */
  terminateConnections(database: string): Promise<void>;
  dropDatabase(database: string, ifExists: boolean): Promise<void>;
  createDatabase(database: string, template: string): Promise<void>;
}

export function templateName(baseName: string): string {
  return `${baseName}_template`;
}

/**
 * Runs the PostgreSQL client tools (`psql`, `dropdb`, `createdb`). The
 * password travels through `PGPASSWORD`, never on the command line.
 */
export class ShellDatabaseAdmin implements DatabaseAdmin {
  constructor(
    private readonly config: DatabaseConfig,
    private readonly timeoutMs: number = ADMIN_COMMAND_TIMEOUT_MS
  ) {}

  async terminateConnections(database: string): Promise<void> {
    const sql = `SELECT pg_terminate_backend(pid) FROM pg_stat_activity WHERE datname = '${escapeLiteral(database)}' AND pid <> pg_backend_pid();`;
    await this.run("psql", [...this.connectionArgs(), "-d", "postgres", "-c", sql]);
  }

  async dropDatabase(database: string, ifExists: boolean): Promise<void> {
    const args = ifExists ? ["--if-exists"] : [];
    await this.run("dropdb", [...args, ...this.connectionArgs(), database]);
  }

  async createDatabase(database: string, template: string): Promise<void> {
    await this.run("createdb", [...this.connectionArgs(), database, "--template", template]);
  }

  private connectionArgs(): string[] {
    return ["-h", this.config.host, "-p", String(this.config.port), "-U", this.config.user];
  }

  private run(command: string, args: string[]): Promise<void> {
    const env = { ...process.env };
    if (this.config.password !== undefined) env.PGPASSWORD = this.config.password;

    return new Promise((resolve, reject) => {
      execFile(command, args, { env, timeout: this.timeoutMs }, (error, _stdout, stderr) => {
        if (!error) {
          resolve();
          return;
        }
        const exitCode = typeof error.code === "number" ? error.code : null;
        reject(new AdminCommandError(command, args, exitCode, String(stderr), { cause: error }));
      });
    });
  }
}

function escapeLiteral(value: string): string {
  return value.replace(/'/g, "''");
}
