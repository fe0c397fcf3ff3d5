import { fork } from "node:child_process";
import { dirname, extname, join } from "node:path";
import { fileURLToPath } from "node:url";
import type { DatabaseConfig } from "../config.js";
import { MAX_RESULT_ROWS, PREDICATE_TIMEOUT_MS, STATEMENT_TIMEOUT_MS } from "../config.js";
import type { Connection } from "../db/connection.js";
import { describeError } from "../errors.js";
import type { Logger } from "../logger.js";
import { CapabilityRegistry } from "./capability.js";
import { evaluatePredicate } from "./evaluate.js";
import type { EvaluateMessage } from "./messages.js";
import { childMessageSchema } from "./messages.js";
import type { PredicateRequest, PredicateRun, PredicateVerdict } from "./schema.js";
import { describePredicate } from "./schema.js";

/**
 * Runs one predicate within a wall-clock budget.
 */
export interface PredicateExecutor {
  /**
   * @param connection - the phase connection; executors that isolate the
   * predicate open their own instead.
   */
  run(request: PredicateRequest, connection: Connection, logger: Logger): Promise<PredicateRun>;
}

const here = fileURLToPath(import.meta.url);
// child.ts under tsx/vitest, child.js once compiled.
const CHILD_ENTRY = join(dirname(here), `child${extname(here)}`);

export interface ProcessExecutorOptions {
  database: DatabaseConfig;
  capabilities?: CapabilityRegistry;
  timeoutMs?: number;
  statementTimeoutMs?: number;
  maxRows?: number;
}

/**
 * Forks one child process per predicate. Only the request and the verdict
 * cross the IPC channel; the child opens its own database connection. A
 * child still running when the budget runs out is killed with SIGKILL.
 */
export class ProcessPredicateExecutor implements PredicateExecutor {
  private readonly timeoutMs: number;
  private readonly capabilities: CapabilityRegistry;

  constructor(private readonly options: ProcessExecutorOptions) {
    this.timeoutMs = options.timeoutMs ?? PREDICATE_TIMEOUT_MS;
    this.capabilities = options.capabilities ?? new CapabilityRegistry();
  }

  run(request: PredicateRequest, _connection: Connection, logger: Logger): Promise<PredicateRun> {
    const started = Date.now();
    const message: EvaluateMessage = {
      type: "evaluate",
      request,
      database: this.options.database,
      capabilities: this.capabilities.toJSON(),
      statementTimeoutMs: this.options.statementTimeoutMs ?? STATEMENT_TIMEOUT_MS,
      maxRows: this.options.maxRows ?? MAX_RESULT_ROWS,
    };

    return new Promise((resolve) => {
      const child = fork(CHILD_ENTRY, [], {
        execArgv: ["--import", "tsx"],
        stdio: ["ignore", "pipe", "pipe", "ipc"],
      });
      let settled = false;
      let timer: NodeJS.Timeout | undefined;

      const finish = (verdict: PredicateVerdict, reason?: string): void => {
        if (settled) return;
        settled = true;
        clearTimeout(timer);
        if (child.exitCode === null && child.signalCode === null) child.kill("SIGKILL");
        resolve({ verdict, message: reason, durationMs: Date.now() - started });
      };

      timer = setTimeout(() => {
        logger.error(
          `Predicate ${describePredicate(request.predicate)} timed out after ${String(this.timeoutMs)}ms`
        );
        finish("timeout", `Timed out after ${String(this.timeoutMs)}ms`);
      }, this.timeoutMs);

      child.stdout?.on("data", (chunk: Buffer) => {
        logger.info(`Captured output from predicate:\n${chunk.toString().trimEnd()}`);
      });
      child.stderr?.on("data", (chunk: Buffer) => {
        logger.warn(`Predicate stderr:\n${chunk.toString().trimEnd()}`);
      });

      child.on("message", (raw: unknown) => {
        const parsed = childMessageSchema.safeParse(raw);
        if (!parsed.success) {
          logger.warn(`Ignoring malformed message from predicate process: ${parsed.error.message}`);
          return;
        }
        const reply = parsed.data;
        if (reply.type === "log") {
          logger[reply.level](reply.message);
          return;
        }
        finish(reply.passed ? "passed" : "failed", reply.message);
      });

      child.on("error", (error) => {
        finish("failed", `Predicate process error: ${describeError(error)}`);
      });

      child.on("close", (code, signal) => {
        finish(
          "failed",
          `Predicate process exited without a verdict (code ${String(code)}, signal ${String(signal)})`
        );
      });

      child.send(message, (error) => {
        if (error) finish("failed", `Could not send request to predicate process: ${error.message}`);
      });
    });
  }
}

export interface InlineExecutorOptions {
  capabilities?: CapabilityRegistry;
  timeoutMs?: number;
  maxRows?: number;
}

/**
 * Evaluates predicates in this process on the phase connection. The budget
 * still applies, but an evaluation that overruns it cannot be stopped; it
 * is reported as `timeout` and left to finish in the background.
 */
export class InlinePredicateExecutor implements PredicateExecutor {
  private readonly timeoutMs: number;
  private readonly capabilities: CapabilityRegistry;

  constructor(private readonly options: InlineExecutorOptions = {}) {
    this.timeoutMs = options.timeoutMs ?? PREDICATE_TIMEOUT_MS;
    this.capabilities = options.capabilities ?? new CapabilityRegistry();
  }

  async run(request: PredicateRequest, connection: Connection, logger: Logger): Promise<PredicateRun> {
    const started = Date.now();
    const evaluation = evaluatePredicate(request.predicate, {
      request,
      connect: () => Promise.resolve(connection),
      capabilities: this.capabilities,
      logger,
      maxRows: this.options.maxRows,
    }).then(
      (passed): PredicateRun => ({
        verdict: passed ? "passed" : "failed",
        message: passed ? undefined : "Predicate reported a mismatch",
        durationMs: Date.now() - started,
      }),
      (error: unknown): PredicateRun => {
        logger.error(`Predicate failed due to error: ${describeError(error)}`);
        return { verdict: "failed", message: describeError(error), durationMs: Date.now() - started };
      }
    );

    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<PredicateRun>((resolve) => {
      timer = setTimeout(() => {
        logger.error(
          `Predicate ${describePredicate(request.predicate)} timed out after ${String(this.timeoutMs)}ms`
        );
        resolve({
          verdict: "timeout",
          message: `Timed out after ${String(this.timeoutMs)}ms`,
          durationMs: Date.now() - started,
        });
      }, this.timeoutMs);
    });

    try {
      return await Promise.race([evaluation, timeout]);
    } finally {
      clearTimeout(timer);
    }
  }
}
