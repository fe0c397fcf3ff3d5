/**
 * Entry point of a forked predicate process. Handles exactly one request:
 * evaluates it against its own connection, reports the verdict over IPC,
 * then exits.
 */
import type { Connection } from "../db/connection.js";
import { PostgresConnectionProvider } from "../db/postgres.js";
import { describeError } from "../errors.js";
import type { Logger } from "../logger.js";
import { CapabilityRegistry } from "./capability.js";
import { evaluatePredicate } from "./evaluate.js";
import type { ChildMessage } from "./messages.js";
import { evaluateMessageSchema } from "./messages.js";

function send(message: ChildMessage): Promise<void> {
  return new Promise((resolve, reject) => {
    if (!process.send) {
      reject(new Error("Predicate process started without an IPC channel"));
      return;
    }
    process.send(message, (error: Error | null) => {
      if (error) reject(error);
      else resolve();
    });
  });
}

class IpcLogger implements Logger {
  info(message: string): void {
    this.forward("info", message);
  }

  warn(message: string): void {
    this.forward("warn", message);
  }

  error(message: string): void {
    this.forward("error", message);
  }

  private forward(level: "info" | "warn" | "error", message: string): void {
    send({ type: "log", level, message }).catch((error: unknown) => {
      console.error(`Could not forward predicate log line: ${describeError(error)}`);
    });
  }
}

async function handle(raw: unknown): Promise<void> {
  const message = evaluateMessageSchema.parse(raw);
  const logger = new IpcLogger();
  const connections = new PostgresConnectionProvider(message.database, {
    statementTimeoutMs: message.statementTimeoutMs,
    logger,
  });
  let connection: Connection | undefined;
  const connect = async (): Promise<Connection> => {
    connection ??= await connections.acquire(message.request.database);
    return connection;
  };

  try {
    const passed = await evaluatePredicate(message.request.predicate, {
      request: message.request,
      connect,
      capabilities: new CapabilityRegistry(message.capabilities),
      logger,
      maxRows: message.maxRows,
    });
    await send({
      type: "verdict",
      passed,
      message: passed ? undefined : "Predicate reported a mismatch",
    });
  } catch (error) {
    logger.error(`Predicate failed due to error: ${describeError(error)}`);
    await send({ type: "verdict", passed: false, message: describeError(error) });
  } finally {
    if (connection) await connection.release();
    await connections.closeAll();
  }
}

process.once("message", (raw: unknown) => {
  handle(raw)
    .catch((error: unknown) => {
      console.error(`Predicate process failed: ${describeError(error)}`);
      process.exitCode = 1;
    })
    .finally(() => {
      if (process.connected) process.disconnect();
    });
});
