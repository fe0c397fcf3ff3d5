import { appendFileSync, mkdirSync, writeFileSync } from "node:fs";
import { dirname } from "node:path";

export interface Logger {
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

const SECTION_RULE = "=".repeat(50);

/** Print a banner around a group of related log lines. */
export function logSection(logger: Logger, title: string): void {
  logger.info(SECTION_RULE);
  logger.info(`=== ${title} ===`);
}

export function logSectionEnd(logger: Logger): void {
  logger.info(SECTION_RULE);
}

export class ConsoleLogger implements Logger {
  constructor(private readonly prefix?: string) {}

  info(message: string): void {
    console.log(this.format(message));
  }

  warn(message: string): void {
    console.warn(this.format(message));
  }

  error(message: string): void {
    console.error(this.format(message));
  }

  private format(message: string): string {
    return this.prefix ? `[${this.prefix}] ${message}` : message;
  }
}

/**
 * Appends timestamped lines to a file. Writes are synchronous so the log
 * survives a worker being torn down mid-instance.
 */
export class FileLogger implements Logger {
  constructor(readonly path: string, truncate = true) {
    mkdirSync(dirname(path), { recursive: true });
    if (truncate) writeFileSync(path, "");
  }

  info(message: string): void {
    this.write("INFO", message);
  }

  warn(message: string): void {
    this.write("WARNING", message);
  }

  error(message: string): void {
    this.write("ERROR", message);
  }

  private write(level: string, message: string): void {
    appendFileSync(this.path, `${new Date().toISOString()} - ${level} - ${message}\n`);
  }
}

/** Fans every line out to several loggers. */
export class TeeLogger implements Logger {
  private readonly targets: Logger[];

  constructor(...targets: Logger[]) {
    this.targets = targets;
  }

  info(message: string): void {
    for (const target of this.targets) target.info(message);
  }

  warn(message: string): void {
    for (const target of this.targets) target.warn(message);
  }

  error(message: string): void {
    for (const target of this.targets) target.error(message);
  }
}

export class NullLogger implements Logger {
  info(): void {}
  warn(): void {}
  error(): void {}
}
