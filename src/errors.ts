/**
 * Error taxonomy for an evaluation run.
 *
 * Everything except {@link AdminCommandError} is caught at the instance
 * pipeline boundary and folded into that instance's outcome. Administration
 * failures escape the worker and fail the run.
 */
export class EvaluationError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Input that is missing required fields or is malformed. */
export class ValidationError extends EvaluationError {
  constructor(readonly issues: string[], subject = "Invalid instance") {
    super(`${subject}: ${issues.join("; ")}`);
  }
}

/** No ephemeral database became free within the acquire timeout. */
export class ResourceExhaustionError extends EvaluationError {
  constructor(readonly baseName: string, readonly timeoutMs: number) {
    super(`No available ephemeral database for ${baseName} within ${String(timeoutMs)}ms`);
  }
}

/** A statement failed for a reason other than a timeout. */
export class ExecutionError extends EvaluationError {
  /** SQLSTATE reported by the server, when there was one. */
  readonly code: string | undefined;

  constructor(
    message: string,
    readonly statement: string,
    options?: { cause?: unknown; code?: string }
  ) {
    super(message, options);
    this.code = options?.code;
  }
}

/** The server cancelled a statement after the statement timeout. */
export class StatementTimeoutError extends EvaluationError {
  constructor(readonly statement: string, options?: { cause?: unknown }) {
    super(`Statement exceeded the statement timeout: ${preview(statement)}`, options);
  }
}

/** A predicate ran to completion and reported non-equivalence. */
export class PredicateFailure extends EvaluationError {}

/** A createdb/dropdb/psql invocation exited non-zero or timed out. */
export class AdminCommandError extends EvaluationError {
  constructor(
    readonly command: string,
    readonly args: readonly string[],
    readonly exitCode: number | null,
    readonly stderr: string,
    options?: { cause?: unknown }
  ) {
    const code = exitCode === null ? "no exit code" : `exit code ${String(exitCode)}`;
    const detail = stderr.trim() ? `: ${stderr.trim()}` : "";
    super(`${command} failed (${code})${detail}`, options);
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function preview(statement: string, max = 120): string {
  const flat = statement.replace(/\s+/g, " ").trim();
  return flat.length > max ? `${flat.slice(0, max)}...` : flat;
}
