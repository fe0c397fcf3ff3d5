import type { Connection } from "../db/connection.js";
import type { ExecuteOptions } from "../db/execute.js";
import { executeSequence } from "../db/execute.js";
import type { Logger } from "../logger.js";
import { NullLogger } from "../logger.js";
import { rowsEquivalent } from "./canonicalize.js";

export interface CompareResultsOptions extends ExecuteOptions {
  /** Rows must match positionally. */
  order?: boolean;
  logger?: Logger;
}

/**
 * Run candidate then reference statements on one connection and compare the
 * last result of each. An error, a timeout or an empty result on either side
 * is a mismatch.
 */
export async function compareResults(
  candidate: readonly string[],
  reference: readonly string[],
  connection: Connection,
  options: CompareResultsOptions = {}
): Promise<boolean> {
  if (candidate.length === 0 || reference.length === 0) return false;
  const logger = options.logger ?? new NullLogger();

  const predicted = await executeSequence(candidate, connection, "Compare: candidate", logger, options);
  const expected = await executeSequence(reference, connection, "Compare: reference", logger, options);
  if (
    predicted.executionError ||
    predicted.timeoutError ||
    expected.executionError ||
    expected.timeoutError
  ) {
    return false;
  }

  return rowsEquivalent(predicted.result?.rows ?? [], expected.result?.rows ?? [], options.order ?? false);
}
