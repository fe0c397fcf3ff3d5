import { rowsEquivalent } from "../compare/canonicalize.js";
import { usesAllKeywords } from "../compare/keywords.js";
import { normalizeStatements } from "../compare/normalize-sql.js";
import { compareCost } from "../compare/plan-cost.js";
import { compareResults } from "../compare/results.js";
import type { Connection } from "../db/connection.js";
import { executeSequence } from "../db/execute.js";
import { PredicateFailure } from "../errors.js";
import type { Logger } from "../logger.js";
import type { CapabilityRegistry } from "./capability.js";
import type { PredicateDefinition, PredicateRequest } from "./schema.js";

export interface PredicateContext {
  request: PredicateRequest;
  /** Connection to the clone; primitives that need none never open it. */
  connect(): Promise<Connection>;
  capabilities: CapabilityRegistry;
  logger: Logger;
  maxRows?: number;
}

/**
 * Evaluate one predicate definition. Resolves true on pass, false on
 * non-equivalence; errors propagate and count as failures.
 */
export async function evaluatePredicate(
  predicate: PredicateDefinition,
  context: PredicateContext
): Promise<boolean> {
  const { request, logger } = context;

  switch (predicate.type) {
    case "result_equivalence": {
      const normalize = predicate.normalize ?? true;
      const candidate = normalize ? normalizeStatements(request.candidate) : request.candidate;
      const reference = normalize ? normalizeStatements(request.reference) : request.reference;
      return compareResults(candidate, reference, await context.connect(), {
        order: predicate.order ?? false,
        maxRows: context.maxRows,
        logger,
      });
    }

    case "plan_cost": {
      const baseline = predicate.baseline ?? request.baseline;
      if (baseline.length === 0) {
        throw new PredicateFailure("plan_cost predicate has no baseline statements to compare with");
      }
      return compareCost(baseline, request.candidate, await context.connect(), logger);
    }

    case "keyword_usage":
      return usesAllKeywords(request.candidate, predicate.keywords);

    case "result_matches": {
      const connection = await context.connect();
      const outcome = await executeSequence(predicate.sql, connection, "Check SQL", logger, {
        maxRows: context.maxRows,
      });
      if (outcome.executionError || outcome.timeoutError) return false;
      const rows = outcome.result?.rows ?? [];
      if (predicate.expected.length === 0) return rows.length === 0;
      return rowsEquivalent(rows, predicate.expected, predicate.order ?? false);
    }

    case "all":
      for (const child of predicate.predicates) {
        if (!(await evaluatePredicate(child, context))) return false;
      }
      return true;

    case "any":
      for (const child of predicate.predicates) {
        if (await evaluatePredicate(child, context)) return true;
      }
      return false;

    case "capability": {
      const capability = await context.capabilities.load(predicate.name);
      const verdict: unknown = await capability.evaluate({
        candidate: request.candidate,
        reference: request.reference,
        database: request.database,
        connect: context.connect,
        options: predicate.options ?? {},
        logger,
      });
      return verdict === true;
    }
  }
}
