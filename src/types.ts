import type { PredicateVerdict } from "./predicates/schema.js";
import type { InstanceId } from "./utils.js";

export type InstanceStatus = "success" | "failed";

/** Terminal record of one instance; frozen once created. */
export interface InstanceOutcome {
  readonly instanceId: InstanceId;
  readonly status: InstanceStatus;
  readonly executionError: boolean;
  readonly timeoutError: boolean;
  readonly assertionError: boolean;
  readonly passedPredicates: number;
  readonly totalPredicates: number;
  /** `test_<n>` for every predicate that did not pass, 1-based. */
  readonly failedPredicates: readonly string[];
  readonly predicateResults: readonly PredicateVerdict[];
  readonly errorMessage: string | null;
  readonly durationMs: number;
}

export type OutcomeFields = Omit<InstanceOutcome, "status">;

/** Status is `failed` iff one of the three error flags is set. */
export function createOutcome(fields: OutcomeFields): InstanceOutcome {
  const failed = fields.executionError || fields.timeoutError || fields.assertionError;
  const status: InstanceStatus = failed ? "failed" : "success";
  return Object.freeze({
    ...fields,
    failedPredicates: Object.freeze([...fields.failedPredicates]),
    predicateResults: Object.freeze([...fields.predicateResults]),
    status,
  });
}
