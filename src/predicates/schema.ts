import { z } from "zod";

/**
 * Verification predicates are data. The closed set of primitives below is
 * composed with `all` / `any`; anything bespoke goes through a registered
 * `capability`.
 */
export type PredicateDefinition =
  | {
      /** Candidate and reference results must match. */
      type: "result_equivalence";
      order?: boolean;
      /** Strip comments, `DISTINCT` and `ROUND` first (default true). */
      normalize?: boolean;
    }
  | {
      /** Candidate must be estimated cheaper than the baseline statements. */
      type: "plan_cost";
      baseline?: string[];
    }
  | { type: "keyword_usage"; keywords: string[] }
  | {
      /** Run `sql` after the candidate and compare with literal rows. */
      type: "result_matches";
      sql: string[];
      expected: unknown[][];
      order?: boolean;
    }
  | { type: "all"; predicates: PredicateDefinition[] }
  | { type: "any"; predicates: PredicateDefinition[] }
  | { type: "capability"; name: string; options?: Record<string, unknown> };

const statements = z
  .union([z.string(), z.array(z.string())])
  .transform((value) => (typeof value === "string" ? [value] : value));

export const predicateSchema: z.ZodType<PredicateDefinition, z.ZodTypeDef, unknown> = z.lazy(() =>
  z.discriminatedUnion("type", [
    z.object({
      type: z.literal("result_equivalence"),
      order: z.boolean().optional(),
      normalize: z.boolean().optional(),
    }),
    z.object({ type: z.literal("plan_cost"), baseline: statements.optional() }),
    z.object({ type: z.literal("keyword_usage"), keywords: z.array(z.string()).min(1) }),
    z.object({
      type: z.literal("result_matches"),
      sql: statements,
      expected: z.array(z.array(z.unknown())),
      order: z.boolean().optional(),
    }),
    z.object({ type: z.literal("all"), predicates: z.array(predicateSchema).min(1) }),
    z.object({ type: z.literal("any"), predicates: z.array(predicateSchema).min(1) }),
    z.object({
      type: z.literal("capability"),
      name: z.string().min(1),
      options: z.record(z.unknown()).optional(),
    }),
  ])
);

export type PredicateVerdict = "passed" | "failed" | "timeout";

export interface PredicateRun {
  verdict: PredicateVerdict;
  /** Why the predicate did not pass. */
  message?: string;
  durationMs: number;
}

/** Everything a predicate sees besides its own definition. */
export interface PredicateRequest {
  predicate: PredicateDefinition;
  candidate: string[];
  reference: string[];
  /** Statements a `plan_cost` predicate measures against by default. */
  baseline: string[];
  database: string;
}

export function describePredicate(predicate: PredicateDefinition): string {
  switch (predicate.type) {
    case "capability":
      return `capability:${predicate.name}`;
    case "all":
    case "any":
      return `${predicate.type}(${predicate.predicates.map(describePredicate).join(", ")})`;
    default:
      return predicate.type;
  }
}
