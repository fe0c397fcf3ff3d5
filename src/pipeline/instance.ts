import { z } from "zod";
import type { PredicateDefinition } from "../predicates/schema.js";
import { predicateSchema } from "../predicates/schema.js";
import type { InstanceId } from "../utils.js";

export const QUERY_CATEGORY = "Query";

export const REQUIRED_FIELDS = ["selected_database", "preprocess_sql", "sol_sql", "pred_sqls"] as const;

/** One benchmark instance as read from the input, with statement fields split. */
export interface BenchmarkInstance {
  readonly instanceId: InstanceId;
  /** Base database the instance runs against. */
  readonly database: string;
  readonly category: string;
  readonly preprocess: readonly string[];
  readonly candidate: readonly string[];
  readonly reference: readonly string[];
  readonly cleanup: readonly string[];
  /** Statements plan-cost predicates measure against (`issue_sql`). */
  readonly baseline: readonly string[];
  readonly predicates: readonly PredicateDefinition[];
  readonly order: boolean;
  readonly efficiency: boolean;
}

export type ParsedInstance =
  | { ok: true; instance: BenchmarkInstance }
  | { ok: false; instanceId: InstanceId; issues: string[]; declaredPredicates: number };

/**
 * A statement field: one string is one statement, an array is taken as is,
 * anything else (absent, empty, null) means none.
 */
export function splitStatements(value: unknown): string[] {
  if (typeof value === "string") return value ? [value] : [];
  if (Array.isArray(value)) return value.filter((item): item is string => typeof item === "string");
  return [];
}

const statementField = z.union([z.string(), z.array(z.string()), z.null()]);

const instanceSchema = z.object({
  instance_id: z.union([z.string(), z.number()]),
  selected_database: z.string().min(1),
  preprocess_sql: statementField,
  sol_sql: statementField,
  pred_sqls: statementField,
  clean_up_sql: statementField.optional(),
  issue_sql: statementField.optional(),
  category: z.string().default(QUERY_CATEGORY),
  conditions: z.object({ order: z.boolean().optional() }).passthrough().nullish(),
  efficiency: z.boolean().nullish(),
  test_cases: z.array(z.unknown()).nullish(),
});

/**
 * Validate a raw input record. Missing required fields and malformed
 * predicates are reported as issues rather than thrown.
 */
export function parseInstance(record: Record<string, unknown>, fallbackId: InstanceId): ParsedInstance {
  const rawId = record.instance_id;
  const instanceId = typeof rawId === "string" || typeof rawId === "number" ? rawId : fallbackId;
  const declaredPredicates = Array.isArray(record.test_cases) ? record.test_cases.length : 0;

  const missing = REQUIRED_FIELDS.filter((field) => !(field in record));
  if (missing.length > 0) {
    return { ok: false, instanceId, issues: [`Missing fields: ${missing.join(", ")}`], declaredPredicates };
  }

  const parsed = instanceSchema.safeParse({ ...record, instance_id: instanceId });
  if (!parsed.success) {
    return { ok: false, instanceId, issues: formatIssues(parsed.error), declaredPredicates };
  }
  const data = parsed.data;

  const predicates: PredicateDefinition[] = [];
  const issues: string[] = [];
  if (data.category !== QUERY_CATEGORY) {
    for (const [index, testCase] of (data.test_cases ?? []).entries()) {
      if (typeof testCase === "string") {
        issues.push(`test_cases[${String(index)}]: source-text predicates are not supported`);
        continue;
      }
      const predicate = predicateSchema.safeParse(testCase);
      if (predicate.success) predicates.push(predicate.data);
      else issues.push(...formatIssues(predicate.error, `test_cases[${String(index)}]`));
    }
  }
  if (issues.length > 0) return { ok: false, instanceId, issues, declaredPredicates };

  return {
    ok: true,
    instance: {
      instanceId,
      database: data.selected_database,
      category: data.category,
      preprocess: splitStatements(data.preprocess_sql),
      candidate: splitStatements(data.pred_sqls),
      reference: splitStatements(data.sol_sql),
      cleanup: splitStatements(data.clean_up_sql),
      baseline: splitStatements(data.issue_sql),
      predicates,
      order: data.conditions?.order ?? false,
      efficiency: data.efficiency ?? false,
    },
  };
}

/**
 * Predicates an instance is judged by. Plain queries get the default
 * result-equivalence check (plus a plan-cost check when flagged for
 * efficiency and a baseline exists); other categories bring their own.
 */
export function resolvePredicates(instance: BenchmarkInstance): PredicateDefinition[] {
  if (instance.category !== QUERY_CATEGORY) return [...instance.predicates];
  const predicates: PredicateDefinition[] = [
    { type: "result_equivalence", order: instance.order, normalize: true },
  ];
  if (instance.efficiency && instance.baseline.length > 0) {
    predicates.push({ type: "plan_cost" });
  }
  return predicates;
}

function formatIssues(error: z.ZodError, prefix?: string): string[] {
  return error.issues.map((issue) => {
    const path = [prefix, ...issue.path.map(String)].filter(Boolean).join(".");
    return path ? `${path}: ${issue.message}` : issue.message;
  });
}
