import { describe, it, expect } from "vitest";
import { parseInstance, resolvePredicates, splitStatements } from "../src/pipeline/instance.js";
import type { BenchmarkInstance } from "../src/pipeline/instance.js";

function queryRecord(overrides: Record<string, unknown> = {}): Record<string, unknown> {
  return {
    instance_id: "shop_1",
    selected_database: "shop",
    preprocess_sql: [],
    sol_sql: ["SELECT name FROM items"],
    pred_sqls: "SELECT name FROM items",
    ...overrides,
  };
}

function parsed(record: Record<string, unknown>): BenchmarkInstance {
  const result = parseInstance(record, 1);
  if (!result.ok) throw new Error(result.issues.join("; "));
  return result.instance;
}

describe("splitStatements", () => {
  it("treats a string as one statement", () => {
    expect(splitStatements("SELECT 1; SELECT 2")).toEqual(["SELECT 1; SELECT 2"]);
  });

  it("keeps arrays and drops non-strings", () => {
    expect(splitStatements(["SELECT 1", 2, "SELECT 3"])).toEqual(["SELECT 1", "SELECT 3"]);
  });

  it("maps absent and empty values to no statements", () => {
    expect(splitStatements(undefined)).toEqual([]);
    expect(splitStatements(null)).toEqual([]);
    expect(splitStatements("")).toEqual([]);
  });
});

describe("parseInstance", () => {
  it("reads a query instance", () => {
    const instance = parsed(queryRecord({ conditions: { order: true }, clean_up_sql: "DROP TABLE tmp" }));
    expect(instance).toEqual({
      instanceId: "shop_1",
      database: "shop",
      category: "Query",
      preprocess: [],
      candidate: ["SELECT name FROM items"],
      reference: ["SELECT name FROM items"],
      cleanup: ["DROP TABLE tmp"],
      baseline: [],
      predicates: [],
      order: true,
      efficiency: false,
    });
  });

  it("reports every missing required field", () => {
    const result = parseInstance({ instance_id: 7, selected_database: "shop", test_cases: [{}, {}] }, 1);
    expect(result).toEqual({
      ok: false,
      instanceId: 7,
      issues: ["Missing fields: preprocess_sql, sol_sql, pred_sqls"],
      declaredPredicates: 2,
    });
  });

  it("falls back to the position when the id is missing", () => {
    const result = parseInstance({ selected_database: "shop" }, 12);
    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.instanceId).toBe(12);
  });

  it("rejects an empty database name", () => {
    const result = parseInstance(queryRecord({ selected_database: "" }), 1);
    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.issues).toEqual(["selected_database: String must contain at least 1 character(s)"]);
  });

  it("parses predicates of management instances", () => {
    const instance = parsed(
      queryRecord({
        category: "Management",
        test_cases: [
          { type: "result_matches", sql: "SELECT COUNT(*) FROM audit", expected: [[1]] },
          { type: "keyword_usage", keywords: ["TRIGGER"] },
        ],
      })
    );
    expect(instance.predicates).toEqual([
      { type: "result_matches", sql: ["SELECT COUNT(*) FROM audit"], expected: [[1]] },
      { type: "keyword_usage", keywords: ["TRIGGER"] },
    ]);
  });

  it("rejects source-text and malformed predicates", () => {
    const result = parseInstance(
      queryRecord({
        category: "Management",
        test_cases: ["function check(pred, sol) { return true; }", { type: "keyword_usage", keywords: [] }],
      }),
      1
    );
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.issues).toEqual([
        "test_cases[0]: source-text predicates are not supported",
        "test_cases[1].keywords: Array must contain at least 1 element(s)",
      ]);
    }
  });

  it("ignores test cases of query instances", () => {
    const instance = parsed(queryRecord({ test_cases: ["anything"] }));
    expect(instance.predicates).toEqual([]);
  });
});

describe("resolvePredicates", () => {
  it("defaults queries to result equivalence", () => {
    expect(resolvePredicates(parsed(queryRecord()))).toEqual([
      { type: "result_equivalence", order: false, normalize: true },
    ]);
  });

  it("adds a plan cost check for efficiency instances with a baseline", () => {
    const instance = parsed(queryRecord({ efficiency: true, issue_sql: ["SELECT * FROM items"] }));
    expect(resolvePredicates(instance)).toEqual([
      { type: "result_equivalence", order: false, normalize: true },
      { type: "plan_cost" },
    ]);
  });

  it("skips the plan cost check without a baseline", () => {
    expect(resolvePredicates(parsed(queryRecord({ efficiency: true })))).toHaveLength(1);
  });

  it("uses the declared predicates of other categories", () => {
    const instance = parsed(queryRecord({ category: "Management" }));
    expect(resolvePredicates(instance)).toEqual([]);
  });
});
