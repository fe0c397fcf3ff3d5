import { mkdtempSync, readFileSync, rmSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, describe, it, expect } from "vitest";
import type { ReportEntry, RunSummary } from "../src/report/report.js";
import {
  annotateRecord,
  correlate,
  formatInstanceLine,
  phaseNote,
  renderTextReport,
  writeReports,
} from "../src/report/report.js";
import { RunStatistics, overallAccuracy, totalErrors } from "../src/report/stats.js";
import type { OutcomeFields } from "../src/types.js";
import { createOutcome } from "../src/types.js";

function outcome(fields: Partial<OutcomeFields> = {}) {
  return createOutcome({
    instanceId: 1,
    executionError: false,
    timeoutError: false,
    assertionError: false,
    passedPredicates: 1,
    totalPredicates: 1,
    failedPredicates: [],
    predicateResults: ["passed"],
    errorMessage: null,
    durationMs: 10,
    ...fields,
  });
}

describe("createOutcome", () => {
  it("derives the status from the error flags", () => {
    expect(outcome().status).toBe("success");
    expect(outcome({ timeoutError: true }).status).toBe("failed");
  });
});

describe("RunStatistics", () => {
  it("counts each flag and every clean instance", () => {
    const stats = new RunStatistics();
    stats.record(outcome());
    stats.record(outcome({ executionError: true }));
    stats.record(outcome({ timeoutError: true, assertionError: true }));

    const snapshot = stats.snapshot();
    expect(snapshot).toEqual({
      executionErrors: 1,
      timeouts: 1,
      assertionErrors: 1,
      passedInstances: 1,
      recordedInstances: 3,
    });
    expect(totalErrors(snapshot)).toBe(3);
    expect(overallAccuracy(snapshot, 4)).toBe(25);
  });

  it("reports zero accuracy for an empty run", () => {
    expect(overallAccuracy(new RunStatistics().snapshot(), 0)).toBe(0);
  });
});

describe("text report", () => {
  it("formats a passing instance", () => {
    expect(formatInstanceLine(outcome({ instanceId: "shop_3" }))).toBe(
      "Question_shop_3: (1/1) test cases passed, failed test cases: None"
    );
  });

  it("lists failed predicates and phase notes", () => {
    const failed = outcome({
      instanceId: 4,
      assertionError: true,
      passedPredicates: 1,
      totalPredicates: 3,
      failedPredicates: ["test_2", "test_3"],
    });
    expect(formatInstanceLine(failed)).toBe(
      "Question_4: (1/3) test cases passed, failed test cases: test_2, test_3 | Eval Phase: Assertion Error"
    );
  });

  it("joins every phase note", () => {
    expect(phaseNote(outcome({ executionError: true, timeoutError: true }))).toBe(
      " | Eval Phase: Execution Error | Eval Phase: Timeout Error"
    );
  });

  it("renders the header and one line per instance", () => {
    const stats = new RunStatistics();
    const passed = outcome({ instanceId: 1 });
    const failed = outcome({ instanceId: 2, executionError: true, passedPredicates: 0 });
    stats.record(passed);
    stats.record(failed);
    const summary: RunSummary = {
      timestamp: "2024-05-01T12:00:00.000Z",
      totalInstances: 3,
      stats: stats.snapshot(),
      accuracy: overallAccuracy(stats.snapshot(), 3),
    };
    const entries: ReportEntry[] = [
      { instanceId: 1, record: {}, outcome: passed },
      { instanceId: 2, record: {}, outcome: failed },
    ];

    expect(renderTextReport(summary, entries)).toBe(
      [
        "-".repeat(50),
        "SQL Answer Evaluation Statistics (Postgres):",
        "Number of Instances: 3",
        "Number of Execution Errors: 1",
        "Number of Timeouts: 0",
        "Number of Assertion Errors: 0",
        "Total Errors: 1",
        "Overall Accuracy: 66.67%",
        "Timestamp: 2024-05-01T12:00:00.000Z",
        "",
        "Question_1: (1/1) test cases passed, failed test cases: None",
        "Question_2: (0/1) test cases passed, failed test cases: None | Eval Phase: Execution Error",
        "",
      ].join("\n")
    );
  });
});

describe("correlate", () => {
  it("sorts both sides by instance id", () => {
    const entries = correlate(
      [
        { instanceId: 10, record: { n: "ten" } },
        { instanceId: 2, record: { n: "two" } },
      ],
      [outcome({ instanceId: 2 }), outcome({ instanceId: 10 })]
    );
    expect(entries.map((entry) => [entry.instanceId, entry.record.n, entry.outcome.instanceId])).toEqual([
      [2, "two", 2],
      [10, "ten", 10],
    ]);
  });

  it("refuses lists that do not correspond", () => {
    expect(() => correlate([{ instanceId: 1, record: {} }], [outcome({ instanceId: 2 })])).toThrow(
      "Records and outcomes diverge at index 0: record 1, outcome 2"
    );
    expect(() => correlate([], [outcome()])).toThrow("Got 1 outcomes for 0 input records");
  });
});

describe("annotateRecord", () => {
  it("clears the message of a passing instance", () => {
    const entry = { instanceId: 1, record: { instance_id: 1, pred_sqls: "SELECT 1" }, outcome: outcome() };
    expect(annotateRecord(entry)).toEqual({
      instance_id: 1,
      pred_sqls: "SELECT 1",
      status: "success",
      error_message: null,
    });
  });

  it("names failed predicates", () => {
    const failed = outcome({ assertionError: true, failedPredicates: ["test_1"] });
    expect(annotateRecord({ instanceId: 1, record: {}, outcome: failed })).toEqual({
      status: "failed",
      error_message: "test_1 failed",
    });
  });

  it("falls back to the error message, then the phase note", () => {
    const withMessage = outcome({ executionError: true, errorMessage: "No available ephemeral databases." });
    expect(annotateRecord({ instanceId: 1, record: {}, outcome: withMessage }).error_message).toBe(
      "No available ephemeral databases."
    );
    const bare = outcome({ timeoutError: true });
    expect(annotateRecord({ instanceId: 1, record: {}, outcome: bare }).error_message).toBe(
      " | Eval Phase: Timeout Error"
    );
  });
});

describe("writeReports", () => {
  let directory: string | undefined;

  afterEach(() => {
    if (directory) rmSync(directory, { recursive: true, force: true });
  });

  it("writes the text and JSON reports", () => {
    directory = mkdtempSync(join(tmpdir(), "sql-eval-report-"));
    const stats = new RunStatistics();
    const passed = outcome({ durationMs: 40 });
    stats.record(passed);
    const summary: RunSummary = {
      timestamp: "2024-05-01T12:00:00.000Z",
      totalInstances: 1,
      stats: stats.snapshot(),
      accuracy: 100,
    };

    const paths = writeReports(directory, summary, [{ instanceId: 1, record: {}, outcome: passed }], {
      command: "sql-answer-eval --input answers.jsonl",
      input: "answers.jsonl",
      workers: 2,
    });

    expect(paths).toEqual({ text: join(directory, "report.txt"), json: join(directory, "report.json") });
    expect(readFileSync(paths.text, "utf8")).toContain("Overall Accuracy: 100.00%\n");
    const json: unknown = JSON.parse(readFileSync(paths.json, "utf8"));
    expect(json).toMatchObject({
      command: "sql-answer-eval --input answers.jsonl",
      workers: 2,
      summary: { totalInstances: 1, totalErrors: 0, accuracy: 100, passedInstances: 1 },
      durations: { min: 40, max: 40, avg: 40 },
      instances: [{ instanceId: 1, status: "success", predicateResults: ["passed"] }],
    });
  });
});
