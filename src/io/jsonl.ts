import { mkdirSync, readFileSync, writeFileSync } from "node:fs";
import { dirname } from "node:path";
import { ValidationError } from "../errors.js";

/**
 * Read a JSON Lines file of objects. Blank lines are skipped.
 *
 * @throws ValidationError naming every line that is not a JSON object.
 */
export function loadJsonl(path: string): Record<string, unknown>[] {
  const text = readFileSync(path, "utf8");
  const records: Record<string, unknown>[] = [];
  const issues: string[] = [];

  for (const [index, line] of text.split(/\r?\n/).entries()) {
    if (line.trim() === "") continue;
    const lineNo = String(index + 1);
    let value: unknown;
    try {
      value = JSON.parse(line);
    } catch (error) {
      issues.push(`line ${lineNo}: ${error instanceof Error ? error.message : String(error)}`);
      continue;
    }
    if (isRecord(value)) records.push(value);
    else issues.push(`line ${lineNo}: expected a JSON object`);
  }

  if (issues.length > 0) throw new ValidationError(issues, `Malformed JSONL in ${path}`);
  return records;
}

export function writeJsonl(path: string, records: readonly Record<string, unknown>[]): void {
  mkdirSync(dirname(path), { recursive: true });
  writeFileSync(path, records.map((record) => `${JSON.stringify(record)}\n`).join(""));
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
