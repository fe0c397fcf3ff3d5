import { SqlDecimal, SqlTemporal } from "../db/values.js";
import type { Row } from "../db/connection.js";

export const DECIMAL_PLACES = 2;

export type CanonicalValue = string | number | boolean | null;
export type CanonicalRow = CanonicalValue[];

type Nested = CanonicalValue | Nested[] | { [key: string]: Nested };

/**
 * Round a plain decimal string half away from zero, the way `ROUND_HALF_UP`
 * does, and drop trailing zeros: `"2.005"` → `"2.01"`, `"3.10"` → `"3.1"`.
 * Anything that is not a plain decimal (`NaN`, `Infinity`) comes back as is.
 */
export function roundHalfUp(text: string, places: number = DECIMAL_PLACES): string {
  const match = /^([+-]?)(\d*)(?:\.(\d*))?$/.exec(text.trim());
  if (!match || (!match[2] && !match[3])) return text;
  const sign = match[1] === "-" ? "-" : "";
  const intDigits = match[2] ?? "";
  const fracDigits = match[3] ?? "";

  const kept = intDigits + fracDigits.slice(0, places).padEnd(places, "0");
  let scaled = BigInt(kept === "" ? "0" : kept);
  const next = fracDigits.charAt(places);
  if (next !== "" && next >= "5") scaled += 1n;

  if (scaled === 0n) return "0";
  const digits = scaled.toString().padStart(places + 1, "0");
  const whole = places > 0 ? digits.slice(0, -places) : digits;
  const fraction = places > 0 ? digits.slice(-places).replace(/0+$/, "") : "";
  return `${sign}${whole}${fraction ? `.${fraction}` : ""}`;
}

/** Plain decimal text for a finite number, without exponent notation. */
export function toDecimalText(value: number): string {
  if (!Number.isFinite(value)) return String(value);
  const text = String(value);
  if (!text.includes("e")) return text;
  // Exponent form only shows up for |value| < 1e-6 or >= 1e21.
  return Math.abs(value) < 1 ? value.toFixed(20) : BigInt(value).toString();
}

function canonicalNumber(text: string): number | string {
  const parsed = Number(text);
  return Number.isFinite(parsed) && toDecimalText(parsed) === text ? parsed : text;
}

/**
 * Canonical scalar for one column value. Numbers of every SQL type compare
 * by value after rounding, temporal values by calendar date, nested
 * structures by their key-sorted JSON text.
 */
export function canonicalizeValue(value: unknown, places: number = DECIMAL_PLACES): CanonicalValue {
  const nested = canonicalizeNested(value, places);
  if (nested === null || typeof nested !== "object") return nested;
  return stableStringify(nested);
}

export function canonicalizeRows(rows: readonly Row[], places: number = DECIMAL_PLACES): CanonicalRow[] {
  return rows.map((row) => row.map((value) => canonicalizeValue(value, places)));
}

/**
 * Compare two result sets. Ordered comparison is positional; unordered
 * comparison is set equality, so `[[1], [1]]` equals `[[1]]`. Empty results
 * never match.
 */
export function rowsEquivalent(
  candidate: readonly Row[],
  reference: readonly Row[],
  orderMatters: boolean
): boolean {
  const left = canonicalizeRows(candidate).map(rowKey);
  const right = canonicalizeRows(reference).map(rowKey);
  if (left.length === 0 || right.length === 0) return false;

  if (orderMatters) {
    return left.length === right.length && left.every((key, i) => key === right[i]);
  }
  const leftSet = new Set(left);
  const rightSet = new Set(right);
  if (leftSet.size !== rightSet.size) return false;
  for (const key of leftSet) {
    if (!rightSet.has(key)) return false;
  }
  return true;
}

export function rowKey(row: CanonicalRow): string {
  return JSON.stringify(row);
}

function canonicalizeNested(value: unknown, places: number): Nested {
  if (value === null || value === undefined) return null;
  if (value instanceof SqlTemporal) return value.date;
  if (value instanceof Date) return value.toISOString().slice(0, 10);
  if (value instanceof SqlDecimal) return canonicalNumber(roundHalfUp(value.text, places));
  if (typeof value === "number") return canonicalNumber(roundHalfUp(toDecimalText(value), places));
  if (typeof value === "bigint") return canonicalNumber(value.toString());
  if (typeof value === "string" || typeof value === "boolean") return value;
  if (value instanceof Uint8Array) return `\\x${Buffer.from(value).toString("hex")}`;
  if (Array.isArray(value)) return value.map((item: unknown) => canonicalizeNested(item, places));
  if (typeof value === "object") {
    const entries = Object.entries(value).map(
      ([key, item]): [string, Nested] => [key, canonicalizeNested(item, places)]
    );
    return Object.fromEntries(entries);
  }
  return String(value);
}

function stableStringify(value: Nested): string {
  if (value === null || typeof value !== "object") return JSON.stringify(value);
  if (Array.isArray(value)) return `[${value.map(stableStringify).join(",")}]`;
  const keys = Object.keys(value).sort();
  const body = keys.map((key) => `${JSON.stringify(key)}:${stableStringify(value[key] ?? null)}`);
  return `{${body.join(",")}}`;
}
