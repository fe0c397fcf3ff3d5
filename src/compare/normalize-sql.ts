/**
 * SQL text normalization applied before comparing a candidate with its
 * reference, so that comments, `DISTINCT` and `ROUND(...)` wrappers do not
 * decide the outcome.
 */

const BLOCK_COMMENT = /\/\*[\s\S]*?\*\//g;
const LINE_COMMENT = /--[^\r\n]*/g;
const BLANK_LINES = /\n\s*\n+/g;
const DISTINCT = /\bDISTINCT\b(?!\s+ON\b)/gi;
const ROUND_CALL = /\bROUND\s*\(/i;

/** Strip block and line comments, collapse blank lines, trim. */
export function removeComments(sql: string): string {
  return tidy(sql.replace(BLOCK_COMMENT, "").replace(LINE_COMMENT, ""));
}

/** Strip `DISTINCT` keywords, keeping `DISTINCT ON (...)`. */
export function removeDistinct(sql: string): string {
  return sql.replace(DISTINCT, "");
}

/**
 * Replace every `ROUND(expr[, places])` with `expr`, innermost wrappers
 * included: `ROUND(ROUND(price, 2), 1)` becomes `price`. Stops at the first
 * call without a closing parenthesis.
 */
export function removeRound(sql: string): string {
  let result = sql;
  for (;;) {
    const match = ROUND_CALL.exec(result);
    if (!match) break;

    const start = match.index;
    const open = start + match[0].length - 1;
    const close = findMatchingParen(result, open);
    if (close === -1) break;

    const firstArgEnd = findFirstArgEnd(result, open + 1);
    const firstArg = result.slice(open + 1, firstArgEnd).trim();
    result = result.slice(0, start) + firstArg + result.slice(close + 1);
  }
  return result;
}

/** Comments, then `DISTINCT`, then `ROUND`, then whitespace tidy. */
export function normalizeSql(sql: string): string {
  return tidy(removeRound(removeDistinct(removeComments(sql))));
}

export function normalizeStatements(statements: readonly string[]): string[] {
  return statements.map(normalizeSql);
}

function tidy(sql: string): string {
  return sql.replace(BLANK_LINES, "\n").trim();
}

function findMatchingParen(text: string, open: number): number {
  let depth = 0;
  for (let i = open; i < text.length; i++) {
    const ch = text[i];
    if (ch === "(") depth++;
    else if (ch === ")") {
      depth--;
      if (depth === 0) return i;
    }
  }
  return -1;
}

/** Index of the `,` or `)` that ends the first argument starting at `from`. */
function findFirstArgEnd(text: string, from: number): number {
  let depth = 0;
  for (let i = from; i < text.length; i++) {
    const ch = text[i];
    if (ch === "(") depth++;
    else if (ch === ")") {
      if (depth === 0) return i;
      depth--;
    } else if (ch === "," && depth === 0) {
      return i;
    }
  }
  return text.length;
}
