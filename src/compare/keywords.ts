/**
 * True when every keyword appears, case-insensitively, somewhere in the
 * statements. No statements means no usage.
 */
export function usesAllKeywords(statements: readonly string[], keywords: readonly string[]): boolean {
  if (statements.length === 0) return false;
  const combined = statements.map((sql) => sql.toLowerCase()).join(" ");
  return keywords.every((keyword) => combined.includes(keyword.toLowerCase()));
}
