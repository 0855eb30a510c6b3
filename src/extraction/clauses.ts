/**
 * Split case text into clauses. Newlines act as sentence terminators;
 * runs of "." or ";" separate clauses.
 */
export function splitClauses(text: string): string[] {
  return text
    .replace(/\n/g, ". ")
    .split(/[.;]+/)
    .map((c) => c.trim())
    .filter((c) => c.length > 0);
}
