export type JsonFailureReporter = (message: string, offendingText: string) => void;

const LEADING_FENCE = /^```[A-Za-z0-9_+-]*[ \t]*(?:\r?\n)?/;
const TRAILING_FENCE = /(?:\r?\n)?[ \t]*```$/;

export function stripCodeFences(text: string): string {
  return text.trim().replace(LEADING_FENCE, "").replace(TRAILING_FENCE, "").trim();
}

/**
 * Parse a model response that may be wrapped in a fenced code block.
 * Returns `{}` instead of throwing; the failure goes to `report`.
 */
export function extractJson(text: string, report?: JsonFailureReporter): unknown {
  const cleaned = stripCodeFences(text);
  try {
    return JSON.parse(cleaned) as unknown;
  } catch (err) {
    const msg = err instanceof Error ? err.message : String(err);
    report?.(`JSON parsing error: ${msg}`, cleaned);
    return {};
  }
}

export function isEmptyMapping(value: unknown): boolean {
  return typeof value === "object" && value !== null && !Array.isArray(value) && Object.keys(value).length === 0;
}
