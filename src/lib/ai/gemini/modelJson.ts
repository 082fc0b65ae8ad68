/**
 * Helpers for JSON returned by a model.
 */

/**
 * Strip markdown code fences (```json ... ```) around a JSON payload.
 */
export function normalizeJsonFromModel(raw: string): string {
  let s = raw.trim();
  const codeBlockMatch = s.match(/^```(?:json)?\s*\n?([\s\S]*?)\n?```\s*$/);
  if (codeBlockMatch) {
    s = codeBlockMatch[1].trim();
  }
  return s;
}

/**
 * Parse model output. Returns undefined when it is not JSON.
 */
export function parseModelJson(raw: string): unknown {
  try {
    return JSON.parse(normalizeJsonFromModel(raw));
  } catch (error) {
    console.warn(
      '[ModelJson] Model output is not valid JSON:',
      error instanceof Error ? error.message : String(error),
    );
    return undefined;
  }
}
