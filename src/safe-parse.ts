/**
 * Parse a JSON string, returning undefined when it is not valid JSON.
 */
export function safeParseJson(raw: string): unknown {
  try {
    return JSON.parse(raw);
  } catch {
    return undefined;
  }
}
