/**
 * Helpers for JSON embedded in model text.
 */

const FENCE_LINE = /^\s*(```|~~~)/;

/**
 * Removes a surrounding markdown code fence (```json ... ```), if any.
 * The opening fence line is dropped entirely, along with a closing fence
 * line at the end.
 */
export function stripCodeFences(text: string): string {
  const trimmed = text.trim();
  const lines = trimmed.split('\n');
  if (lines.length === 0 || !FENCE_LINE.test(lines[0] ?? '')) {
    return trimmed;
  }
  lines.shift();
  const last = lines[lines.length - 1];
  if (last !== undefined && FENCE_LINE.test(last)) {
    lines.pop();
  }
  return lines.join('\n');
}

export type JsonParseOutcome = { ok: true; value: unknown } | { ok: false; error: string };

/**
 * Parses model text as JSON after fence stripping.
 */
export function parseJsonText(text: string): JsonParseOutcome {
  const candidate = stripCodeFences(text);
  try {
    const value: unknown = JSON.parse(candidate);
    return { ok: true, value };
  } catch (error) {
    return { ok: false, error: error instanceof Error ? error.message : String(error) };
  }
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Unwraps a top-level `{ "root": ... }` wrapper.
 */
export function unwrapRoot(value: unknown): unknown {
  if (isPlainObject(value) && Object.keys(value).length === 1 && 'root' in value) {
    return value.root;
  }
  return value;
}

export { isPlainObject };
