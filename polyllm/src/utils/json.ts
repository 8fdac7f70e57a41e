import type { JsonValue } from "../types/json.js";

export type SafeJsonResult =
  | { success: true; value: JsonValue }
  | { success: false; error: Error };

export function safeJsonParse(text: string): SafeJsonResult {
  try {
    return { success: true, value: JSON.parse(text) };
  } catch (e) {
    return {
      success: false,
      error: e instanceof Error ? e : new Error(String(e)),
    };
  }
}

/**
 * Best-effort parse of a JSON prefix, as seen mid-stream. Closes open
 * strings, arrays and objects. Returns undefined when nothing usable
 * can be recovered yet.
 */
export function partialJsonParse(text: string): JsonValue | undefined {
  const trimmed = text.trim();
  if (!trimmed) {
    return undefined;
  }

  const direct = safeJsonParse(trimmed);
  if (direct.success) {
    return direct.value;
  }

  // Closers in the order they must be appended
  const closers: string[] = [];
  let inString = false;
  let escaped = false;

  for (const ch of trimmed) {
    if (escaped) {
      escaped = false;
      continue;
    }
    if (ch === "\\") {
      escaped = inString;
      continue;
    }
    if (ch === '"') {
      inString = !inString;
      continue;
    }
    if (inString) continue;

    if (ch === "{") closers.push("}");
    else if (ch === "[") closers.push("]");
    else if (ch === "}" || ch === "]") closers.pop();
  }

  let repaired = trimmed;
  if (escaped) {
    repaired = repaired.slice(0, -1);
  }
  if (inString) {
    repaired += '"';
  }

  // A key without a value cannot be closed, drop it
  repaired = repaired.replace(/:\s*$/, "");
  if (closers[closers.length - 1] === "}") {
    repaired = repaired.replace(/([{,])\s*"(?:[^"\\]|\\.)*"\s*$/, "$1");
  }
  repaired = repaired.replace(/,\s*$/, "");

  repaired += closers.reverse().join("");

  const result = safeJsonParse(repaired);
  return result.success ? result.value : undefined;
}
