/**
 * JSON extraction utilities for recovering structured outputs from LLM text.
 *
 * These helpers only locate and parse the first top-level JSON object or
 * array; they make no attempt to parse arbitrary JavaScript.
 *
 * @module summarizer/json
 */

/** Remove a surrounding ```json fence if present. */
export function stripCodeFences(text: string): string {
  return String(text ?? "")
    .trim()
    .replace(/^```(?:json)?\s*/i, "")
    .replace(/\s*```\s*$/i, "")
    .trim();
}

function extractBalanced(raw: string, open: "{" | "[", close: "}" | "]"): string | null {
  const start = raw.indexOf(open);
  if (start < 0) return null;

  let depth = 0;
  let inString = false;
  let escape = false;

  for (let i = start; i < raw.length; i++) {
    const ch = raw[i];

    if (inString) {
      if (escape) {
        escape = false;
        continue;
      }
      if (ch === "\\") {
        escape = true;
        continue;
      }
      if (ch === "\"") {
        inString = false;
      }
      continue;
    }

    if (ch === "\"") {
      inString = true;
      continue;
    }

    if (ch === open) depth++;
    if (ch === close) depth--;

    if (depth === 0) return raw.slice(start, i + 1);
  }

  return null;
}

/**
 * Extract the first JSON object substring from arbitrary text.
 * Resilient to braces inside quoted strings.
 */
export function extractFirstJsonObjectFromText(text: string): string | null {
  return extractBalanced(String(text ?? ""), "{", "}");
}

export function extractFirstJsonArrayFromText(text: string): string | null {
  return extractBalanced(String(text ?? ""), "[", "]");
}

export function tryParseFirstJsonObject(text: string): unknown {
  const jsonStr = extractFirstJsonObjectFromText(text);
  if (!jsonStr) return null;
  try {
    return JSON.parse(jsonStr);
  } catch {
    return null;
  }
}

/**
 * Parse model output that should be JSON: the whole (unfenced) text first,
 * then whichever balanced object or array starts earliest.
 */
export function parseModelJson(text: string): unknown {
  const unfenced = stripCodeFences(text);
  try {
    return JSON.parse(unfenced);
  } catch {
    // fall through to substring extraction
  }

  const objectStart = unfenced.indexOf("{");
  const arrayStart = unfenced.indexOf("[");
  const candidates =
    arrayStart >= 0 && (objectStart < 0 || arrayStart < objectStart)
      ? [extractFirstJsonArrayFromText(unfenced), extractFirstJsonObjectFromText(unfenced)]
      : [extractFirstJsonObjectFromText(unfenced), extractFirstJsonArrayFromText(unfenced)];

  for (const candidate of candidates) {
    if (!candidate) continue;
    try {
      return JSON.parse(candidate);
    } catch {
      continue;
    }
  }
  return null;
}
