export type ParseOutcome<T> = { ok: true; value: T } | { ok: false; reason: string; raw: string };

/**
 * Return the first balanced `{...}` substring of `text`, skipping braces that
 * appear inside JSON string literals. Returns null when no object closes.
 */
export function extractFirstJsonObject(text: string): string | null {
  const start = text.indexOf("{");
  if (start === -1) return null;

  let depth = 0;
  let inString = false;
  let escaped = false;

  for (let i = start; i < text.length; i++) {
    const char = text[i];

    if (inString) {
      if (escaped) {
        escaped = false;
      } else if (char === "\\") {
        escaped = true;
      } else if (char === '"') {
        inString = false;
      }
      continue;
    }

    if (char === '"') {
      inString = true;
    } else if (char === "{") {
      depth += 1;
    } else if (char === "}") {
      depth -= 1;
      if (depth === 0) {
        return text.slice(start, i + 1);
      }
    }
  }

  return null;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function decode(text: string): { ok: true; value: unknown } | { ok: false; message: string } {
  try {
    return { ok: true, value: JSON.parse(text) };
  } catch (error) {
    return { ok: false, message: error instanceof Error ? error.message : String(error) };
  }
}

/**
 * Strict decode of the whole reply first; on failure, decode the first
 * balanced object found in it. Model replies often wrap JSON in prose or
 * code fences.
 */
export function parseJsonObject(text: string): ParseOutcome<Record<string, unknown>> {
  const trimmed = text.trim();
  if (trimmed.length === 0) {
    return { ok: false, reason: "empty response", raw: text };
  }

  const direct = decode(trimmed);
  if (direct.ok && isRecord(direct.value)) {
    return { ok: true, value: direct.value };
  }

  const candidate = extractFirstJsonObject(trimmed);
  if (!candidate) {
    return { ok: false, reason: "no JSON object found", raw: text };
  }

  const extracted = decode(candidate);
  if (!extracted.ok) {
    return { ok: false, reason: `invalid JSON: ${extracted.message}`, raw: text };
  }
  if (!isRecord(extracted.value)) {
    return { ok: false, reason: "JSON value is not an object", raw: text };
  }
  return { ok: true, value: extracted.value };
}

export function readNumber(value: unknown): number | null {
  if (typeof value === "number") {
    return Number.isFinite(value) ? value : null;
  }
  if (typeof value === "string" && value.trim().length > 0) {
    const parsed = Number(value.trim());
    return Number.isFinite(parsed) ? parsed : null;
  }
  return null;
}

export function readString(value: unknown): string | null {
  return typeof value === "string" && value.trim().length > 0 ? value.trim() : null;
}
