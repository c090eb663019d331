const FENCE = "```";

/**
 * Returns the body of a fenced reply: everything after the opening fence line,
 * up to the last fence that starts a line. Fences inside JSON strings never
 * start a line, since JSON strings cannot hold raw newlines. Text without a
 * fence is returned trimmed.
 */
export function unwrapFencedResponse(raw: string): string {
  const trimmed = raw.trim();
  const openIndex = trimmed.indexOf(FENCE);
  if (openIndex === -1) {
    return trimmed;
  }

  const lineBreak = trimmed.indexOf("\n", openIndex);
  if (lineBreak === -1) {
    return trimmed.slice(openIndex + FENCE.length).replace(/^[a-z]*\s*/i, "").replace(/`+$/, "").trim();
  }

  const body = trimmed.slice(lineBreak + 1);
  if (body.startsWith(FENCE)) {
    return "";
  }

  const closeIndex = body.lastIndexOf(`\n${FENCE}`);
  return (closeIndex === -1 ? body.replace(/`{3}\s*$/, "") : body.slice(0, closeIndex)).trim();
}

export function parseJsonFromModelText(raw: string): unknown {
  const trimmed = raw.trim();
  if (!trimmed) {
    throw new Error("Model returned an empty response.");
  }

  const whole = tryParseJson(trimmed);
  if (whole.ok) {
    return whole.value;
  }

  const unwrapped = unwrapFencedResponse(trimmed);
  if (!unwrapped) {
    throw new Error("Model returned an empty response.");
  }

  for (const candidate of [unwrapped, extractDelimitedJson(unwrapped), extractDelimitedJson(trimmed)]) {
    if (candidate) {
      const parsed = tryParseJson(candidate);
      if (parsed.ok) {
        return parsed.value;
      }
    }
  }

  throw new Error("Model response did not contain valid JSON.");
}

function tryParseJson(text: string): { ok: true; value: unknown } | { ok: false } {
  try {
    return { ok: true, value: JSON.parse(text) };
  } catch {
    return { ok: false };
  }
}

function extractDelimitedJson(text: string): string | null {
  const objectStart = text.indexOf("{");
  const arrayStart = text.indexOf("[");
  const useArray = arrayStart !== -1 && (objectStart === -1 || arrayStart < objectStart);
  const startIndex = useArray ? arrayStart : objectStart;
  const endIndex = text.lastIndexOf(useArray ? "]" : "}");

  if (startIndex === -1 || endIndex === -1 || endIndex <= startIndex) {
    return null;
  }

  return text.slice(startIndex, endIndex + 1).trim();
}

export function isObject(value: unknown): value is Record<string, unknown> {
  return Boolean(value) && typeof value === "object" && !Array.isArray(value);
}

export function asString(value: unknown, fallback = ""): string {
  return typeof value === "string" ? value.trim() : fallback;
}

export function asStringArray(value: unknown): string[] {
  if (!Array.isArray(value)) {
    return [];
  }
  return value
    .map((item) => (typeof item === "string" ? item.trim() : ""))
    .filter((item) => item.length > 0);
}

export function asObjectArray(value: unknown): Record<string, unknown>[] {
  if (!Array.isArray(value)) {
    return [];
  }

  return value.filter(isObject);
}
