const STOP_WORDS = new Set([
  "about",
  "actually",
  "after",
  "again",
  "because",
  "before",
  "being",
  "between",
  "could",
  "every",
  "first",
  "from",
  "going",
  "have",
  "into",
  "just",
  "know",
  "lecture",
  "like",
  "more",
  "must",
  "only",
  "other",
  "really",
  "right",
  "should",
  "something",
  "that",
  "their",
  "there",
  "these",
  "they",
  "thing",
  "things",
  "this",
  "those",
  "through",
  "today",
  "using",
  "what",
  "when",
  "where",
  "which",
  "while",
  "with",
  "would"
]);

export function normalizeWhitespace(value: string): string {
  return value.replace(/\s+/g, " ").trim();
}

export function splitSentences(text: string): string[] {
  return normalizeWhitespace(text)
    .split(/(?<=[.!?])\s+/)
    .map((sentence) => sentence.trim())
    .filter((sentence) => sentence.length > 0);
}

export function chunkArray<T>(items: T[], size: number): T[][] {
  if (size <= 0) {
    throw new Error("Chunk size must be positive.");
  }

  const chunks: T[][] = [];
  for (let index = 0; index < items.length; index += size) {
    chunks.push(items.slice(index, index + size));
  }
  return chunks;
}

export function sentenceCase(value: string): string {
  if (!value) {
    return value;
  }

  return `${value.charAt(0).toUpperCase()}${value.slice(1)}`;
}

export function summarizeText(text: string, maxSentences = 2): string {
  const normalized = normalizeWhitespace(text);
  if (!normalized) {
    return "Overview pending deeper content extraction.";
  }

  const sentences = splitSentences(normalized).slice(0, maxSentences);
  if (sentences.length === 0) {
    return normalized.slice(0, 220);
  }

  return sentences.join(" ");
}

export function extractKeywords(text: string, maxCount: number): string[] {
  const frequency = new Map<string, number>();
  const tokens = normalizeWhitespace(text)
    .toLowerCase()
    .replace(/[^a-z0-9\s-]/g, " ")
    .split(/\s+/)
    .map((token) => token.trim())
    .filter((token) => token.length >= 4 && !STOP_WORDS.has(token));

  for (const token of tokens) {
    frequency.set(token, (frequency.get(token) ?? 0) + 1);
  }

  return [...frequency.entries()]
    .sort((left, right) => right[1] - left[1])
    .slice(0, maxCount)
    .map(([keyword]) => keyword);
}

/** Cuts by code point so a surrogate pair is never split. */
export function truncate(value: string, maxLength: number): string {
  const codePoints = Array.from(value);
  return codePoints.length <= maxLength ? value : codePoints.slice(0, maxLength).join("");
}

export function slugify(value: string): string {
  return value
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, "-")
    .replace(/^-+|-+$/g, "")
    .replace(/--+/g, "-");
}

export function createId(prefix: string, seed: string): string {
  const slug = slugify(seed) || "item";
  return `${prefix}-${slug}`;
}
