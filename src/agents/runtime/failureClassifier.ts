import { APICallError } from "ai";

import { ServiceUnavailableError, TransientServiceError } from "../../domain/errors.js";
import { isObject } from "../../utils/json.js";

export type GenerationFailureKind = "transient" | "unavailable" | "other";

export const OTHER_FAILURE_RETRY_DELAY_MS = 2000;

const TRANSIENT_STATUS_CODES = new Set([429, 503]);

const TRANSIENT_MARKERS = [
  "503",
  "429",
  "overloaded",
  "rate limit",
  "too many requests",
  "resource exhausted",
  "temporarily unavailable"
];

const UNAVAILABLE_MARKERS = ["404", "not found"];

export function classifyGenerationFailure(error: unknown): GenerationFailureKind {
  if (error instanceof TransientServiceError) {
    return "transient";
  }
  if (error instanceof ServiceUnavailableError) {
    return "unavailable";
  }

  const statusCode = APICallError.isInstance(error) ? error.statusCode : readStatusCode(error);
  if (statusCode !== undefined) {
    if (TRANSIENT_STATUS_CODES.has(statusCode)) {
      return "transient";
    }
    if (statusCode === 404) {
      return "unavailable";
    }
  }

  const message = describeFailure(error).toLowerCase();
  if (TRANSIENT_MARKERS.some((marker) => message.includes(marker))) {
    return "transient";
  }
  if (UNAVAILABLE_MARKERS.some((marker) => message.includes(marker))) {
    return "unavailable";
  }

  return "other";
}

/** 2s, 4s, 8s, ... for a zero-based attempt index. */
export function backoffDelayMs(attempt: number): number {
  return 2 ** attempt * 2 * 1000;
}

export function describeFailure(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return typeof error === "string" ? error : "Unknown runtime error.";
}

function readStatusCode(error: unknown): number | undefined {
  if (!isObject(error)) {
    return undefined;
  }
  const candidate = error.statusCode ?? error.status;
  return typeof candidate === "number" ? candidate : undefined;
}
