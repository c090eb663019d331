import { readFile } from "node:fs/promises";
import path from "node:path";

import {
  YoutubeTranscript,
  YoutubeTranscriptDisabledError,
  YoutubeTranscriptNotAvailableError,
  YoutubeTranscriptNotAvailableLanguageError,
  YoutubeTranscriptTooManyRequestError,
  YoutubeTranscriptVideoUnavailableError
} from "youtube-transcript";

import { TranscriptUnavailableError, type TranscriptFailureReason } from "../../domain/errors.js";
import type { TranscriptResult, VideoMetadata } from "../../domain/models.js";
import { normalizeWhitespace } from "../../utils/text.js";
import { assertVideoId, isMissingFileError } from "../storage/sessionCache.js";

const VIDEO_URL_PATTERNS = [
  /(?:youtube\.com\/watch\?v=|youtu\.be\/|youtube\.com\/embed\/)([^&\n?#]+)/,
  /youtube\.com\/watch\?.*v=([^&\n?#]+)/
];

const BARE_VIDEO_ID_PATTERN = /^[A-Za-z0-9_-]{11}$/;

/** Accepts watch, short, embed and bare 11-character forms. */
export function extractVideoId(input: string): string | null {
  const value = input.trim();

  for (const pattern of VIDEO_URL_PATTERNS) {
    const match = value.match(pattern);
    if (match?.[1]) {
      return match[1];
    }
  }

  if (BARE_VIDEO_ID_PATTERN.test(value)) {
    return value;
  }

  return null;
}

export function getVideoMetadata(videoId: string): VideoMetadata {
  return {
    videoId,
    url: `https://www.youtube.com/watch?v=${videoId}`,
    thumbnail: `https://img.youtube.com/vi/${videoId}/maxresdefault.jpg`,
    embedUrl: `https://www.youtube.com/embed/${videoId}`
  };
}

export interface TranscriptProvider {
  fetch(videoId: string): Promise<TranscriptResult>;
}

export class YoutubeTranscriptProvider implements TranscriptProvider {
  constructor(private readonly language = "en") {}

  async fetch(videoId: string): Promise<TranscriptResult> {
    try {
      const segments = await YoutubeTranscript.fetchTranscript(videoId, { lang: this.language });
      if (segments.length === 0) {
        throw new TranscriptUnavailableError(videoId, "not-found");
      }

      const last = segments[segments.length - 1];
      return {
        videoId,
        transcript: normalizeWhitespace(segments.map((segment) => segment.text).join(" ")),
        language: segments[0].lang ?? this.language,
        durationSeconds: last.offset + last.duration
      };
    } catch (error) {
      throw toTranscriptError(videoId, error);
    }
  }
}

const LIBRARY_FAILURES: Array<{
  reason: Exclude<TranscriptFailureReason, "other">;
  errorClasses: Array<new (...args: never[]) => Error>;
  marker: string;
}> = [
  { reason: "disabled", errorClasses: [YoutubeTranscriptDisabledError], marker: "transcript is disabled" },
  {
    reason: "not-found",
    errorClasses: [YoutubeTranscriptNotAvailableError, YoutubeTranscriptNotAvailableLanguageError],
    marker: "no transcripts are available"
  },
  { reason: "unavailable", errorClasses: [YoutubeTranscriptVideoUnavailableError], marker: "no longer available" },
  { reason: "rate-limited", errorClasses: [YoutubeTranscriptTooManyRequestError], marker: "too many requests" }
];

/**
 * Maps the transcript library's failures to a reason. The library's classes
 * are matched first, then their message text in case the class identity is
 * lost across builds.
 */
export function toTranscriptError(videoId: string, error: unknown): TranscriptUnavailableError {
  if (error instanceof TranscriptUnavailableError) {
    return error;
  }

  const message = error instanceof Error ? error.message : undefined;
  const normalized = message?.toLowerCase() ?? "";
  const known = LIBRARY_FAILURES.find(
    (failure) =>
      failure.errorClasses.some((errorClass) => error instanceof errorClass) || normalized.includes(failure.marker)
  );
  if (known) {
    return new TranscriptUnavailableError(videoId, known.reason, undefined, { cause: error });
  }

  return new TranscriptUnavailableError(videoId, "other", message, { cause: error });
}

/** Reads `<videoId>.txt` from a directory; handy offline and in tests. */
export class LocalTranscriptProvider implements TranscriptProvider {
  constructor(private readonly transcriptDirectory: string) {}

  async fetch(videoId: string): Promise<TranscriptResult> {
    const filePath = path.join(this.transcriptDirectory, `${assertVideoId(videoId)}.txt`);

    let raw: string;
    try {
      raw = await readFile(filePath, "utf8");
    } catch (error) {
      if (isMissingFileError(error)) {
        throw new TranscriptUnavailableError(videoId, "not-found", `no file at ${filePath}`, { cause: error });
      }
      throw new TranscriptUnavailableError(videoId, "other", `could not read ${filePath}`, { cause: error });
    }

    const transcript = normalizeWhitespace(raw);
    if (!transcript) {
      throw new TranscriptUnavailableError(videoId, "not-found", `${filePath} is empty`);
    }

    return { videoId, transcript, language: "en", durationSeconds: 0 };
  }
}
