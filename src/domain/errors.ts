export type PipelineErrorKind =
  | "invalid-input"
  | "transient"
  | "service-unavailable"
  | "generation-exhausted"
  | "malformed-response"
  | "invariant-violation"
  | "transcript-unavailable";

export abstract class QuizPipelineError extends Error {
  abstract readonly kind: PipelineErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class InvalidInputError extends QuizPipelineError {
  readonly kind = "invalid-input";
}

export class TranscriptTooShortError extends InvalidInputError {
  constructor(readonly length: number, readonly minimum: number) {
    super(
      `Transcript is too short to generate meaningful notes (${length} characters, at least ${minimum} required).`
    );
  }
}

export class InvalidVideoIdError extends InvalidInputError {
  constructor(readonly input: string) {
    super(`Invalid YouTube URL or video id: "${input}". Please provide a valid video link.`);
  }
}

export class TransientServiceError extends QuizPipelineError {
  readonly kind = "transient";

  constructor(readonly model: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
  }
}

export class ServiceUnavailableError extends QuizPipelineError {
  readonly kind = "service-unavailable";

  constructor(readonly model: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
  }
}

export interface ModelAttemptSummary {
  model: string;
  attempts: number;
  outcome: "transient" | "unavailable";
  lastError: string;
}

export class GenerationExhaustedError extends QuizPipelineError {
  readonly kind = "generation-exhausted";

  constructor(readonly attempts: ModelAttemptSummary[]) {
    super(
      attempts.length === 0
        ? "No text generation models are configured."
        : `All models failed (${attempts
            .map((attempt) => `${attempt.model}: ${attempt.outcome} after ${attempt.attempts} attempt(s)`)
            .join("; ")}). The generation service may be overloaded; try again later.`
    );
  }
}

export class EmptyQuestionBankError extends QuizPipelineError {
  readonly kind = "generation-exhausted";

  constructor(readonly videoId: string, tierErrors: string[]) {
    super(
      tierErrors.length > 0
        ? `No quiz questions could be generated for ${videoId}: ${tierErrors.join("; ")}`
        : `No valid quiz questions could be generated for ${videoId}. Try again later.`
    );
  }
}

export class MalformedResponseError extends QuizPipelineError {
  readonly kind = "malformed-response";

  constructor(
    readonly stage: string,
    message: string,
    readonly rawText: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }
}

export class MalformedNotesError extends MalformedResponseError {
  constructor(readonly missingFields: string[], rawText: string) {
    super("notes", `Generated notes are missing required fields: ${missingFields.join(", ")}.`, rawText);
  }
}

export class InvariantViolationError extends QuizPipelineError {
  readonly kind = "invariant-violation";
}

export type TranscriptFailureReason = "disabled" | "not-found" | "unavailable" | "rate-limited" | "other";

const TRANSCRIPT_MESSAGES: Record<TranscriptFailureReason, string> = {
  disabled: "Transcripts are disabled for this video.",
  "not-found": "No transcript found for this video. The video may not have captions.",
  unavailable: "Video is unavailable. It may be private or deleted.",
  "rate-limited": "The video platform is rate limiting transcript requests. Wait a few minutes and retry.",
  other: "The transcript could not be retrieved."
};

export class TranscriptUnavailableError extends QuizPipelineError {
  readonly kind = "transcript-unavailable";

  constructor(
    readonly videoId: string,
    readonly reason: TranscriptFailureReason,
    detail?: string,
    options?: { cause?: unknown }
  ) {
    super(detail ? `${TRANSCRIPT_MESSAGES[reason]} (${detail})` : TRANSCRIPT_MESSAGES[reason], options);
  }
}

export function describeError(error: unknown): string {
  if (error instanceof MalformedResponseError) {
    return `The ${error.stage} response could not be understood: ${error.message}`;
  }
  if (error instanceof QuizPipelineError) {
    return error.message;
  }
  if (error instanceof Error) {
    return `An unexpected error occurred: ${error.message}`;
  }
  return "An unexpected error occurred.";
}
