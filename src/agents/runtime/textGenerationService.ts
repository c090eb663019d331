import { createGateway, generateText } from "ai";

import { ServiceUnavailableError, TransientServiceError } from "../../domain/errors.js";
import { classifyGenerationFailure, describeFailure } from "./failureClassifier.js";

export interface TextGenerationRequest {
  model: string;
  system?: string;
  prompt: string;
  temperature: number;
  maxOutputTokens: number;
}

export interface TextGenerationResponse {
  text: string;
  usage: {
    inputTokens: number;
    outputTokens: number;
  };
}

/**
 * One call to a hosted text model. Implementations throw on failure and leave
 * retries to the caller.
 */
export interface TextGenerationService {
  complete(request: TextGenerationRequest): Promise<TextGenerationResponse>;
}

export class GatewayTextGenerationService implements TextGenerationService {
  private readonly gateway: ReturnType<typeof createGateway>;

  constructor(apiKey: string, private readonly requestTimeoutMs: number) {
    this.gateway = createGateway({ apiKey });
  }

  async complete(request: TextGenerationRequest): Promise<TextGenerationResponse> {
    const result = await generateText({
      model: this.gateway(request.model),
      system: request.system,
      prompt: request.prompt,
      temperature: request.temperature,
      maxOutputTokens: request.maxOutputTokens,
      maxRetries: 0,
      abortSignal: AbortSignal.timeout(this.requestTimeoutMs)
    }).catch((error: unknown) => {
      throw toServiceError(request.model, error);
    });

    return {
      text: result.text,
      usage: {
        inputTokens: result.usage.inputTokens ?? 0,
        outputTokens: result.usage.outputTokens ?? 0
      }
    };
  }
}

/** Tags gateway failures the retry loop acts on; anything else passes through. */
export function toServiceError(model: string, error: unknown): unknown {
  switch (classifyGenerationFailure(error)) {
    case "transient":
      return new TransientServiceError(model, describeFailure(error), { cause: error });
    case "unavailable":
      return new ServiceUnavailableError(model, describeFailure(error), { cause: error });
    case "other":
      return error;
  }
}
