import type { AgentMode, RuntimeConfig } from "../../config/runtimeConfig.js";
import {
  GenerationExhaustedError,
  MalformedResponseError,
  QuizPipelineError,
  type ModelAttemptSummary
} from "../../domain/errors.js";
import type { TokenUsage } from "../../domain/models.js";
import { parseJsonFromModelText } from "../../utils/json.js";
import { createId } from "../../utils/text.js";
import {
  backoffDelayMs,
  classifyGenerationFailure,
  describeFailure,
  OTHER_FAILURE_RETRY_DELAY_MS
} from "./failureClassifier.js";
import { GatewayTextGenerationService, type TextGenerationService } from "./textGenerationService.js";

export type AgentRuntimeConfig = Pick<
  RuntimeConfig,
  "mode" | "gatewayApiKey" | "modelChain" | "maxAttemptsPerModel" | "requestTimeoutMs" | "verboseAgentLogs"
>;

export interface AgentRuntimeOptions {
  service?: TextGenerationService;
  sleep?: (ms: number) => Promise<void>;
}

export interface GenerationRequest {
  stage: string;
  agentName: string;
  systemPrompt?: string;
  userPrompt: string;
  temperature: number;
  maxOutputTokens: number;
}

export interface JsonAgentRequest<T> extends GenerationRequest {
  parse: (value: unknown, rawText: string) => T;
  /** Used instead of a network call when the runtime runs in mock mode. */
  offline: () => T;
}

export interface AgentRunTrace {
  traceId: string;
  stage: string;
  agentName: string;
  mode: AgentMode;
  model: string;
  startedAt: string;
  completedAt: string;
  durationMs: number;
  attemptCount: number;
  inputTokens: number;
  outputTokens: number;
  offline: boolean;
}

export interface GenerationResult {
  text: string;
  model: string;
  usage: TokenUsage;
  trace: AgentRunTrace;
}

export interface AgentRunResult<T> {
  data: T;
  trace: AgentRunTrace;
  rawText: string;
  usage: TokenUsage;
}

export class AgentRuntime {
  private readonly service?: TextGenerationService;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(private readonly config: AgentRuntimeConfig, options: AgentRuntimeOptions = {}) {
    this.sleep = options.sleep ?? delay;
    if (options.service) {
      this.service = options.service;
    } else if (config.mode === "live" && config.gatewayApiKey) {
      this.service = new GatewayTextGenerationService(config.gatewayApiKey, config.requestTimeoutMs);
    }
  }

  get mode(): AgentMode {
    return this.config.mode;
  }

  /**
   * Walks the model chain until one model answers. Overload and rate-limit
   * errors back off exponentially on the same model, up to `maxAttemptsPerModel`
   * tries; a missing model is skipped at once; any other error is retried once,
   * whatever the attempt limit, and then rethrown.
   */
  async generate(request: GenerationRequest): Promise<GenerationResult> {
    const service = this.service;
    if (!service) {
      throw new Error("No text generation service is configured. Set AI_GATEWAY_API_KEY or use mock mode.");
    }

    const startedAt = new Date().toISOString();
    const startedAtMs = Date.now();
    const maxAttempts = Math.max(1, this.config.maxAttemptsPerModel);
    const exhausted: ModelAttemptSummary[] = [];
    let attemptCount = 0;

    for (const model of this.config.modelChain) {
      let otherFailures = 0;
      let attemptsOnModel = 0;
      let outcome: ModelAttemptSummary["outcome"] = "transient";
      let lastError = "";

      for (let attempt = 0; ; attempt += 1) {
        attemptCount += 1;
        attemptsOnModel = attempt + 1;

        try {
          const response = await service.complete({
            model,
            system: request.systemPrompt,
            prompt: request.userPrompt,
            temperature: request.temperature,
            maxOutputTokens: request.maxOutputTokens
          });

          const usage: TokenUsage = {
            input: response.usage.inputTokens,
            output: response.usage.outputTokens,
            total: response.usage.inputTokens + response.usage.outputTokens
          };
          const trace = this.buildTrace({
            request,
            mode: "live",
            model,
            startedAt,
            startedAtMs,
            attemptCount,
            usage,
            offline: false
          });
          this.logTrace(trace);

          return { text: response.text.trim(), model, usage, trace };
        } catch (error) {
          lastError = describeFailure(error);
          const failure = classifyGenerationFailure(error);

          if (failure === "unavailable") {
            outcome = "unavailable";
            this.log(request, `Model ${model} not available, trying next model...`);
            break;
          }

          if (failure === "transient") {
            outcome = "transient";
            if (attempt < maxAttempts - 1) {
              const waitMs = backoffDelayMs(attempt);
              this.log(
                request,
                `Model ${model} busy, retrying in ${waitMs / 1000}s... (attempt ${attempt + 1}/${maxAttempts})`
              );
              await this.sleep(waitMs);
              continue;
            }
            this.log(request, `Model ${model} failed after ${maxAttempts} attempts, trying next model...`);
            break;
          }

          otherFailures += 1;
          if (otherFailures > 1) {
            throw error;
          }
          this.log(request, `Model ${model} failed (${lastError}), retrying once...`);
          await this.sleep(OTHER_FAILURE_RETRY_DELAY_MS);
        }
      }

      exhausted.push({ model, attempts: attemptsOnModel, outcome, lastError });
    }

    throw new GenerationExhaustedError(exhausted);
  }

  async runJson<T>(request: JsonAgentRequest<T>): Promise<AgentRunResult<T>> {
    if (this.config.mode === "mock") {
      const startedAt = new Date().toISOString();
      const trace = this.buildTrace({
        request,
        mode: "mock",
        model: "mock-runtime",
        startedAt,
        startedAtMs: Date.now(),
        attemptCount: 1,
        usage: { input: 0, output: 0, total: 0 },
        offline: true
      });
      this.logTrace(trace);

      return {
        data: request.offline(),
        trace,
        rawText: "",
        usage: { input: 0, output: 0, total: 0 }
      };
    }

    const result = await this.generate(request);
    let parsed: unknown;
    try {
      parsed = parseJsonFromModelText(result.text);
    } catch (error) {
      throw new MalformedResponseError(
        request.stage,
        `Failed to parse model response as JSON: ${describeFailure(error)}`,
        result.text,
        { cause: error }
      );
    }

    try {
      return {
        data: request.parse(parsed, result.text),
        trace: result.trace,
        rawText: result.text,
        usage: result.usage
      };
    } catch (error) {
      if (error instanceof QuizPipelineError) {
        throw error;
      }
      throw new MalformedResponseError(request.stage, describeFailure(error), result.text, { cause: error });
    }
  }

  private buildTrace(input: {
    request: GenerationRequest;
    mode: AgentMode;
    model: string;
    startedAt: string;
    startedAtMs: number;
    attemptCount: number;
    usage: TokenUsage;
    offline: boolean;
  }): AgentRunTrace {
    return {
      traceId: createId("trace", `${input.request.stage}-${input.request.agentName}-${Date.now()}`),
      stage: input.request.stage,
      agentName: input.request.agentName,
      mode: input.mode,
      model: input.model,
      startedAt: input.startedAt,
      completedAt: new Date().toISOString(),
      durationMs: Date.now() - input.startedAtMs,
      attemptCount: input.attemptCount,
      inputTokens: input.usage.input,
      outputTokens: input.usage.output,
      offline: input.offline
    };
  }

  private logTrace(trace: AgentRunTrace): void {
    if (!this.config.verboseAgentLogs) {
      return;
    }
    const source = trace.offline ? "offline" : trace.model;
    console.log(
      `[agent:${trace.stage}] ${trace.agentName} ${trace.mode}/${source} in ${trace.durationMs}ms (${trace.inputTokens}/${trace.outputTokens} tokens, ${trace.attemptCount} attempt(s))`
    );
  }

  private log(request: GenerationRequest, message: string): void {
    console.warn(`[agent:${request.stage}] ${message}`);
  }
}

function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
