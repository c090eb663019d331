import { AgentRuntime, type AgentRuntimeConfig } from "../agents/runtime/agentRuntime.js";
import type {
  TextGenerationRequest,
  TextGenerationResponse,
  TextGenerationService
} from "../agents/runtime/textGenerationService.js";

export type ScriptedReply = string | Error;
export type Responder = (request: TextGenerationRequest) => ScriptedReply;

/** Replays scripted replies in order, or answers through a responder. */
export class FakeTextGenerationService implements TextGenerationService {
  readonly requests: TextGenerationRequest[] = [];
  private readonly queue: ScriptedReply[];

  constructor(private readonly script: ScriptedReply[] | Responder) {
    this.queue = Array.isArray(script) ? [...script] : [];
  }

  async complete(request: TextGenerationRequest): Promise<TextGenerationResponse> {
    this.requests.push(request);
    const reply = Array.isArray(this.script) ? this.queue.shift() : this.script(request);
    if (reply === undefined) {
      throw new Error("No scripted reply left.");
    }
    if (reply instanceof Error) {
      throw reply;
    }
    return { text: reply, usage: { inputTokens: 10, outputTokens: 5 } };
  }

  get models(): string[] {
    return this.requests.map((request) => request.model);
  }
}

export function statusError(message: string, statusCode: number): Error {
  return Object.assign(new Error(message), { statusCode });
}

export interface TestRuntime {
  runtime: AgentRuntime;
  service: FakeTextGenerationService;
  sleeps: number[];
}

export function createTestRuntime(
  script: ScriptedReply[] | Responder,
  overrides: Partial<AgentRuntimeConfig> = {}
): TestRuntime {
  const service = new FakeTextGenerationService(script);
  const sleeps: number[] = [];
  const runtime = new AgentRuntime(
    {
      mode: "live",
      modelChain: ["model-a", "model-b"],
      maxAttemptsPerModel: 3,
      requestTimeoutMs: 1000,
      verboseAgentLogs: false,
      ...overrides
    },
    {
      service,
      sleep: async (ms) => {
        sleeps.push(ms);
      }
    }
  );

  return { runtime, service, sleeps };
}
