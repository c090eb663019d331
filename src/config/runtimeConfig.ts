export type AgentMode = "live" | "mock";

export type TranscriptSource = "youtube" | "local";

export interface RuntimeConfig {
  mode: AgentMode;
  gatewayApiKey?: string;
  modelChain: string[];
  maxAttemptsPerModel: number;
  requestTimeoutMs: number;
  questionCount: number;
  weakTopicThreshold: number;
  dataDirectory: string;
  transcriptSource: TranscriptSource;
  transcriptDirectory: string;
  transcriptLanguage: string;
  randomSeed?: number;
  verboseAgentLogs: boolean;
}

export const DEFAULT_MODEL_CHAIN = ["google/gemini-2.5-flash-lite", "google/gemini-2.0-flash"];

export function loadRuntimeConfig(env: NodeJS.ProcessEnv = process.env): RuntimeConfig {
  const reader = new EnvReader(env);
  const gatewayApiKey = env.AI_GATEWAY_API_KEY?.trim() || undefined;
  const mode = resolveMode(reader, gatewayApiKey);

  if (mode === "live" && !gatewayApiKey) {
    throw new Error(
      "AI_GATEWAY_API_KEY is required for live agent mode. Set QUIZ_AGENT_MODE=mock to run without API calls."
    );
  }

  return {
    mode,
    gatewayApiKey,
    modelChain: reader.list("QUIZ_MODEL_CHAIN", DEFAULT_MODEL_CHAIN),
    maxAttemptsPerModel: reader.integer("QUIZ_MAX_ATTEMPTS_PER_MODEL", 3, 1),
    requestTimeoutMs: reader.integer("QUIZ_REQUEST_TIMEOUT_MS", 90000, 1000),
    questionCount: reader.integer("QUIZ_QUESTION_COUNT", 50, 3),
    weakTopicThreshold: reader.number("QUIZ_WEAK_TOPIC_THRESHOLD", 60, 0),
    dataDirectory: reader.string("QUIZ_DATA_DIR", "data"),
    transcriptSource: resolveTranscriptSource(reader),
    transcriptDirectory: reader.string("QUIZ_TRANSCRIPT_DIR", "transcripts"),
    transcriptLanguage: reader.string("QUIZ_TRANSCRIPT_LANGUAGE", "en"),
    randomSeed: reader.optionalInteger("QUIZ_RANDOM_SEED"),
    verboseAgentLogs: reader.boolean("QUIZ_VERBOSE_AGENT_LOGS", true)
  };
}

function resolveMode(reader: EnvReader, apiKey: string | undefined): AgentMode {
  const raw = reader.string("QUIZ_AGENT_MODE", "auto").toLowerCase();

  if (raw === "live") {
    return "live";
  }
  if (raw === "mock") {
    return "mock";
  }
  if (raw !== "auto") {
    throw new Error(`QUIZ_AGENT_MODE must be one of live, mock or auto. Received: ${raw}`);
  }

  return apiKey ? "live" : "mock";
}

function resolveTranscriptSource(reader: EnvReader): TranscriptSource {
  const raw = reader.string("QUIZ_TRANSCRIPT_SOURCE", "youtube").toLowerCase();
  if (raw === "youtube" || raw === "local") {
    return raw;
  }
  throw new Error(`QUIZ_TRANSCRIPT_SOURCE must be youtube or local. Received: ${raw}`);
}

class EnvReader {
  constructor(private readonly env: NodeJS.ProcessEnv) {}

  string(name: string, fallback: string): string {
    const value = this.env[name]?.trim();
    return value && value.length > 0 ? value : fallback;
  }

  list(name: string, fallback: string[]): string[] {
    const raw = this.env[name]?.trim();
    if (!raw) {
      return [...fallback];
    }

    const items = raw
      .split(",")
      .map((item) => item.trim())
      .filter((item) => item.length > 0);

    if (items.length === 0) {
      throw new Error(`${name} must list at least one value. Received: ${raw}`);
    }
    return items;
  }

  number(name: string, fallback: number, min: number): number {
    const raw = this.env[name]?.trim();
    if (!raw) {
      return fallback;
    }

    const parsed = Number(raw);
    if (!Number.isFinite(parsed) || parsed < min) {
      throw new Error(`${name} must be a number greater than or equal to ${min}. Received: ${raw}`);
    }

    return parsed;
  }

  integer(name: string, fallback: number, min: number): number {
    const parsed = this.number(name, fallback, min);
    if (!Number.isInteger(parsed)) {
      throw new Error(`${name} must be an integer. Received: ${parsed}`);
    }
    return parsed;
  }

  optionalInteger(name: string): number | undefined {
    const raw = this.env[name]?.trim();
    if (!raw) {
      return undefined;
    }

    const parsed = Number(raw);
    if (!Number.isInteger(parsed)) {
      throw new Error(`${name} must be an integer. Received: ${raw}`);
    }
    return parsed;
  }

  boolean(name: string, fallback: boolean): boolean {
    const raw = this.env[name]?.trim().toLowerCase();
    if (!raw) {
      return fallback;
    }

    if (["1", "true", "yes", "on"].includes(raw)) {
      return true;
    }
    if (["0", "false", "no", "off"].includes(raw)) {
      return false;
    }

    throw new Error(`${name} must be a boolean (true/false). Received: ${raw}`);
  }
}
