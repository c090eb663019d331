import type { TokenUsage } from "../../domain/models.js";
import type { AgentRunTrace } from "./agentRuntime.js";

export interface StageRawResponse {
  stage: string;
  agentName: string;
  text: string;
}

export interface AgentStageResult<T> {
  artifact: T;
  traces: AgentRunTrace[];
  rawResponses: StageRawResponse[];
  usage: TokenUsage;
}

export function sumUsage(usages: TokenUsage[]): TokenUsage {
  return usages.reduce(
    (total, usage) => ({
      input: total.input + usage.input,
      output: total.output + usage.output,
      total: total.total + usage.total
    }),
    { input: 0, output: 0, total: 0 }
  );
}
