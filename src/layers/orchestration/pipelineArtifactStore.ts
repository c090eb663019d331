import { mkdir, writeFile } from "node:fs/promises";
import path from "node:path";

import type { AgentRunTrace } from "../../agents/runtime/agentRuntime.js";
import type { StageRawResponse } from "../../agents/runtime/stageResult.js";

/**
 * Writes the intermediate output of one generation run (stage artifacts, raw
 * model text, traces) under `<outputDirectory>/runs/<runId>` for later
 * inspection.
 */
export class PipelineArtifactStore {
  private readonly runDirectory: string;

  constructor(outputDirectory: string, readonly runId: string) {
    this.runDirectory = path.join(outputDirectory, "runs", runId);
  }

  get directoryPath(): string {
    return this.runDirectory;
  }

  persistStageArtifact(stage: string, artifact: unknown): Promise<string> {
    return this.writeJson(`${stage}.artifact.json`, artifact);
  }

  async persistRawResponses(stage: string, rawResponses: StageRawResponse[]): Promise<string | null> {
    if (rawResponses.length === 0) {
      return null;
    }
    return this.writeJson(`${stage}.raw-responses.json`, rawResponses);
  }

  persistTraces(traces: AgentRunTrace[]): Promise<string> {
    return this.writeJson("agent-traces.json", traces);
  }

  persistRunSummary(summary: unknown): Promise<string> {
    return this.writeJson("run-summary.json", summary);
  }

  private async writeJson(fileName: string, value: unknown): Promise<string> {
    await mkdir(this.runDirectory, { recursive: true });
    const filePath = path.join(this.runDirectory, fileName);
    await writeFile(filePath, JSON.stringify(value, null, 2), "utf8");
    return filePath;
  }
}
