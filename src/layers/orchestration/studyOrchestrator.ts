import type { AgentRunTrace } from "../../agents/runtime/agentRuntime.js";
import { sumUsage } from "../../agents/runtime/stageResult.js";
import { EmptyQuestionBankError, InvalidVideoIdError, MalformedResponseError } from "../../domain/errors.js";
import type { PreparedStudySet } from "../../domain/models.js";
import { createId } from "../../utils/text.js";
import type { NotesSynthesisAgent } from "../notes/notesSynthesisAgent.js";
import type { QuestionBankBuilder } from "../questions/questionBankBuilder.js";
import { assertVideoId, type SessionCache } from "../storage/sessionCache.js";
import { extractVideoId, getVideoMetadata, type TranscriptProvider } from "../transcript/transcriptProvider.js";
import { PipelineArtifactStore } from "./pipelineArtifactStore.js";

export interface StudyOrchestratorDependencies {
  transcriptProvider: TranscriptProvider;
  notesAgent: NotesSynthesisAgent;
  questionBuilder: QuestionBankBuilder;
  cache: SessionCache;
  outputDirectory: string;
  questionCount: number;
}

export class StudyOrchestrator {
  constructor(private readonly dependencies: StudyOrchestratorDependencies) {}

  /**
   * Resolves a URL or id to notes and a question pool. A cached video skips the
   * transcript fetch and both generation stages.
   */
  async prepare(input: string): Promise<PreparedStudySet> {
    const videoId = extractVideoId(input);
    if (!videoId) {
      throw new InvalidVideoIdError(input);
    }
    assertVideoId(videoId);

    const { cache } = this.dependencies;
    const cached = await cache.load(videoId);
    if (cached) {
      this.log(`Loaded ${cached.questions.length} cached question(s) for ${videoId}`);
      return {
        videoId,
        metadata: getVideoMetadata(videoId),
        transcript: cached.transcript,
        notes: cached.notes,
        questions: cached.questions,
        fromCache: true,
        cachePath: cache.filePathFor(videoId)
      };
    }

    const runId = createId("run", `${videoId}-${Date.now()}`);
    const artifactStore = new PipelineArtifactStore(this.dependencies.outputDirectory, runId);
    const traces: AgentRunTrace[] = [];

    this.log(`[${runId}] Fetching transcript for ${videoId}`);
    const transcriptResult = await this.dependencies.transcriptProvider.fetch(videoId);
    await artifactStore.persistStageArtifact("transcript", transcriptResult);

    this.log(`[${runId}] Generating structured notes`);
    const notesResult = await this.captureMalformed(artifactStore, "notes", () =>
      this.dependencies.notesAgent.synthesize(transcriptResult.transcript, videoId)
    );
    traces.push(...notesResult.traces);
    await artifactStore.persistStageArtifact("notes", notesResult.artifact);
    await artifactStore.persistRawResponses("notes", notesResult.rawResponses);

    this.log(`[${runId}] Creating quiz questions`);
    const bankResult = await this.dependencies.questionBuilder.build(
      notesResult.artifact,
      { totalQuestions: this.dependencies.questionCount },
      videoId
    );
    traces.push(...bankResult.traces);
    await artifactStore.persistStageArtifact("questions", bankResult.artifact);
    await artifactStore.persistRawResponses("questions", bankResult.rawResponses);
    await artifactStore.persistTraces(traces);

    const bank = bankResult.artifact;
    if (bank.questions.length === 0) {
      throw new EmptyQuestionBankError(
        videoId,
        bank.tiers.flatMap((tier) => (tier.error ? [`${tier.difficulty}: ${tier.error}`] : []))
      );
    }

    const cachePath = await cache.save(videoId, transcriptResult.transcript, notesResult.artifact, bank.questions);
    const usage = sumUsage([notesResult.usage, bankResult.usage]);
    await artifactStore.persistRunSummary({
      runId,
      videoId,
      cachePath,
      requestedQuestions: bank.requested,
      totalGenerated: bank.totalGenerated,
      tiers: bank.tiers,
      tokenUsage: usage,
      traceCount: traces.length,
      completedAt: new Date().toISOString()
    });

    this.log(
      `[${runId}] Ready: ${bank.totalGenerated}/${bank.requested} question(s), ${usage.total} token(s) -> ${cachePath}`
    );

    return {
      videoId,
      metadata: getVideoMetadata(videoId),
      transcript: transcriptResult.transcript,
      notes: notesResult.artifact,
      questions: bank.questions,
      fromCache: false,
      cachePath,
      runDirectory: artifactStore.directoryPath
    };
  }

  private async captureMalformed<T>(
    artifactStore: PipelineArtifactStore,
    stage: string,
    task: () => Promise<T>
  ): Promise<T> {
    try {
      return await task();
    } catch (error) {
      if (error instanceof MalformedResponseError) {
        const rawPath = await artifactStore.persistRawResponses(stage, [
          { stage, agentName: `${stage}-agent`, text: error.rawText }
        ]);
        this.log(`Raw ${stage} response saved to ${rawPath ?? artifactStore.directoryPath}`);
      }
      throw error;
    }
  }

  private log(message: string): void {
    console.log(`[orchestrator] ${message}`);
  }
}
