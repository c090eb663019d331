#!/usr/bin/env node
import "dotenv/config";

import path from "node:path";
import { createInterface } from "node:readline/promises";
import { parseArgs } from "node:util";

import { AgentRuntime } from "./agents/runtime/agentRuntime.js";
import { chooseMode, formatSummary, parseModeInput, runQuiz, type ConsoleIO } from "./cli/quizConsole.js";
import { loadRuntimeConfig, type RuntimeConfig } from "./config/runtimeConfig.js";
import { describeError } from "./domain/errors.js";
import { QUIZ_MODES } from "./domain/models.js";
import { exporterFor, formatNotesAsMarkdown, writeExport } from "./layers/export/notesExporter.js";
import { NotesSynthesisAgent } from "./layers/notes/notesSynthesisAgent.js";
import { StudyOrchestrator } from "./layers/orchestration/studyOrchestrator.js";
import { QuestionBankBuilder } from "./layers/questions/questionBankBuilder.js";
import { QuizSession } from "./layers/quiz/quizSession.js";
import { QuizResultArchive } from "./layers/storage/quizResultArchive.js";
import { SessionCache } from "./layers/storage/sessionCache.js";
import {
  LocalTranscriptProvider,
  YoutubeTranscriptProvider,
  type TranscriptProvider
} from "./layers/transcript/transcriptProvider.js";
import { createSeededRandom, defaultRandom } from "./utils/random.js";

const USAGE = "Usage: lecture-quiz <youtube-url|video-id> [--mode quick|standard|challenge] [--topics a,b] [--export path]";

function createTranscriptProvider(config: RuntimeConfig): TranscriptProvider {
  return config.transcriptSource === "local"
    ? new LocalTranscriptProvider(path.resolve(process.cwd(), config.transcriptDirectory))
    : new YoutubeTranscriptProvider(config.transcriptLanguage);
}

async function main(): Promise<void> {
  const { values, positionals } = parseArgs({
    allowPositionals: true,
    options: {
      mode: { type: "string" },
      topics: { type: "string" },
      export: { type: "string" }
    }
  });

  const input = positionals[0];
  if (!input) {
    console.log(USAGE);
    process.exitCode = 1;
    return;
  }

  const config = loadRuntimeConfig();
  const random = config.randomSeed === undefined ? defaultRandom : createSeededRandom(config.randomSeed);
  const runtime = new AgentRuntime(config);
  const dataDirectory = path.resolve(process.cwd(), config.dataDirectory);

  console.log(
    `[bootstrap] Lecture quiz starting in ${config.mode} mode (${config.modelChain.join(" -> ")})`
  );

  const orchestrator = new StudyOrchestrator({
    transcriptProvider: createTranscriptProvider(config),
    notesAgent: new NotesSynthesisAgent(runtime),
    questionBuilder: new QuestionBankBuilder(runtime, random, config.questionCount),
    cache: new SessionCache(dataDirectory),
    outputDirectory: dataDirectory,
    questionCount: config.questionCount
  });

  const prepared = await orchestrator.prepare(input);
  console.log(formatNotesAsMarkdown(prepared.notes, `Lecture Notes: ${prepared.videoId}`));

  if (values.export) {
    const target = path.resolve(process.cwd(), values.export);
    const exportPath = await writeExport(
      exporterFor(target),
      prepared.notes,
      `Lecture Notes: ${prepared.videoId}`,
      target
    );
    console.log(`Notes exported to ${exportPath}`);
  }

  const topics = values.topics
    ?.split(",")
    .map((topic) => topic.trim())
    .filter((topic) => topic.length > 0);

  const readline = createInterface({ input: process.stdin, output: process.stdout });
  const io: ConsoleIO = {
    ask: (prompt) => readline.question(prompt),
    print: (line) => console.log(line)
  };
  const archive = new QuizResultArchive(path.join(dataDirectory, "results"));

  try {
    let modeName = values.mode ? parseModeInput(values.mode) : null;
    if (values.mode && !modeName) {
      io.print(`Unknown mode "${values.mode}".`);
    }

    let session: QuizSession | null = null;
    for (;;) {
      modeName = modeName ?? (await chooseMode(io));
      const count = QUIZ_MODES[modeName].questionCount;
      session = session
        ? session.playAgain(prepared.questions, count, topics, random)
        : QuizSession.start(prepared.videoId, prepared.questions, count, topics, {
            random,
            weakTopicThreshold: config.weakTopicThreshold
          });

      const summary = await runQuiz(session, io);
      for (const line of formatSummary(summary, prepared.metadata)) {
        io.print(line);
      }

      const resultPath = await archive.save(prepared.videoId, summary, session.gradedAnswers);
      io.print(`Results saved to ${resultPath}`);

      const again = await io.ask("Play again? (y/N) ");
      if (!/^y(es)?$/i.test(again.trim())) {
        break;
      }
      modeName = null;
    }
  } finally {
    readline.close();
  }
}

main().catch((error: unknown) => {
  console.error(describeError(error));
  process.exitCode = 1;
});
