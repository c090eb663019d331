import type { AgentRunTrace, AgentRuntime } from "../../agents/runtime/agentRuntime.js";
import { sumUsage, type AgentStageResult, type StageRawResponse } from "../../agents/runtime/stageResult.js";
import { InvariantViolationError, MalformedResponseError, describeError } from "../../domain/errors.js";
import {
  DIFFICULTIES,
  OPTIONS_PER_QUESTION,
  UNCATEGORIZED_TOPIC,
  type Difficulty,
  type DifficultyMix,
  type Notes,
  type Question,
  type TokenUsage
} from "../../domain/models.js";
import { parseQuestionRecord } from "../../domain/wireFormat.js";
import { isObject } from "../../utils/json.js";
import { defaultRandom, shuffle, type RandomSource } from "../../utils/random.js";
import { truncate } from "../../utils/text.js";

export const DEFAULT_QUESTION_COUNT = 50;
export const DETAILED_NOTES_PROMPT_LIMIT = 2000;

const QUESTION_TEMPERATURE = 0.7;
const QUESTION_MAX_OUTPUT_TOKENS = 3000;

const DIFFICULTY_INSTRUCTIONS: Record<Difficulty, string> = {
  easy: "Focus on basic definitions, facts, and direct recall from the lecture.",
  medium: "Focus on understanding concepts and their relationships.",
  hard: "Focus on application, analysis, and critical thinking."
};

const QUESTION_SYSTEM_PROMPT = [
  "You are an expert quiz creator.",
  "Write multiple-choice questions grounded only in the supplied lecture notes.",
  "Return ONLY a valid JSON array, no other text."
].join("\n");

export interface QuestionBankOptions {
  totalQuestions?: number;
  difficultyMix?: Partial<DifficultyMix>;
}

export interface TierReport {
  difficulty: Difficulty;
  requested: number;
  generated: number;
  dropped: number;
  error?: string;
}

export interface QuestionBank {
  questions: Question[];
  requested: number;
  totalGenerated: number;
  tiers: TierReport[];
}

interface TierPayload {
  questions: Question[];
  dropped: number;
}

/**
 * Easy and medium get a third each (rounded down); hard takes the remainder so
 * the three always add up to `total`.
 */
export function splitDifficulty(total: number): DifficultyMix {
  const whole = Math.max(0, Math.floor(total));
  const third = Math.floor(whole / 3);
  return { easy: third, medium: third, hard: whole - 2 * third };
}

export function resolveTopic(topic: string, notes: Notes): string {
  const normalized = topic.trim().toLowerCase();
  const match = notes.topics.find((candidate) => candidate.name.trim().toLowerCase() === normalized);
  return match ? match.name : UNCATEGORIZED_TOPIC;
}

export class QuestionBankBuilder {
  constructor(
    private readonly runtime: AgentRuntime,
    private readonly random: RandomSource = defaultRandom,
    private readonly defaultTotal = DEFAULT_QUESTION_COUNT
  ) {}

  async build(
    notes: Notes,
    options: QuestionBankOptions = {},
    videoId = "notes"
  ): Promise<AgentStageResult<QuestionBank>> {
    const mix = this.resolveMix(options);
    const traces: AgentRunTrace[] = [];
    const rawResponses: StageRawResponse[] = [];
    const usages: TokenUsage[] = [];
    const tiers: TierReport[] = [];
    const collected: Question[] = [];

    for (const difficulty of DIFFICULTIES) {
      const count = mix[difficulty];
      if (count <= 0) {
        continue;
      }

      const agentName = `question-agent-${videoId}-${difficulty}`;
      try {
        const run = await this.runtime.runJson<TierPayload>({
          stage: "questions",
          agentName,
          systemPrompt: QUESTION_SYSTEM_PROMPT,
          userPrompt: buildQuestionPrompt(notes, difficulty, count),
          temperature: QUESTION_TEMPERATURE,
          maxOutputTokens: QUESTION_MAX_OUTPUT_TOKENS,
          parse: (value) => this.parseTier(value, notes, difficulty, count),
          offline: () => ({ questions: buildOfflineQuestions(notes, difficulty, count), dropped: 0 })
        });

        traces.push(run.trace);
        usages.push(run.usage);
        if (run.rawText) {
          rawResponses.push({ stage: "questions", agentName, text: run.rawText });
        }

        collected.push(...run.data.questions);
        tiers.push({
          difficulty,
          requested: count,
          generated: run.data.questions.length,
          dropped: run.data.dropped
        });
        if (run.data.dropped > 0) {
          console.warn(`[question-bank] Dropped ${run.data.dropped} invalid ${difficulty} question(s).`);
        }
      } catch (error) {
        if (error instanceof MalformedResponseError) {
          rawResponses.push({ stage: "questions", agentName, text: error.rawText });
        }
        const message = describeError(error);
        console.warn(`[question-bank] Error generating ${difficulty} questions: ${message}`);
        tiers.push({ difficulty, requested: count, generated: 0, dropped: 0, error: message });
      }
    }

    const questions = shuffle(collected, this.random);
    const requested = DIFFICULTIES.reduce((total, difficulty) => total + mix[difficulty], 0);
    console.log(`[question-bank] Generated ${questions.length}/${requested} question(s).`);

    return {
      artifact: { questions, requested, totalGenerated: questions.length, tiers },
      traces,
      rawResponses,
      usage: sumUsage(usages)
    };
  }

  private resolveMix(options: QuestionBankOptions): DifficultyMix {
    if (!options.difficultyMix) {
      return splitDifficulty(options.totalQuestions ?? this.defaultTotal);
    }

    const explicit = options.difficultyMix;
    return {
      easy: sanitizeCount(explicit.easy),
      medium: sanitizeCount(explicit.medium),
      hard: sanitizeCount(explicit.hard)
    };
  }

  private parseTier(value: unknown, notes: Notes, difficulty: Difficulty, count: number): TierPayload {
    const items = unwrapQuestionList(value);
    const questions: Question[] = [];
    let dropped = 0;

    for (const item of items) {
      try {
        const question = parseQuestionRecord(item, difficulty);
        questions.push({ ...question, topic: resolveTopic(question.topic, notes) });
      } catch (error) {
        if (!(error instanceof InvariantViolationError)) {
          throw error;
        }
        dropped += 1;
      }
    }

    return { questions: questions.slice(0, count), dropped };
  }
}

function unwrapQuestionList(value: unknown): unknown[] {
  if (Array.isArray(value)) {
    return value;
  }
  if (isObject(value) && Array.isArray(value.questions)) {
    return value.questions;
  }
  return [value];
}

function sanitizeCount(value: number | undefined): number {
  return value !== undefined && Number.isFinite(value) ? Math.max(0, Math.floor(value)) : 0;
}

export function buildQuestionPrompt(notes: Notes, difficulty: Difficulty, count: number): string {
  const topicsText = notes.topics.map((topic) => `- ${topic.name}: ${topic.description}`).join("\n");

  return `Generate ${count} multiple-choice questions based on these lecture notes.

LECTURE SUMMARY:
${notes.summary}

KEY CONCEPTS:
${notes.keyConcepts.join(", ")}

TOPICS COVERED:
${topicsText}

DETAILED CONTENT:
${truncate(notes.detailedNotes, DETAILED_NOTES_PROMPT_LIMIT)}

DIFFICULTY LEVEL: ${difficulty.toUpperCase()}
${DIFFICULTY_INSTRUCTIONS[difficulty]}

Generate ${count} questions following this EXACT JSON format:
[
    {
        "question": "What is...?",
        "options": ["Option A", "Option B", "Option C", "Option D"],
        "correct_answer": 0,
        "explanation": "The answer is A because...",
        "topic": "Topic name from the notes",
        "difficulty": "${difficulty}"
    }
]

Requirements:
1. Each question must have exactly 4 options
2. correct_answer is the index (0-3) of the correct option
3. Explanation should be clear and educational
4. Topic must match one from the notes
5. Questions should cover different topics
6. Return ONLY valid JSON array, no other text`;
}

const FILLER_OPTIONS = [
  "A topic not covered in the lecture",
  "None of the above",
  "All of the above",
  "It depends on the context"
];

/**
 * Deterministic questions for mock mode: each asks which lecture topic matches a
 * description, keyword or scenario, with the other topics as distractors.
 */
export function buildOfflineQuestions(notes: Notes, difficulty: Difficulty, count: number): Question[] {
  const questions: Question[] = [];

  for (let index = 0; index < count; index += 1) {
    const topic = notes.topics[index % notes.topics.length];
    const distractors = uniqueOptions(
      [
        ...notes.topics.filter((candidate) => candidate.name !== topic.name).map((candidate) => candidate.name),
        ...FILLER_OPTIONS
      ],
      topic.name
    ).slice(0, OPTIONS_PER_QUESTION - 1);
    const correctAnswer = index % OPTIONS_PER_QUESTION;
    const options = [...distractors];
    options.splice(correctAnswer, 0, topic.name);

    questions.push({
      question: offlinePrompt(difficulty, topic.description, topic.keywords[0] ?? topic.name),
      options,
      correctAnswer,
      explanation: `${topic.name}: ${topic.description}`,
      topic: topic.name,
      difficulty
    });
  }

  return questions;
}

function offlinePrompt(difficulty: Difficulty, description: string, keyword: string): string {
  switch (difficulty) {
    case "easy":
      return `Which topic does this describe: "${description}"?`;
    case "medium":
      return `Which topic is most closely related to "${keyword}"?`;
    case "hard":
      return `You need to apply ideas about "${keyword}" to a new problem. Which part of the lecture should you revisit?`;
  }
}

function uniqueOptions(candidates: string[], exclude: string): string[] {
  const seen = new Set([exclude.toLowerCase()]);
  const unique: string[] = [];
  for (const candidate of candidates) {
    const key = candidate.toLowerCase();
    if (!seen.has(key)) {
      seen.add(key);
      unique.push(candidate);
    }
  }
  return unique;
}
