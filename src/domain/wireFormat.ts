import { InvariantViolationError } from "./errors.js";
import {
  DIFFICULTIES,
  OPTIONS_PER_QUESTION,
  type Difficulty,
  type Notes,
  type NotesTopic,
  type Question
} from "./models.js";
import { asObjectArray, asString, asStringArray, isObject } from "../utils/json.js";

/**
 * JSON shapes exchanged with the generation service and written to the cache.
 * Field names follow the snake_case wire format; in-process types are camelCase.
 */
export interface NotesRecord {
  summary: string;
  key_concepts: string[];
  topics: Array<{ name: string; description: string; keywords: string[] }>;
  detailed_notes: string;
}

export interface QuestionRecord {
  question: string;
  options: string[];
  correct_answer: number;
  explanation: string;
  topic: string;
  difficulty: Difficulty;
}

export const REQUIRED_NOTES_FIELDS = ["summary", "key_concepts", "topics", "detailed_notes"] as const;

export type NotesParseResult = { ok: true; notes: Notes } | { ok: false; missingFields: string[] };

export function parseNotesRecord(value: unknown): NotesParseResult {
  if (!isObject(value)) {
    return { ok: false, missingFields: [...REQUIRED_NOTES_FIELDS] };
  }

  const summary = asString(value.summary);
  const keyConcepts = asStringArray(value.key_concepts);
  const topics = asObjectArray(value.topics)
    .map(parseTopic)
    .filter((topic): topic is NotesTopic => topic !== null);
  const detailedNotes = asString(value.detailed_notes);

  const missingFields: string[] = [];
  if (!summary) {
    missingFields.push("summary");
  }
  if (keyConcepts.length === 0) {
    missingFields.push("key_concepts");
  }
  if (topics.length === 0) {
    missingFields.push("topics");
  }
  if (!detailedNotes) {
    missingFields.push("detailed_notes");
  }

  if (missingFields.length > 0) {
    return { ok: false, missingFields };
  }

  return { ok: true, notes: { summary, keyConcepts, topics, detailedNotes } };
}

function parseTopic(value: Record<string, unknown>): NotesTopic | null {
  const name = asString(value.name);
  if (!name) {
    return null;
  }

  return {
    name,
    description: asString(value.description),
    keywords: [...new Set(asStringArray(value.keywords))]
  };
}

/**
 * Validates one generated question. Throws InvariantViolationError when the
 * question cannot be asked as-is: not exactly four options or an answer index
 * outside them.
 */
export function parseQuestionRecord(value: unknown, fallbackDifficulty?: Difficulty): Question {
  if (!isObject(value)) {
    throw new InvariantViolationError("Question must be a JSON object.");
  }

  const question = asString(value.question);
  if (!question) {
    throw new InvariantViolationError("Question text is missing.");
  }

  const rawOptions = value.options;
  if (!Array.isArray(rawOptions) || rawOptions.length !== OPTIONS_PER_QUESTION) {
    throw new InvariantViolationError(`Question must have exactly ${OPTIONS_PER_QUESTION} options: "${question}"`);
  }

  const options = rawOptions.map((option) => asString(option));
  if (options.some((option) => option.length === 0)) {
    throw new InvariantViolationError(`Question options must be non-empty text: "${question}"`);
  }

  const correctAnswer = value.correct_answer;
  if (
    typeof correctAnswer !== "number" ||
    !Number.isInteger(correctAnswer) ||
    correctAnswer < 0 ||
    correctAnswer >= options.length
  ) {
    throw new InvariantViolationError(`correct_answer must be an index between 0 and ${options.length - 1}: "${question}"`);
  }

  const difficulty = coerceDifficulty(value.difficulty) ?? fallbackDifficulty;
  if (!difficulty) {
    throw new InvariantViolationError(`Question difficulty must be one of ${DIFFICULTIES.join(", ")}: "${question}"`);
  }

  return {
    question,
    options,
    correctAnswer,
    explanation: asString(value.explanation),
    topic: asString(value.topic),
    difficulty
  };
}

function coerceDifficulty(value: unknown): Difficulty | null {
  const normalized = asString(value).toLowerCase();
  return DIFFICULTIES.find((difficulty) => difficulty === normalized) ?? null;
}

export function toNotesRecord(notes: Notes): NotesRecord {
  return {
    summary: notes.summary,
    key_concepts: [...notes.keyConcepts],
    topics: notes.topics.map((topic) => ({
      name: topic.name,
      description: topic.description,
      keywords: [...topic.keywords]
    })),
    detailed_notes: notes.detailedNotes
  };
}

export function toQuestionRecord(question: Question): QuestionRecord {
  return {
    question: question.question,
    options: [...question.options],
    correct_answer: question.correctAnswer,
    explanation: question.explanation,
    topic: question.topic,
    difficulty: question.difficulty
  };
}
