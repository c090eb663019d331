export type Difficulty = "easy" | "medium" | "hard";

export const DIFFICULTIES: readonly Difficulty[] = ["easy", "medium", "hard"];

export const OPTIONS_PER_QUESTION = 4;

export const UNCATEGORIZED_TOPIC = "Uncategorized";

export interface NotesTopic {
  name: string;
  description: string;
  keywords: string[];
}

export interface Notes {
  summary: string;
  keyConcepts: string[];
  topics: NotesTopic[];
  detailedNotes: string;
}

export interface Question {
  question: string;
  options: string[];
  correctAnswer: number;
  explanation: string;
  topic: string;
  difficulty: Difficulty;
}

export type DifficultyMix = Record<Difficulty, number>;

export interface TokenUsage {
  input: number;
  output: number;
  total: number;
}

export interface GradedAnswer {
  question: Question;
  userAnswer: number;
  isCorrect: boolean;
  correctOption: string;
  userOption: string | null;
  explanation: string;
}

export type TopicStatus = "Strong" | "Needs Review" | "Weak";

export interface TopicStat {
  correct: number;
  total: number;
  percentage: number;
  status: TopicStatus;
}

export type TopicPerformance = Map<string, TopicStat>;

export interface WeakTopic {
  topic: string;
  score: string;
  percentage: number;
  status: TopicStatus;
}

export type QuizVerdict = "excellent" | "good" | "keep-studying";

export interface QuizSummary {
  correct: number;
  total: number;
  percentage: number;
  points: number;
  verdict: QuizVerdict;
  topicPerformance: TopicPerformance;
  weakTopics: WeakTopic[];
}

export type QuizModeName = "quick" | "standard" | "challenge";

export interface QuizMode {
  name: QuizModeName;
  label: string;
  questionCount: number;
}

export const QUIZ_MODES: Record<QuizModeName, QuizMode> = {
  quick: { name: "quick", label: "Quick Play", questionCount: 5 },
  standard: { name: "standard", label: "Standard", questionCount: 15 },
  challenge: { name: "challenge", label: "Challenge", questionCount: 30 }
};

export interface CachedSession {
  videoId: string;
  timestamp: string;
  transcript: string;
  notes: Notes;
  questions: Question[];
}

export interface VideoMetadata {
  videoId: string;
  url: string;
  thumbnail: string;
  embedUrl: string;
}

export interface TranscriptResult {
  videoId: string;
  transcript: string;
  language: string;
  durationSeconds: number;
}

export interface PreparedStudySet {
  videoId: string;
  metadata: VideoMetadata;
  transcript: string;
  notes: Notes;
  questions: Question[];
  fromCache: boolean;
  cachePath: string;
  runDirectory?: string;
}
