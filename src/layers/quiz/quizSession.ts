import { InvalidInputError } from "../../domain/errors.js";
import type { GradedAnswer, Question, QuizSummary } from "../../domain/models.js";
import { defaultRandom, type RandomSource } from "../../utils/random.js";
import { DEFAULT_WEAK_TOPIC_THRESHOLD, summarizeQuiz } from "../assessment/performanceAggregator.js";
import { gradeAnswer } from "./answerGrader.js";
import { selectQuizQuestions } from "./sessionSampler.js";

export interface QuizSessionOptions {
  random?: RandomSource;
  weakTopicThreshold?: number;
}

/**
 * One quiz attempt. The question list is fixed when the session starts; answers
 * are append-only and one per question.
 */
export class QuizSession {
  private readonly answers: GradedAnswer[] = [];
  private index = 0;
  private points = 0;

  private constructor(
    readonly videoId: string,
    readonly questions: readonly Question[],
    private readonly weakTopicThreshold: number
  ) {}

  static start(
    videoId: string,
    pool: readonly Question[],
    count: number,
    topics?: Iterable<string>,
    options: QuizSessionOptions = {}
  ): QuizSession {
    const questions = selectQuizQuestions(pool, count, topics, options.random ?? defaultRandom);
    if (questions.length === 0) {
      throw new InvalidInputError(`No questions are available for video ${videoId}.`);
    }
    return new QuizSession(videoId, questions, options.weakTopicThreshold ?? DEFAULT_WEAK_TOPIC_THRESHOLD);
  }

  get currentIndex(): number {
    return this.index;
  }

  get score(): number {
    return this.points;
  }

  get current(): Question | null {
    return this.questions[this.index] ?? null;
  }

  get gradedAnswers(): readonly GradedAnswer[] {
    return this.answers;
  }

  get awaitingAnswer(): boolean {
    return this.current !== null && this.answers.length === this.index;
  }

  get isComplete(): boolean {
    return this.answers.length === this.questions.length;
  }

  submit(answerIndex: number): GradedAnswer {
    const question = this.current;
    if (!question) {
      throw new InvalidInputError("The quiz is already complete.");
    }
    if (!this.awaitingAnswer) {
      throw new InvalidInputError(`Question ${this.index + 1} has already been answered.`);
    }

    const graded = gradeAnswer(question, answerIndex);
    this.answers.push(graded);
    if (graded.isCorrect) {
      this.points += 1;
    }
    return graded;
  }

  /** Moves to the next question; returns false once the last one is answered. */
  advance(): boolean {
    if (this.awaitingAnswer) {
      throw new InvalidInputError(`Answer question ${this.index + 1} before moving on.`);
    }
    if (this.index >= this.questions.length - 1) {
      return false;
    }
    this.index += 1;
    return true;
  }

  summary(): QuizSummary {
    return summarizeQuiz(this.answers, this.weakTopicThreshold);
  }

  /** A fresh attempt over a new sample from the same pool. */
  playAgain(pool: readonly Question[], count: number, topics?: Iterable<string>, random?: RandomSource): QuizSession {
    return QuizSession.start(this.videoId, pool, count, topics, {
      random,
      weakTopicThreshold: this.weakTopicThreshold
    });
  }
}
