import { mkdir, writeFile } from "node:fs/promises";
import path from "node:path";

import type { GradedAnswer, QuizSummary } from "../../domain/models.js";
import { toQuestionRecord } from "../../domain/wireFormat.js";
import { assertVideoId } from "./sessionCache.js";

export function formatArchiveStamp(date: Date): string {
  const pad = (value: number): string => String(value).padStart(2, "0");
  return (
    `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}` +
    `_${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`
  );
}

export class QuizResultArchive {
  constructor(
    private readonly resultsDirectory: string,
    private readonly now: () => Date = () => new Date()
  ) {}

  async save(videoId: string, summary: QuizSummary, answers: readonly GradedAnswer[]): Promise<string> {
    const timestamp = this.now();
    const filePath = path.join(this.resultsDirectory, `${assertVideoId(videoId)}_${formatArchiveStamp(timestamp)}.json`);

    const record = {
      video_id: videoId,
      timestamp: timestamp.toISOString(),
      score: {
        correct: summary.correct,
        total: summary.total,
        percentage: summary.percentage,
        points: summary.points
      },
      topic_performance: Object.fromEntries(summary.topicPerformance),
      weak_topics: summary.weakTopics,
      results: answers.map((answer) => ({
        question: toQuestionRecord(answer.question),
        user_answer: answer.userAnswer,
        is_correct: answer.isCorrect,
        correct_option: answer.correctOption,
        user_option: answer.userOption,
        explanation: answer.explanation
      }))
    };

    await mkdir(this.resultsDirectory, { recursive: true });
    await writeFile(filePath, JSON.stringify(record, null, 2), "utf8");
    return filePath;
  }
}
