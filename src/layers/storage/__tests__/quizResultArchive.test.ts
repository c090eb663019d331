import { mkdtemp, readFile, rm } from "node:fs/promises";
import os from "node:os";
import path from "node:path";

import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { answersFor } from "../../../test/fixtures.js";
import { summarizeQuiz } from "../../assessment/performanceAggregator.js";
import { QuizResultArchive, formatArchiveStamp } from "../quizResultArchive.js";

describe("formatArchiveStamp", () => {
  it("pads every field", () => {
    expect(formatArchiveStamp(new Date(2026, 0, 2, 3, 4, 5))).toBe("20260102_030405");
  });
});

describe("QuizResultArchive", () => {
  let directory: string;

  beforeEach(async () => {
    directory = await mkdtemp(path.join(os.tmpdir(), "lecture-quiz-results-"));
  });

  afterEach(async () => {
    await rm(directory, { recursive: true, force: true });
  });

  it("writes one file per attempt with score and answers", async () => {
    const answers = [...answersFor("Clustering", 1, 2), ...answersFor("Neural Networks", 0, 1)];
    const archive = new QuizResultArchive(directory, () => new Date(2026, 4, 6, 7, 8, 9));

    const filePath = await archive.save("abc", summarizeQuiz(answers), answers);
    const stored: unknown = JSON.parse(await readFile(filePath, "utf8"));

    expect(path.basename(filePath)).toBe("abc_20260506_070809.json");
    expect(stored).toMatchObject({
      video_id: "abc",
      score: { correct: 1, total: 3, points: 1 },
      topic_performance: {
        Clustering: { correct: 1, total: 2, percentage: 50, status: "Weak" },
        "Neural Networks": { correct: 0, total: 1, percentage: 0, status: "Weak" }
      },
      weak_topics: [
        { topic: "Neural Networks", score: "0/1" },
        { topic: "Clustering", score: "1/2" }
      ]
    });
  });
});
