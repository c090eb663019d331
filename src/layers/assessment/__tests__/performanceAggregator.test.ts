import { describe, expect, it } from "vitest";

import { answered, answersFor } from "../../../test/fixtures.js";
import { createSeededRandom, shuffle } from "../../../utils/random.js";
import {
  calculateTopicPerformance,
  getWeakTopics,
  percentageOf,
  quizVerdict,
  summarizeQuiz,
  topicStatus
} from "../performanceAggregator.js";

describe("calculateTopicPerformance", () => {
  it("tallies each topic in order of first appearance", () => {
    const performance = calculateTopicPerformance([
      answered("Clustering", true),
      answered("Neural Networks", false),
      answered("Clustering", false)
    ]);

    expect([...performance.keys()]).toEqual(["Clustering", "Neural Networks"]);
    expect(performance.get("Clustering")).toEqual({ correct: 1, total: 2, percentage: 50, status: "Weak" });
    expect(performance.get("Neural Networks")).toEqual({ correct: 0, total: 1, percentage: 0, status: "Weak" });
  });

  it("does not depend on answer order", () => {
    const answers = [...answersFor("A", 3, 5), ...answersFor("B", 1, 4), ...answersFor("C", 2, 2)];
    const shuffled = shuffle(answers, createSeededRandom(3));

    const expected = calculateTopicPerformance(answers);
    const actual = calculateTopicPerformance(shuffled);

    for (const [topic, stat] of expected) {
      expect(actual.get(topic)).toEqual(stat);
    }
    expect(actual.size).toBe(expected.size);
  });
});

describe("topicStatus", () => {
  it("uses 80 and 60 as the boundaries", () => {
    expect(topicStatus(80)).toBe("Strong");
    expect(topicStatus(79.9)).toBe("Needs Review");
    expect(topicStatus(60)).toBe("Needs Review");
    expect(topicStatus(59.9)).toBe("Weak");
  });
});

describe("getWeakTopics", () => {
  it("lists topics below the threshold, weakest first", () => {
    const performance = calculateTopicPerformance([
      ...answersFor("A", 9, 10),
      ...answersFor("B", 2, 5),
      ...answersFor("C", 13, 20)
    ]);

    expect(getWeakTopics(performance)).toEqual([{ topic: "B", score: "2/5", percentage: 40, status: "Weak" }]);
  });

  it("keeps topics exactly at the threshold off the list", () => {
    const performance = calculateTopicPerformance([...answersFor("A", 3, 5), ...answersFor("B", 1, 5)]);

    expect(getWeakTopics(performance).map((weak) => weak.topic)).toEqual(["B"]);
    expect(getWeakTopics(performance, 70).map((weak) => weak.topic)).toEqual(["B", "A"]);
  });

  it("keeps appearance order for equal percentages", () => {
    const performance = calculateTopicPerformance([
      ...answersFor("First", 1, 2),
      ...answersFor("Worst", 0, 1),
      ...answersFor("Second", 2, 4)
    ]);

    expect(getWeakTopics(performance).map((weak) => weak.topic)).toEqual(["Worst", "First", "Second"]);
  });
});

describe("summarizeQuiz", () => {
  it("scores nine of fifteen as exactly sixty percent", () => {
    const summary = summarizeQuiz([...answersFor("A", 5, 8), ...answersFor("B", 4, 7)]);

    expect(summary.correct).toBe(9);
    expect(summary.total).toBe(15);
    expect(summary.percentage).toBe(60);
    expect(summary.points).toBe(9);
    expect(summary.verdict).toBe("good");
  });

  it("handles an empty quiz", () => {
    expect(summarizeQuiz([])).toMatchObject({ correct: 0, total: 0, percentage: 0, weakTopics: [] });
  });
});

describe("quizVerdict", () => {
  it("grades on the overall percentage", () => {
    expect(quizVerdict(85)).toBe("excellent");
    expect(quizVerdict(60)).toBe("good");
    expect(quizVerdict(percentageOf(1, 3))).toBe("keep-studying");
  });
});
