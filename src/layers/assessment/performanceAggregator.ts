import type {
  GradedAnswer,
  QuizSummary,
  QuizVerdict,
  TopicPerformance,
  TopicStatus,
  WeakTopic
} from "../../domain/models.js";

export const DEFAULT_WEAK_TOPIC_THRESHOLD = 60;

const STRONG_THRESHOLD = 80;
const REVIEW_THRESHOLD = 60;

export function percentageOf(correct: number, total: number): number {
  return total > 0 ? (correct * 100) / total : 0;
}

export function topicStatus(percentage: number): TopicStatus {
  if (percentage >= STRONG_THRESHOLD) {
    return "Strong";
  }
  return percentage >= REVIEW_THRESHOLD ? "Needs Review" : "Weak";
}

/** Per-topic tallies, keyed in order of each topic's first appearance. */
export function calculateTopicPerformance(answers: readonly GradedAnswer[]): TopicPerformance {
  const tallies = new Map<string, { correct: number; total: number }>();

  for (const answer of answers) {
    const tally = tallies.get(answer.question.topic) ?? { correct: 0, total: 0 };
    tally.total += 1;
    if (answer.isCorrect) {
      tally.correct += 1;
    }
    tallies.set(answer.question.topic, tally);
  }

  const performance: TopicPerformance = new Map();
  for (const [topic, { correct, total }] of tallies) {
    const percentage = percentageOf(correct, total);
    performance.set(topic, { correct, total, percentage, status: topicStatus(percentage) });
  }
  return performance;
}

/** Topics strictly below `threshold`, weakest first. */
export function getWeakTopics(
  performance: TopicPerformance,
  threshold = DEFAULT_WEAK_TOPIC_THRESHOLD
): WeakTopic[] {
  const weak: WeakTopic[] = [];

  for (const [topic, stat] of performance) {
    if (stat.percentage < threshold) {
      weak.push({
        topic,
        score: `${stat.correct}/${stat.total}`,
        percentage: stat.percentage,
        status: stat.status
      });
    }
  }

  return weak.sort((left, right) => left.percentage - right.percentage);
}

export function quizVerdict(percentage: number): QuizVerdict {
  if (percentage >= STRONG_THRESHOLD) {
    return "excellent";
  }
  return percentage >= REVIEW_THRESHOLD ? "good" : "keep-studying";
}

export function summarizeQuiz(
  answers: readonly GradedAnswer[],
  threshold = DEFAULT_WEAK_TOPIC_THRESHOLD
): QuizSummary {
  const correct = answers.filter((answer) => answer.isCorrect).length;
  const percentage = percentageOf(correct, answers.length);
  const topicPerformance = calculateTopicPerformance(answers);

  return {
    correct,
    total: answers.length,
    percentage,
    points: correct,
    verdict: quizVerdict(percentage),
    topicPerformance,
    weakTopics: getWeakTopics(topicPerformance, threshold)
  };
}
