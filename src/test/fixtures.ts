import type { Difficulty, GradedAnswer, Notes, Question } from "../domain/models.js";

export const SAMPLE_TRANSCRIPT = [
  "Welcome to this lecture on machine learning. Today we will cover three main topics.",
  "First, supervised learning trains models on labeled data such as regression and decision trees.",
  "Second, unsupervised learning works with unlabeled data using clustering and dimensionality reduction.",
  "Finally, neural networks are layers of connected nodes and deep learning stacks many layers.",
  "In summary, machine learning spans these approaches, each with its own applications."
].join(" ");

export const SAMPLE_NOTES: Notes = {
  summary: "An introduction to supervised, unsupervised and neural network based learning.",
  keyConcepts: ["Supervised Learning", "Clustering", "Neural Networks"],
  topics: [
    { name: "Supervised Learning", description: "Learning from labeled data", keywords: ["labels", "regression"] },
    { name: "Unsupervised Learning", description: "Learning from unlabeled data", keywords: ["clustering"] },
    { name: "Neural Networks", description: "Layered models of connected nodes", keywords: ["layers"] }
  ],
  detailedNotes: "## Supervised Learning\n\n- Uses labeled data"
};

export const SAMPLE_NOTES_JSON = JSON.stringify({
  summary: SAMPLE_NOTES.summary,
  key_concepts: SAMPLE_NOTES.keyConcepts,
  topics: SAMPLE_NOTES.topics,
  detailed_notes: SAMPLE_NOTES.detailedNotes
});

export function makeQuestion(overrides: Partial<Question> = {}): Question {
  return {
    question: "What does supervised learning train on?",
    options: ["Labeled data", "Unlabeled data", "Random noise", "Nothing"],
    correctAnswer: 0,
    explanation: "Supervised learning uses labeled examples.",
    topic: "Supervised Learning",
    difficulty: "easy",
    ...overrides
  };
}

export function questionRecord(
  topic: string,
  difficulty: Difficulty,
  overrides: Record<string, unknown> = {}
): Record<string, unknown> {
  return {
    question: `A ${difficulty} question about ${topic}?`,
    options: ["One", "Two", "Three", "Four"],
    correct_answer: 1,
    explanation: "Two is right.",
    topic,
    difficulty,
    ...overrides
  };
}

export function answered(topic: string, isCorrect: boolean): GradedAnswer {
  const question = makeQuestion({ topic });
  return {
    question,
    userAnswer: isCorrect ? 0 : 1,
    isCorrect,
    correctOption: question.options[0],
    userOption: isCorrect ? question.options[0] : question.options[1],
    explanation: question.explanation
  };
}

export function answersFor(topic: string, correct: number, total: number): GradedAnswer[] {
  return Array.from({ length: total }, (_, index) => answered(topic, index < correct));
}
