import {
  QUIZ_MODES,
  type GradedAnswer,
  type Question,
  type QuizModeName,
  type QuizSummary,
  type QuizVerdict,
  type VideoMetadata
} from "../domain/models.js";
import type { QuizSession } from "../layers/quiz/quizSession.js";

export interface ConsoleIO {
  ask(prompt: string): Promise<string>;
  print(line: string): void;
}

const OPTION_LETTERS = ["A", "B", "C", "D", "E", "F"];

const VERDICT_MESSAGES: Record<QuizVerdict, string> = {
  excellent: "Excellent! You have a strong understanding of the material!",
  good: "Good job! Review the weak areas to master the content.",
  "keep-studying": "Keep studying! Focus on the topics that need improvement."
};

/** Accepts a letter (A-D) or a 1-based number; null when neither fits. */
export function parseAnswerInput(input: string, optionCount: number): number | null {
  const value = input.trim().toUpperCase();
  if (!value) {
    return null;
  }

  const letterIndex = OPTION_LETTERS.indexOf(value);
  if (letterIndex !== -1) {
    return letterIndex < optionCount ? letterIndex : null;
  }

  if (/^\d+$/.test(value)) {
    const index = Number(value) - 1;
    return index >= 0 && index < optionCount ? index : null;
  }

  return null;
}

export function parseModeInput(input: string): QuizModeName | null {
  const value = input.trim().toLowerCase();
  const byIndex: QuizModeName[] = ["quick", "standard", "challenge"];

  if (/^[1-3]$/.test(value)) {
    return byIndex[Number(value) - 1];
  }
  return byIndex.find((mode) => mode === value || QUIZ_MODES[mode].label.toLowerCase() === value) ?? null;
}

export function formatQuestion(question: Question, index: number, total: number, score: number): string[] {
  return [
    "",
    `Question ${index + 1}/${total} | Points: ${score} | Topic: ${question.topic}`,
    question.question,
    ...question.options.map((option, optionIndex) => `  ${OPTION_LETTERS[optionIndex]}. ${option}`)
  ];
}

export function formatFeedback(answer: GradedAnswer): string[] {
  if (answer.isCorrect) {
    return ["Correct! +1 Point", `Answer: ${answer.correctOption}`, `Explanation: ${answer.explanation}`];
  }
  return [
    "Incorrect",
    `Your answer: ${answer.userOption ?? "(no valid option)"}`,
    `Correct answer: ${answer.correctOption}`,
    `Explanation: ${answer.explanation}`
  ];
}

export function formatSummary(summary: QuizSummary, metadata: VideoMetadata): string[] {
  const lines = [
    "",
    `Final Score: ${summary.correct}/${summary.total} (${summary.percentage.toFixed(1)}%)`,
    `Total Points: ${summary.points}`,
    VERDICT_MESSAGES[summary.verdict],
    "",
    "Performance by Topic"
  ];

  for (const [topic, stat] of summary.topicPerformance) {
    lines.push(`  ${topic}: ${stat.correct}/${stat.total} (${stat.percentage.toFixed(0)}%) - ${stat.status}`);
  }

  if (summary.weakTopics.length > 0) {
    lines.push("", "Topics to Review");
    for (const weak of summary.weakTopics) {
      lines.push(`  ${weak.topic}: ${weak.score} (${weak.percentage.toFixed(0)}%) - re-watch ${metadata.url}`);
    }
  }

  return lines;
}

export async function chooseMode(io: ConsoleIO): Promise<QuizModeName> {
  for (;;) {
    const answer = await io.ask(
      Object.values(QUIZ_MODES)
        .map((mode, index) => `${index + 1}) ${mode.label} (${mode.questionCount} questions)`)
        .join("  ") + "\nChoose a mode: "
    );
    const mode = parseModeInput(answer);
    if (mode) {
      return mode;
    }
    io.print("Please choose 1, 2 or 3.");
  }
}

/** Runs one session to completion and returns its summary. */
export async function runQuiz(session: QuizSession, io: ConsoleIO): Promise<QuizSummary> {
  for (;;) {
    const question = session.current;
    if (!question) {
      break;
    }

    for (const line of formatQuestion(question, session.currentIndex, session.questions.length, session.score)) {
      io.print(line);
    }

    let choice: number | null = null;
    while (choice === null) {
      choice = parseAnswerInput(await io.ask("Your answer: "), question.options.length);
      if (choice === null) {
        io.print(`Enter a letter between A and ${OPTION_LETTERS[question.options.length - 1]}.`);
      }
    }

    for (const line of formatFeedback(session.submit(choice))) {
      io.print(line);
    }

    if (!session.advance()) {
      break;
    }
  }

  return session.summary();
}
