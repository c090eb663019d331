import type { GradedAnswer, Question } from "../../domain/models.js";

export function gradeAnswer(question: Question, userAnswer: number): GradedAnswer {
  const inRange = Number.isInteger(userAnswer) && userAnswer >= 0 && userAnswer < question.options.length;

  return {
    question,
    userAnswer,
    isCorrect: userAnswer === question.correctAnswer,
    correctOption: question.options[question.correctAnswer] ?? "",
    userOption: inRange ? question.options[userAnswer] : null,
    explanation: question.explanation
  };
}
