import type { MissedAnswer, QuizReport } from "./quizTypes";

export function buildReport(score: number, total: number, missed: readonly MissedAnswer[]): QuizReport {
  const percent = total === 0 ? 0 : (score / total) * 100;
  return { score, total, percent, missed: missed.map((m) => ({ ...m })) };
}

export function formatPercent(percent: number): string {
  return `${percent.toFixed(1)}%`;
}

export function formatScore(report: QuizReport): string {
  return `${report.score}/${report.total} (${formatPercent(report.percent)})`;
}

/** ["A", "B", "C"] -> "A, B, or C" */
export function joinKeys(keys: string[]): string {
  if (keys.length <= 2) return keys.join(" or ");
  return `${keys.slice(0, -1).join(", ")}, or ${keys[keys.length - 1]}`;
}

export function verdictFor(percent: number, topic: string): string {
  if (percent === 100) return "Excellent! You got a perfect score.";
  if (percent >= 70) return `Well done - good knowledge of ${topic}.`;
  return "Keep studying - there is plenty more to learn!";
}

/** Review block for one missed question, shared by the terminal and browser renderers. */
export function describeMissed(m: MissedAnswer): string[] {
  const { question, givenAnswer } = m;
  const lines = [
    `Question ${m.index}: ${question.prompt}`,
    `  Your answer: ${givenAnswer} - ${question.options[givenAnswer] ?? "N/A"}`,
    `  Correct: ${question.correctKey} - ${question.options[question.correctKey]}`,
  ];
  if (question.explanation) lines.push(`  Explanation: ${question.explanation}`);
  return lines;
}
