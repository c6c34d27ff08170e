import { QuestionBank } from "./questionBank";
import type { QuestionRecord } from "./quizTypes";
import type { RNG } from "./rng";

// Fisher-Yates picks j === i on every step, so shuffles keep catalog order.
export const keepOrder: RNG = { next: () => 0.999999 };

export const MARS: QuestionRecord = {
  prompt: "Which planet is known as the Red Planet?",
  options: { A: "Venus", B: "Mars", C: "Jupiter", D: "Saturn" },
  correctKey: "B",
  explanation: "Iron oxide on its surface gives Mars its colour.",
};

export const PLANTS: QuestionRecord = {
  prompt: "Which gas do plants absorb from the air?",
  options: { A: "Carbon dioxide", B: "Oxygen", C: "Nitrogen", D: "Helium" },
  correctKey: "A",
  explanation: "Plants take in carbon dioxide for photosynthesis.",
};

export const SUM: QuestionRecord = {
  prompt: "What is 3 + 4?",
  options: { A: "6", B: "8", C: "7", D: "9" },
  correctKey: "C",
};

export function sampleBank(questions: QuestionRecord[] = [MARS, PLANTS, SUM]): QuestionBank {
  return new QuestionBank(questions, { title: "Test Quiz", topic: "general science" });
}
