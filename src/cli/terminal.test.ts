import { describe, it, expect } from "vitest";
import { ConsoleLogger } from "../logger";
import { QuizSession } from "../quizSession";
import { MARS, PLANTS, SUM, keepOrder, sampleBank } from "../testFixtures";
import { type QuizIO, runTerminalQuiz } from "./terminal";

function scriptedIO(answers: string[]) {
  const lines: string[] = [];
  const prompts: string[] = [];
  const io: QuizIO = {
    write(line) {
      lines.push(line);
    },
    async prompt(question) {
      prompts.push(question);
      return answers.shift() ?? null;
    },
  };
  return { io, lines, prompts };
}

const quiet = new ConsoleLogger("test", "error");

describe("runTerminalQuiz", () => {
  it("plays a full quiz with a rejected answer and a review", async () => {
    const bank = sampleBank();
    const session = new QuizSession(bank, { rng: keepOrder, logger: quiet });
    const { io, lines, prompts } = scriptedIO(["B", "x", "C", "c", "n"]);

    const result = await runTerminalQuiz(io, session, bank.info);

    expect(result).toBe("finished");
    expect(lines).toEqual([
      "Welcome to the Test Quiz!",
      "There are 3 questions. Type 'quit' to exit at any time.",
      "",
      "Question 1: Which planet is known as the Red Planet?",
      "  A. Venus",
      "  B. Mars",
      "  C. Jupiter",
      "  D. Saturn",
      "Correct! ✅",
      "",
      "Question 2: Which gas do plants absorb from the air?",
      "  A. Carbon dioxide",
      "  B. Oxygen",
      "  C. Nitrogen",
      "  D. Helium",
      "Please enter one of A, B, C, or D (or type 'quit' to exit).",
      "Incorrect. The correct answer is A.",
      "",
      "Question 3: What is 3 + 4?",
      "  A. 6",
      "  B. 8",
      "  C. 7",
      "  D. 9",
      "Correct! ✅",
      "",
      "Quiz complete!",
      "Score: 2/3 (66.7%)",
      "",
      "Review of incorrect answers:",
      "",
      "Question 2: Which gas do plants absorb from the air?",
      "  Your answer: C - Nitrogen",
      "  Correct: A - Carbon dioxide",
      "  Explanation: Plants take in carbon dioxide for photosynthesis.",
      "",
      "Keep studying - there is plenty more to learn!",
      "",
      "Thanks for playing - goodbye!",
    ]);
    expect(prompts).toEqual([
      "Your answer (A/B/C/D) > ",
      "Your answer (A/B/C/D) > ",
      "Your answer (A/B/C/D) > ",
      "Your answer (A/B/C/D) > ",
      "Would you like to try again? (y/n) > ",
    ]);
  });

  it("stops on quit without touching the score", async () => {
    const bank = sampleBank();
    const session = new QuizSession(bank, { rng: keepOrder, logger: quiet });
    const { io, lines } = scriptedIO(["EXIT"]);

    expect(await runTerminalQuiz(io, session, bank.info)).toBe("quit");
    expect(lines[lines.length - 1]).toBe("Exiting quiz. Goodbye!");
    expect(session.position).toBe(0);
    expect(session.state).toBe("active");
  });

  it("reports an interruption when input ends", async () => {
    const bank = sampleBank();
    const session = new QuizSession(bank, { rng: keepOrder, logger: quiet });
    const { io, lines } = scriptedIO(["B"]);

    expect(await runTerminalQuiz(io, session, bank.info)).toBe("interrupted");
    expect(lines.slice(-2)).toEqual(["", "Interrupted. Goodbye!"]);
    expect(session.position).toBe(1);
  });

  it("restarts when the player asks to try again", async () => {
    const bank = sampleBank([MARS, PLANTS]);
    const session = new QuizSession(bank, { count: 1, rng: keepOrder, logger: quiet });
    const { io, lines } = scriptedIO(["B", "maybe", "y", "B", "no"]);

    expect(await runTerminalQuiz(io, session, bank.info)).toBe("finished");
    expect(lines).toContain("Please answer 'y' or 'n'.");
    expect(lines).toContain("Restarting the quiz...");
    expect(lines.filter((l) => l === "Excellent! You got a perfect score.")).toHaveLength(2);
    expect(lines.filter((l) => l === "Score: 1/1 (100.0%)")).toHaveLength(2);
  });

  it("hints with two keys for a true/false question", async () => {
    const bank = sampleBank([{ prompt: "The sun is a star.", options: { A: "True", B: "False" }, correctKey: "A" }, SUM]);
    const session = new QuizSession(bank, { count: 1, rng: keepOrder, logger: quiet });
    const { io, lines, prompts } = scriptedIO(["C"]);

    expect(await runTerminalQuiz(io, session, bank.info)).toBe("interrupted");
    expect(prompts[0]).toBe("Your answer (A/B) > ");
    expect(lines).toContain("Please enter one of A or B (or type 'quit' to exit).");
  });
});
