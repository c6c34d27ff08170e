import { InvalidInputError } from "../errors";
import { optionKeys } from "../questionBank";
import type { QuizSession } from "../quizSession";
import type { CatalogInfo, Outcome } from "../quizTypes";
import { describeMissed, formatScore, joinKeys, verdictFor } from "../scoring";

export type QuizIO = {
  write(line: string): void;
  /** Resolves to null once input is closed or interrupted. */
  prompt(question: string): Promise<string | null>;
};

export type TerminalResult = "finished" | "quit" | "interrupted";

const QUIT_WORDS = ["quit", "exit"];

async function askQuestion(io: QuizIO, session: QuizSession): Promise<Outcome | "quit" | "interrupted"> {
  const keys = optionKeys(session.currentQuestion());
  for (;;) {
    const raw = await io.prompt(`Your answer (${keys.join("/")}) > `);
    if (raw === null) return "interrupted";
    if (QUIT_WORDS.includes(raw.trim().toLowerCase())) return "quit";
    try {
      return session.submitAnswer(raw);
    } catch (e) {
      if (!(e instanceof InvalidInputError)) throw e;
      io.write(`Please enter one of ${joinKeys(keys)} (or type 'quit' to exit).`);
    }
  }
}

async function askTryAgain(io: QuizIO): Promise<boolean | null> {
  for (;;) {
    const raw = await io.prompt("Would you like to try again? (y/n) > ");
    if (raw === null) return null;
    const a = raw.trim().toLowerCase();
    if (a === "y" || a === "yes") return true;
    if (a === "n" || a === "no") return false;
    io.write("Please answer 'y' or 'n'.");
  }
}

function printResults(io: QuizIO, session: QuizSession, info: CatalogInfo) {
  const report = session.report();
  io.write("");
  io.write("Quiz complete!");
  io.write(`Score: ${formatScore(report)}`);

  if (report.missed.length > 0) {
    io.write("");
    io.write("Review of incorrect answers:");
    for (const m of report.missed) {
      io.write("");
      for (const line of describeMissed(m)) io.write(line);
    }
  }

  io.write("");
  io.write(verdictFor(report.percent, info.topic));
}

/** Line-mode renderer: drives the session from prompts until the player stops. */
export async function runTerminalQuiz(io: QuizIO, session: QuizSession, info: CatalogInfo): Promise<TerminalResult> {
  io.write(`Welcome to the ${info.title}!`);
  io.write(`There are ${session.total} questions. Type 'quit' to exit at any time.`);

  for (;;) {
    while (!session.isComplete) {
      const q = session.currentQuestion();
      io.write("");
      io.write(`Question ${session.position + 1}: ${q.prompt}`);
      for (const key of optionKeys(q)) io.write(`  ${key}. ${q.options[key]}`);

      const outcome = await askQuestion(io, session);
      if (outcome === "quit") {
        io.write("Exiting quiz. Goodbye!");
        return "quit";
      }
      if (outcome === "interrupted") {
        io.write("");
        io.write("Interrupted. Goodbye!");
        return "interrupted";
      }

      io.write(outcome.isCorrect ? "Correct! ✅" : `Incorrect. The correct answer is ${outcome.correctKey}.`);
      session.advance();
    }

    printResults(io, session, info);

    io.write("");
    const again = await askTryAgain(io);
    if (again === null) {
      io.write("");
      io.write("Interrupted. Goodbye!");
      return "interrupted";
    }
    if (!again) {
      io.write("Thanks for playing - goodbye!");
      return "finished";
    }
    io.write("");
    io.write("Restarting the quiz...");
    session.restart();
  }
}
