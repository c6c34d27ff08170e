import { readFile } from "fs/promises";
import * as path from "path";

import { Command } from "commander";

import { type CliOptions, type QuizConfig, resolveConfig } from "../config";
import { ConsoleLogger, type Logger } from "../logger";
import { QuestionBank, parseCatalog } from "../questionBank";
import { UAE_HISTORY } from "../questions";
import { QuizSession } from "../quizSession";
import { mathRandom, seededRng } from "../rng";
import { createReadlineIO } from "./readlineIO";
import { type QuizIO, type TerminalResult, runTerminalQuiz } from "./terminal";

export async function loadBank(questionsFile?: string): Promise<QuestionBank> {
  if (!questionsFile) return QuestionBank.fromCatalog(UAE_HISTORY);
  const text = await readFile(path.resolve(questionsFile), "utf8");
  return QuestionBank.fromCatalog(parseCatalog(JSON.parse(text)));
}

export async function runQuiz(config: QuizConfig, io: QuizIO, logger: Logger): Promise<TerminalResult> {
  logger.debug("Resolved configuration", { ...config });
  const bank = await loadBank(config.questionsFile);
  const session = new QuizSession(bank, {
    count: config.count,
    rng: config.seed ? seededRng(config.seed) : mathRandom,
    restartMode: config.restartMode,
    logger,
  });
  return runTerminalQuiz(io, session, bank.info);
}

export function buildProgram(env: NodeJS.ProcessEnv = process.env): Command {
  const program = new Command();

  program
    .name("trivia-quiz")
    .description("Multiple-choice trivia quiz in the terminal")
    .version("1.0.0")
    .argument("[count]", "Number of questions (default: the whole catalog)")
    .option("-n, --count <n>", "Number of questions (same as the positional argument)")
    .option("--seed <seed>", "Seed for a replayable question order")
    .option("--questions <file>", "JSON question catalog to use instead of the built-in one")
    .option("--restart-mode <mode>", "reselect (new questions from the bank) or reshuffle (same questions)")
    .option("--log-level <level>", "debug | info | warn | error (env: QUIZ_LOG_LEVEL)")
    .action(async (countArg: string | undefined, options: CliOptions) => {
      const config = resolveConfig({ ...options, count: options.count ?? countArg }, env);
      const logger = new ConsoleLogger("quiz", config.logLevel);
      const io = createReadlineIO();
      try {
        const result = await runQuiz(config, io, logger);
        logger.debug("Quiz ended", { result });
      } catch (e) {
        logger.error("Quiz failed", e);
        process.exitCode = 1;
      } finally {
        io.close();
      }
    });

  return program;
}
