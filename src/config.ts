import { type LogLevel, isLogLevel } from "./logger";
import type { RestartMode } from "./quizTypes";

export type QuizConfig = {
  count?: number;
  seed?: string;
  questionsFile?: string;
  restartMode: RestartMode;
  logLevel: LogLevel;
};

export type CliOptions = {
  count?: string;
  seed?: string;
  questions?: string;
  restartMode?: string;
  logLevel?: string;
};

export const DEFAULT_LOG_LEVEL: LogLevel = "warn";

/**
 * Parses the "number of questions" argument. Anything that is not a positive
 * whole number means "use the full catalog" rather than an error.
 */
export function parseQuestionCount(raw: string | undefined): number | undefined {
  if (raw === undefined) return undefined;
  const s = raw.trim();
  if (!/^\+?\d+$/.test(s)) return undefined;
  const n = Number(s);
  return Number.isSafeInteger(n) && n > 0 ? n : undefined;
}

function parseRestartMode(raw: string | undefined): RestartMode {
  return raw === "reshuffle" ? "reshuffle" : "reselect";
}

export function resolveConfig(options: CliOptions, env: NodeJS.ProcessEnv = process.env): QuizConfig {
  const level = options.logLevel ?? env.QUIZ_LOG_LEVEL;
  const seed = options.seed?.trim();
  return {
    count: parseQuestionCount(options.count),
    seed: seed ? seed : undefined,
    questionsFile: options.questions,
    restartMode: parseRestartMode(options.restartMode),
    logLevel: isLogLevel(level) ? level : DEFAULT_LOG_LEVEL,
  };
}
