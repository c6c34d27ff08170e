import { EmptyBankError, InvalidInputError, InvalidStateError } from "./errors";
import { ConsoleLogger, type Logger } from "./logger";
import { QuestionBank, optionKeys } from "./questionBank";
import type { MissedAnswer, OptionKey, Outcome, QuestionRecord, QuizReport, QuizState, RestartMode } from "./quizTypes";
import { type RNG, mathRandom, shuffle } from "./rng";
import { buildReport } from "./scoring";

export type SessionOptions = {
  /** Slate size; missing or invalid means the whole catalog. */
  count?: number;
  rng?: RNG;
  /** "reselect" draws a fresh slate from the bank on restart, "reshuffle" reorders this session's own questions. */
  restartMode?: RestartMode;
  /** Start an empty, already complete session instead of throwing when the bank has no questions. */
  allowEmpty?: boolean;
  logger?: Logger;
};

/**
 * One run of the quiz. Owned by a single player; the presentation layer drives
 * it with submitAnswer/advance and reads the report once it is complete.
 */
export class QuizSession {
  private readonly rng: RNG;
  private readonly restartMode: RestartMode;
  private readonly logger: Logger;

  private slate: QuestionRecord[];
  private pos = 0;
  private correctCount = 0;
  private misses: MissedAnswer[] = [];
  private answer: OptionKey | null = null;
  private outcome: Outcome | null = null;

  constructor(
    private readonly bank: QuestionBank,
    private readonly options: SessionOptions = {}
  ) {
    this.rng = options.rng ?? mathRandom;
    this.restartMode = options.restartMode ?? "reselect";
    this.logger = options.logger ?? new ConsoleLogger("quiz");
    this.slate = this.drawSlate();
    this.logger.debug("Session started", { total: this.slate.length, restartMode: this.restartMode });
  }

  get state(): QuizState {
    if (this.pos >= this.slate.length) return "complete";
    return this.answer === null ? "active" : "awaitingAdvance";
  }

  get isComplete(): boolean {
    return this.state === "complete";
  }

  get position(): number {
    return this.pos;
  }

  get score(): number {
    return this.correctCount;
  }

  get total(): number {
    return this.slate.length;
  }

  get currentAnswer(): OptionKey | null {
    return this.answer;
  }

  get lastOutcome(): Outcome | null {
    return this.outcome;
  }

  get missed(): MissedAnswer[] {
    return [...this.misses];
  }

  get orderedQuestions(): QuestionRecord[] {
    return [...this.slate];
  }

  currentQuestion(): QuestionRecord {
    this.expectState("active", "currentQuestion");
    return this.slate[this.pos];
  }

  submitAnswer(key: string): Outcome {
    this.expectState("active", "submitAnswer");
    const question = this.slate[this.pos];
    const allowed = optionKeys(question);

    const given = key.trim().toUpperCase();
    if (!given) throw new InvalidInputError("An answer is required.", key, allowed);
    if (!allowed.includes(given)) {
      throw new InvalidInputError(`"${key.trim()}" is not one of ${allowed.join(", ")}.`, key, allowed);
    }

    const isCorrect = given === question.correctKey.toUpperCase();
    this.answer = given;
    if (isCorrect) {
      this.correctCount += 1;
    } else {
      this.misses.push({ index: this.pos + 1, question, givenAnswer: given });
    }

    this.outcome = {
      isCorrect,
      givenKey: given,
      correctKey: question.correctKey,
      explanationText: isCorrect ? "" : question.explanation ?? "",
      question,
    };
    return this.outcome;
  }

  advance(): void {
    this.expectState("awaitingAdvance", "advance");
    this.pos += 1;
    this.answer = null;
    if (this.isComplete) {
      this.logger.debug("Session complete", { score: this.correctCount, total: this.slate.length });
    }
  }

  report(): QuizReport {
    this.expectState("complete", "report");
    return buildReport(this.correctCount, this.slate.length, this.misses);
  }

  /** Full reset onto a new slate of the same size. */
  restart(): void {
    this.slate =
      this.restartMode === "reshuffle" ? shuffle(this.rng, this.slate) : this.drawSlate(this.slate.length);
    this.pos = 0;
    this.correctCount = 0;
    this.misses = [];
    this.answer = null;
    this.outcome = null;
    this.logger.debug("Session restarted", { total: this.slate.length, restartMode: this.restartMode });
  }

  private drawSlate(count = this.options.count): QuestionRecord[] {
    try {
      return this.bank.selectSlate(count, this.rng);
    } catch (e) {
      if (e instanceof EmptyBankError && this.options.allowEmpty) {
        this.logger.warn("Question bank is empty; starting a completed session");
        return [];
      }
      throw e;
    }
  }

  private expectState(expected: QuizState, operation: string) {
    const actual = this.state;
    if (actual !== expected) {
      throw new InvalidStateError(`${operation}() requires the "${expected}" state, but the session is "${actual}".`);
    }
  }
}
