import { EmptyBankError, InvalidQuestionError } from "./errors";
import type { Catalog, CatalogInfo, OptionKey, QuestionRecord } from "./quizTypes";
import { type RNG, mathRandom, shuffle } from "./rng";

const OPTION_KEY = /^[A-Z]$/;

const DEFAULT_INFO: CatalogInfo = { title: "Trivia Quiz", topic: "this subject" };

export function optionKeys(q: QuestionRecord): OptionKey[] {
  return Object.keys(q.options).sort();
}

function sanitizeText(s: string): string {
  return s.replace(/\s+/g, " ").trim();
}

function freezeQuestion(q: QuestionRecord, index: number): QuestionRecord {
  const prompt = sanitizeText(q.prompt);
  if (!prompt) throw new InvalidQuestionError(index, "prompt is empty.");

  const keys = Object.keys(q.options);
  if (keys.length < 2) throw new InvalidQuestionError(index, "needs at least two options.");
  for (const k of keys) {
    if (!OPTION_KEY.test(k)) throw new InvalidQuestionError(index, `option key "${k}" must be a single letter A-Z.`);
  }
  if (!keys.includes(q.correctKey)) {
    throw new InvalidQuestionError(index, `correct key "${q.correctKey}" is not one of ${keys.join(", ")}.`);
  }

  const options = Object.freeze({ ...q.options });
  const explanation = q.explanation?.trim();
  return Object.freeze({
    prompt,
    options,
    correctKey: q.correctKey,
    ...(explanation ? { explanation } : {}),
  });
}

/**
 * Read-only catalog of questions. Safe to share between sessions: nothing
 * here mutates after construction.
 */
export class QuestionBank {
  readonly info: CatalogInfo;
  private readonly questions: readonly QuestionRecord[];

  constructor(questions: readonly QuestionRecord[], info: CatalogInfo = DEFAULT_INFO) {
    this.questions = Object.freeze(questions.map(freezeQuestion));
    this.info = Object.freeze({ ...info });
  }

  static fromCatalog(catalog: Catalog): QuestionBank {
    return new QuestionBank(catalog.questions, { title: catalog.title, topic: catalog.topic });
  }

  get size(): number {
    return this.questions.length;
  }

  get(index: number): QuestionRecord | null {
    return this.questions[index] ?? null;
  }

  all(): QuestionRecord[] {
    return [...this.questions];
  }

  /**
   * Shuffles the whole catalog and returns the first `count` records, or all
   * of them when `count` is missing, not a positive integer, or larger than
   * the catalog.
   */
  selectSlate(count?: number, rng: RNG = mathRandom): QuestionRecord[] {
    if (this.questions.length === 0) throw new EmptyBankError();
    const shuffled = shuffle(rng, this.questions);
    return shuffled.slice(0, resolveSlateSize(count, shuffled.length));
  }
}

export function resolveSlateSize(count: number | undefined, available: number): number {
  if (count === undefined || !Number.isInteger(count) || count <= 0 || count > available) return available;
  return count;
}

// --------- Untrusted catalog input (JSON files) ---------

function isRecord(x: unknown): x is Record<string, unknown> {
  return typeof x === "object" && x !== null && !Array.isArray(x);
}

function parseQuestion(raw: unknown, index: number): QuestionRecord {
  if (!isRecord(raw)) throw new InvalidQuestionError(index, "must be an object.");

  const prompt = raw.prompt ?? raw.question;
  if (typeof prompt !== "string") throw new InvalidQuestionError(index, "prompt must be a string.");

  if (!isRecord(raw.options)) throw new InvalidQuestionError(index, "options must be an object of key -> text.");
  const options: Record<OptionKey, string> = {};
  for (const [k, v] of Object.entries(raw.options)) {
    if (typeof v !== "string") throw new InvalidQuestionError(index, `option "${k}" must be a string.`);
    const key = k.trim().toUpperCase();
    if (key in options) throw new InvalidQuestionError(index, `option key "${key}" appears twice.`);
    options[key] = v;
  }

  const correct = raw.correctKey ?? raw.answer;
  if (typeof correct !== "string") throw new InvalidQuestionError(index, "correctKey must be a string.");

  const explanation = raw.explanation;
  if (explanation !== undefined && typeof explanation !== "string") {
    throw new InvalidQuestionError(index, "explanation must be a string when present.");
  }

  return { prompt, options, correctKey: correct.trim().toUpperCase(), explanation };
}

/**
 * Validates a parsed JSON value into a catalog. Accepts either
 * `{ title?, topic?, questions: [...] }` or a bare array of questions.
 * `question`/`answer` are read as aliases for `prompt`/`correctKey`.
 */
export function parseCatalog(raw: unknown): Catalog {
  const list = Array.isArray(raw) ? raw : isRecord(raw) ? raw.questions : undefined;
  if (!Array.isArray(list)) throw new InvalidQuestionError(null, "catalog must be an array or have a questions array.");

  const meta: Record<string, unknown> = isRecord(raw) ? raw : {};
  const title = typeof meta.title === "string" && meta.title.trim() ? meta.title.trim() : DEFAULT_INFO.title;
  const topic = typeof meta.topic === "string" && meta.topic.trim() ? meta.topic.trim() : DEFAULT_INFO.topic;

  const questions = list.map((q: unknown, i) => freezeQuestion(parseQuestion(q, i), i));
  return { title, topic, questions };
}
