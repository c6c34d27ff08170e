export class QuizError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/** The answer given is blank or not one of the current question's keys. The caller re-prompts. */
export class InvalidInputError extends QuizError {
  constructor(
    message: string,
    readonly input: string,
    readonly allowedKeys: string[]
  ) {
    super(message);
  }
}

/** An operation was called in a state that forbids it. */
export class InvalidStateError extends QuizError {}

export class EmptyBankError extends QuizError {
  constructor() {
    super("Cannot select questions from an empty question bank.");
  }
}

/** Catalog data that breaks a question invariant. `questionIndex` is null for catalog-level problems. */
export class InvalidQuestionError extends QuizError {
  constructor(
    readonly questionIndex: number | null,
    reason: string
  ) {
    super(questionIndex === null ? `Catalog: ${reason}` : `Question ${questionIndex + 1}: ${reason}`);
  }
}
