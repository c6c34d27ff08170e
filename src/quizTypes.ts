export type OptionKey = string;

export type QuestionRecord = {
  prompt: string;
  options: Readonly<Record<OptionKey, string>>;
  correctKey: OptionKey;
  explanation?: string;
};

export type CatalogInfo = { title: string; topic: string };

export type Catalog = CatalogInfo & { questions: QuestionRecord[] };

export type QuizState = "active" | "awaitingAdvance" | "complete";

export type RestartMode = "reselect" | "reshuffle";

export type MissedAnswer = {
  index: number; // 1-based position in the slate
  question: QuestionRecord;
  givenAnswer: OptionKey;
};

export type Outcome = {
  isCorrect: boolean;
  givenKey: OptionKey;
  correctKey: OptionKey;
  explanationText: string;
  question: QuestionRecord;
};

export type QuizReport = {
  score: number;
  total: number;
  percent: number;
  missed: MissedAnswer[];
};
