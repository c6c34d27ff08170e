import { useReducer, useState } from "react";
import { InvalidInputError } from "./errors";
import { QuestionBank, optionKeys } from "./questionBank";
import { QuizSession } from "./quizSession";
import type { RestartMode } from "./quizTypes";
import type { RNG } from "./rng";
import { describeMissed, formatScore, joinKeys, verdictFor } from "./scoring";

type Props = {
  bank: QuestionBank;
  count?: number;
  rng?: RNG;
  restartMode?: RestartMode;
};

/**
 * Props are read once, when the session is created. Give the component a new
 * `key` to start over with a different bank or settings.
 */
export default function App({ bank, count, rng, restartMode = "reshuffle" }: Props) {
  const [session] = useState(() => new QuizSession(bank, { count, rng, restartMode, allowEmpty: true }));
  // The session mutates in place; bump a counter to re-render after each call.
  const [, refresh] = useReducer((n: number) => n + 1, 0);
  const [selected, setSelected] = useState("");
  const [notice, setNotice] = useState<string | null>(null);

  function submitOrNext() {
    if (session.state === "awaitingAdvance") {
      session.advance();
      setSelected("");
      refresh();
      return;
    }

    const keys = optionKeys(session.currentQuestion());
    if (!selected) {
      setNotice(`Please select ${joinKeys(keys)} before submitting.`);
      return;
    }
    try {
      session.submitAnswer(selected);
      setNotice(null);
    } catch (e) {
      if (!(e instanceof InvalidInputError)) throw e;
      setNotice(e.message);
    }
    refresh();
  }

  function restart() {
    session.restart();
    setSelected("");
    setNotice(null);
    refresh();
  }

  return (
    <div className="app">
      <header className="topbar">
        <div className="brand">
          <div className="title">{bank.info.title}</div>
        </div>
      </header>

      {session.isComplete ? (
        <Results session={session} topic={bank.info.topic} onRestart={restart} />
      ) : (
        <QuestionCard
          session={session}
          selected={selected}
          notice={notice}
          onSelect={setSelected}
          onSubmit={submitOrNext}
          onRestart={restart}
        />
      )}
    </div>
  );
}

function QuestionCard({
  session,
  selected,
  notice,
  onSelect,
  onSubmit,
  onRestart,
}: {
  session: QuizSession;
  selected: string;
  notice: string | null;
  onSelect: (key: string) => void;
  onSubmit: () => void;
  onRestart: () => void;
}) {
  const outcome = session.state === "awaitingAdvance" ? session.lastOutcome : null;
  const question = outcome ? outcome.question : session.currentQuestion();

  return (
    <div className="card">
      <div className="progress">
        Question {session.position + 1} of {session.total}
      </div>
      <p className="prompt">{question.prompt}</p>

      <div className="options">
        {optionKeys(question).map((key) => (
          <label className="option" key={key}>
            <input
              type="radio"
              name="answer"
              value={key}
              checked={selected === key}
              disabled={outcome !== null}
              onChange={() => onSelect(key)}
            />
            <span>
              {key}. {question.options[key]}
            </span>
          </label>
        ))}
      </div>

      {notice && <div className="notice">{notice}</div>}

      {outcome && (
        <div className={"feedback " + (outcome.isCorrect ? "ok" : "bad")}>
          {outcome.isCorrect
            ? "Correct! ✓"
            : `Incorrect. Correct answer: ${outcome.correctKey}. ${outcome.explanationText}`.trim()}
        </div>
      )}

      <div className="row">
        <button className="btn primary" onClick={onSubmit}>
          {outcome ? "Next" : "Submit"}
        </button>
        <button className="btn ghost" onClick={onRestart}>
          Restart
        </button>
      </div>
    </div>
  );
}

function Results({ session, topic, onRestart }: { session: QuizSession; topic: string; onRestart: () => void }) {
  const report = session.report();

  return (
    <div className="card">
      <h2>Quiz complete!</h2>
      <div className="score">Score: {formatScore(report)}</div>

      <h3>Review of incorrect answers</h3>
      <div className="review">
        {report.missed.length === 0 ? (
          <div className="note">You answered all questions correctly. Well done!</div>
        ) : (
          report.missed.map((m) => (
            <div className="reviewItem" key={m.index}>
              {describeMissed(m).map((line, i) => (
                <div key={i}>{line}</div>
              ))}
            </div>
          ))
        )}
      </div>

      <div className="verdict">{verdictFor(report.percent, topic)}</div>

      <div className="row">
        <button className="btn primary" onClick={onRestart}>
          Restart Quiz
        </button>
      </div>
    </div>
  );
}
