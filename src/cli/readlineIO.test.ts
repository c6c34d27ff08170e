import { PassThrough } from "stream";
import { describe, it, expect } from "vitest";
import { ConsoleLogger } from "../logger";
import { QuizSession } from "../quizSession";
import { keepOrder, sampleBank } from "../testFixtures";
import { createReadlineIO } from "./readlineIO";
import { runTerminalQuiz } from "./terminal";

function pipes() {
  const input = new PassThrough();
  const output = new PassThrough();
  const chunks: string[] = [];
  output.on("data", (chunk: Buffer) => {
    chunks.push(chunk.toString("utf8"));
  });
  async function written() {
    await new Promise((resolve) => setImmediate(resolve));
    return chunks.join("");
  }
  return { input, output, written };
}

describe("createReadlineIO", () => {
  it("plays a quiz from answers piped in one chunk", async () => {
    const { input, output, written } = pipes();
    const io = createReadlineIO(input, output);
    input.end("B\nA\nC\nn\n");

    const bank = sampleBank();
    const session = new QuizSession(bank, { rng: keepOrder, logger: new ConsoleLogger("test", "error") });

    expect(await runTerminalQuiz(io, session, bank.info)).toBe("finished");
    expect(session.report().score).toBe(3);
    io.close();

    const text = await written();
    expect(text.startsWith("Welcome to the Test Quiz!\n")).toBe(true);
    expect(text).toContain("Your answer (A/B/C/D) > Correct! ✅\n");
    expect(text).toContain("Score: 3/3 (100.0%)\n");
    expect(text.endsWith("Would you like to try again? (y/n) > Thanks for playing - goodbye!\n")).toBe(true);
  });

  it("returns null once input ends", async () => {
    const { input, output, written } = pipes();
    const io = createReadlineIO(input, output);
    input.end("b\n");

    expect(await io.prompt("First > ")).toBe("b");
    expect(await io.prompt("Second > ")).toBe(null);
    expect(await io.prompt("Third > ")).toBe(null);
    expect(await written()).toBe("First > Second > Third > ");
  });

  it("resolves a waiting prompt to null when closed", async () => {
    const { input, output } = pipes();
    const io = createReadlineIO(input, output);

    const pending = io.prompt("Answer > ");
    io.close();

    expect(await pending).toBe(null);
  });
});
