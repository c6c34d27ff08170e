import { createInterface } from "readline/promises";

import type { QuizIO } from "./terminal";

export type ClosableIO = QuizIO & { close(): void };

/**
 * Terminal I/O over readline. Lines are pulled from one iterator so input that
 * arrives ahead of a prompt (piped answers) is queued, not dropped. Ctrl-C and
 * end of input both resolve pending prompts to null.
 */
export function createReadlineIO(
  input: NodeJS.ReadableStream = process.stdin,
  output: NodeJS.WritableStream = process.stdout
): ClosableIO {
  const rl = createInterface({ input, output });
  const lines = rl[Symbol.asyncIterator]();
  rl.on("SIGINT", () => rl.close());

  return {
    write(line: string) {
      output.write(`${line}\n`);
    },
    async prompt(question: string) {
      output.write(question);
      const next = await lines.next();
      return next.done ? null : next.value;
    },
    close() {
      rl.close();
    },
  };
}
