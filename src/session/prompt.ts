import { createInterface } from "node:readline";

export interface Prompter {
  /** Resolves to the typed line, or null once input has ended */
  ask(question: string): Promise<string | null>;
  close(): void;
}

/**
 * Line-driven prompter. Lines typed (or piped) ahead of a question are queued;
 * a last line without a newline is still delivered before end of input.
 */
export function createTerminalPrompter(
  input: NodeJS.ReadableStream = process.stdin,
  output: NodeJS.WritableStream = process.stdout,
): Prompter {
  const rl = createInterface({ input, output });
  const buffered: string[] = [];
  let waiting: ((line: string | null) => void) | undefined;
  let closed = false;

  rl.on("line", (line: string) => {
    if (waiting) {
      const resolve = waiting;
      waiting = undefined;
      resolve(line);
    } else {
      buffered.push(line);
    }
  });
  rl.once("close", () => {
    closed = true;
    waiting?.(null);
    waiting = undefined;
  });

  return {
    ask(question: string): Promise<string | null> {
      const next = buffered.shift();
      if (next !== undefined) {
        output.write(question);
        return Promise.resolve(next);
      }
      if (closed) return Promise.resolve(null);
      rl.setPrompt(question);
      rl.prompt();
      return new Promise((resolve) => {
        waiting = resolve;
      });
    },
    close(): void {
      if (!closed) rl.close();
    },
  };
}

const YES = new Set(["y", "yes"]);
const NO = new Set(["n", "no"]);

/**
 * Asks until the answer is yes or no. End of input counts as no.
 * @param onInvalid called with the rejected answer before asking again
 */
export async function askYesNo(
  prompter: Prompter,
  question: string,
  onInvalid: (answer: string) => void,
): Promise<boolean> {
  for (;;) {
    const answer = await prompter.ask(question);
    if (answer === null) return false;

    const normalized = answer.trim().toLowerCase();
    if (YES.has(normalized)) return true;
    if (NO.has(normalized)) return false;
    onInvalid(answer);
  }
}
