import { createInterface } from "node:readline";
import type { Readable, Writable } from "node:stream";
import { handleLine } from "../commands/index.js";
import type { SessionState } from "../session/state.js";

export const BANNER = "Tally calculator. Type 'help' for commands. Ctrl+C to exit.";
export const PROMPT = "> ";

export type ReplExit = "quit" | "eof";

export interface LineReplOptions {
  input: Readable;
  output: Writable;
  state: SessionState;
  /** Print a prompt before each line; only useful on a terminal. */
  prompt?: boolean;
}

/**
 * Reads one line at a time and writes one reply per line. Resolves with
 * "quit" after quit/exit and "eof" when the input ends.
 */
export async function runLineRepl({ input, output, state, prompt = false }: LineReplOptions): Promise<ReplExit> {
  const write = (text: string): void => {
    output.write(`${text}\n`);
  };
  const showPrompt = (): void => {
    if (prompt) output.write(PROMPT);
  };

  const rl = createInterface({ input, terminal: false, crlfDelay: Infinity });

  write(BANNER);
  showPrompt();

  for await (const line of rl) {
    const reply = handleLine(line, state);

    if (reply.kind === "exit") {
      write(reply.text);
      rl.close();
      return "quit";
    }
    if (reply.kind !== "none") {
      write(reply.text);
    }
    showPrompt();
  }

  if (prompt) output.write("\n");
  write("Bye.");
  return "eof";
}
