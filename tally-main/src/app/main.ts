import { loadCalculatorConfig } from "../config/calculator.js";
import { runLineRepl, type ReplExit } from "../repl/line-repl.js";
import { createSessionState, type SessionState } from "../session/state.js";
import { devLog } from "../shared/index.js";

/** Exit status after Ctrl+C, distinct from a normal quit (0). */
export const INTERRUPT_EXIT_CODE = 130;

export async function createSession(): Promise<SessionState> {
  const config = await loadCalculatorConfig();
  devLog(
    `Session ready (mode=${config.angleMode}, precision=${config.precision}, history=${config.historySize})`,
  );
  return createSessionState(config);
}

/** Plain line-oriented REPL on stdin/stdout, used when there is no terminal UI. */
export async function main(): Promise<ReplExit> {
  const state = await createSession();

  process.on("SIGINT", () => {
    process.stdout.write("\n");
    process.exit(INTERRUPT_EXIT_CODE);
  });

  return runLineRepl({
    input: process.stdin,
    output: process.stdout,
    state,
    prompt: process.stdin.isTTY === true,
  });
}
