import { render } from "ink";
import { INTERRUPT_EXIT_CODE, createSession, main as runPlainRepl } from "tally-main";
import { App } from "./app/app.js";

async function run(): Promise<void> {
  // Ink needs raw mode; pipes and --plain get the line REPL
  if (process.argv.includes("--plain") || !process.stdin.isTTY) {
    await runPlainRepl();
    return;
  }

  const state = await createSession();
  const instance = render(
    <App
      state={state}
      onInterrupt={() => {
        process.exitCode = INTERRUPT_EXIT_CODE;
      }}
    />,
    { exitOnCtrlC: false },
  );
  await instance.waitUntilExit();
}

run().catch((err: unknown) => {
  console.error(err instanceof Error ? err.message : err);
  process.exitCode = 1;
});
