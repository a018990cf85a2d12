import { Readable, Writable } from "node:stream";
import { describe, expect, it } from "vitest";
import { BANNER, runLineRepl } from "../../src/repl/line-repl.js";
import { createSessionState } from "../../src/session/state.js";

function collector(): { stream: Writable; text: () => string } {
  const chunks: string[] = [];
  const stream = new Writable({
    write(chunk, _encoding, callback) {
      chunks.push(String(chunk));
      callback();
    },
  });
  return { stream, text: () => chunks.join("") };
}

async function session(lines: string, prompt = false) {
  const out = collector();
  const exit = await runLineRepl({
    input: Readable.from([lines]),
    output: out.stream,
    state: createSessionState(),
    prompt,
  });
  return { exit, output: out.text() };
}

describe("runLineRepl", () => {
  it("prints one reply per line and stops at quit", async () => {
    const { exit, output } = await session("3+4\nans*2\nquit\nnever\n");
    expect(exit).toBe("quit");
    expect(output).toBe(`${BANNER}\n7\n14\nBye.\n`);
  });

  it("keeps going after errors and skips blank lines", async () => {
    const { exit, output } = await session("1/0\n\nprecision 2\n1/3\n");
    expect(exit).toBe("eof");
    expect(output).toBe(
      `${BANNER}\n[error] DIVISION_BY_ZERO: Division by zero\nPrecision set to 2.\n0.33\nBye.\n`,
    );
  });

  it("handles a final line without a newline", async () => {
    const { output } = await session("5!");
    expect(output).toBe(`${BANNER}\n120\nBye.\n`);
  });

  it("prints prompts when asked", async () => {
    const { exit, output } = await session("1+1\n", true);
    expect(exit).toBe("eof");
    expect(output).toBe(`${BANNER}\n> 2\n> \nBye.\n`);
  });
});
