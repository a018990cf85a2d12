import { beforeEach, describe, expect, it } from "vitest";
import { HELP_TEXT, handleLine, matchCommand } from "../../src/commands/index.js";
import { createSessionState, type SessionState } from "../../src/session/state.js";

let state: SessionState;

function text(line: string): string {
  const reply = handleLine(line, state);
  if (reply.kind === "none") throw new Error(`no reply for '${line}'`);
  return reply.text;
}

beforeEach(() => {
  state = createSessionState();
});

describe("handleLine", () => {
  describe("expressions", () => {
    it("returns a result reply", () => {
      expect(handleLine("3+4", state)).toEqual({ kind: "result", input: "3+4", value: 7, text: "7" });
    });

    it("evaluates the worked scenarios", () => {
      expect(text("2*(3+4)^2 / 7")).toBe("14");
      expect(text("5!")).toBe("120");
      expect(text("sqrt(16) + log10(100)")).toBe("6");
    });

    it("chains through ans", () => {
      expect(text("3+4")).toBe("7");
      expect(text("ans*2")).toBe("14");
      expect(state.lastAnswer).toBe(14);
    });

    it("ignores blank lines", () => {
      expect(handleLine("", state)).toEqual({ kind: "none" });
      expect(handleLine("   ", state)).toEqual({ kind: "none" });
    });
  });

  describe("errors", () => {
    it("reports the error kind and message on one line", () => {
      expect(handleLine("1/0", state)).toEqual({
        kind: "error",
        code: "DIVISION_BY_ZERO",
        text: "[error] DIVISION_BY_ZERO: Division by zero",
      });
      expect(text("foo(1)")).toBe("[error] UNKNOWN_IDENTIFIER: Unknown function: foo");
      expect(text("sqrt(-1)")).toBe("[error] DOMAIN_ERROR: sqrt: argument must be non-negative");
    });

    it("leaves the session unchanged", () => {
      text("5");
      const reply = handleLine("(1+2", state);
      expect(reply.kind === "error" && reply.code).toBe("SYNTAX_ERROR");
      expect(state.lastAnswer).toBe(5);
      expect(state.history.size).toBe(1);
    });
  });

  describe("precision", () => {
    it("precision 2 then 1/3 prints 0.33", () => {
      expect(text("precision 2")).toBe("Precision set to 2.");
      expect(text("1/3")).toBe("0.33");
    });

    it("reports the current precision without an argument", () => {
      expect(text("precision")).toBe("Precision: 10");
    });

    it("caps large values", () => {
      expect(text("precision 50")).toBe("Precision set to 20 (maximum).");
      expect(state.precision).toBe(20);
    });

    it("rejects negative and non-integer values with VALUE_ERROR", () => {
      expect(text("precision -1")).toBe("[error] VALUE_ERROR: precision must be a non-negative integer, got '-1'");
      expect(text("precision 2.5")).toBe("[error] VALUE_ERROR: precision must be a non-negative integer, got '2.5'");
      expect(state.precision).toBe(10);
    });
  });

  describe("mode", () => {
    it("reports the current mode", () => {
      expect(text("mode")).toBe("Angle mode: rad");
    });

    it("mode deg makes sin(90) = 1", () => {
      expect(text("mode deg")).toBe("Angle mode set to deg.");
      expect(text("sin(90)")).toBe("1");
    });

    it("mode rad then sin(3.14159265) is about 0", () => {
      text("mode deg");
      expect(text("mode rad")).toBe("Angle mode set to rad.");
      const reply = handleLine("sin(3.14159265)", state);
      expect(reply.kind).toBe("result");
      if (reply.kind === "result") {
        expect(Math.abs(reply.value)).toBeLessThan(1e-6);
      }
    });

    it("matches commands case-insensitively", () => {
      expect(text("MODE DEG")).toBe("Angle mode set to deg.");
      expect(state.angleMode).toBe("deg");
    });

    it("rejects unknown modes", () => {
      expect(text("mode grad")).toBe("[error] VALUE_ERROR: Usage: mode deg|rad");
      expect(state.angleMode).toBe("rad");
    });
  });

  describe("history", () => {
    it("prints numbered entries with the session precision", () => {
      text("3+4");
      text("ans*2");
      text("1/3");
      text("precision 3");
      expect(text("history")).toBe(" 1: 3+4  =  7\n 2: ans*2  =  14\n 3: 1/3  =  0.333");
    });

    it("is idempotent", () => {
      text("3+4");
      const first = text("history");
      const second = text("history");
      expect(second).toBe(first);
      expect(state.history.size).toBe(1);
    });

    it("reports an empty history", () => {
      expect(text("history")).toBe("(no history)");
    });

    it("clear empties the history but keeps ans", () => {
      text("3+4");
      expect(handleLine("clear", state)).toEqual({ kind: "clear", text: "History cleared." });
      expect(state.history.size).toBe(0);
      expect(text("ans")).toBe("7");
    });

    it("drops the oldest entry past capacity", () => {
      state = createSessionState({ angleMode: "rad", precision: 4, historySize: 2 });
      text("1");
      text("2");
      text("3");
      expect(text("history")).toBe(" 1: 2  =  2\n 2: 3  =  3");
    });
  });

  describe("memory", () => {
    it("stores, adds, subtracts and recalls", () => {
      expect(text("ms 5")).toBe("Memory = 5");
      expect(text("m+ 2*3")).toBe("Memory = 11");
      expect(text("m-1")).toBe("Memory = 10");
      expect(text("mr")).toBe("Memory = 10");
      expect(text("mem + 1")).toBe("11");
    });

    it("uses ans when no operand is given", () => {
      text("3+4");
      expect(text("m+")).toBe("Memory = 7");
      expect(text("m-")).toBe("Memory = 0");
    });

    it("does not touch ans or history", () => {
      text("3+4");
      text("m+ 100");
      expect(state.lastAnswer).toBe(7);
      expect(state.history.size).toBe(1);
    });

    it("leaves memory unchanged when the operand fails", () => {
      text("ms 2");
      expect(text("m+ 1/0")).toBe("[error] DIVISION_BY_ZERO: Division by zero");
      expect(state.memory).toBe(2);
    });

    it("mc clears memory", () => {
      text("ms 9");
      expect(text("mc")).toBe("Memory cleared.");
      expect(state.memory).toBe(0);
    });
  });

  describe("session commands", () => {
    it("help prints the help text", () => {
      expect(handleLine("help", state)).toEqual({ kind: "info", text: HELP_TEXT });
    });

    it("commands without arguments reject extra words", () => {
      expect(text("help me")).toBe("[error] VALUE_ERROR: Usage: help");
    });

    it("reset restores defaults", () => {
      text("mode deg");
      text("precision 2");
      text("ms 4");
      text("3+4");
      expect(text("reset")).toBe("State reset.");
      expect(state.angleMode).toBe("rad");
      expect(state.precision).toBe(10);
      expect(state.memory).toBe(0);
      expect(state.lastAnswer).toBe(0);
      expect(state.history.size).toBe(0);
    });

    it("quit and exit end the session", () => {
      expect(handleLine("quit", state)).toEqual({ kind: "exit", text: "Bye." });
      expect(handleLine("EXIT", state)).toEqual({ kind: "exit", text: "Bye." });
    });
  });
});

describe("matchCommand", () => {
  it("matches memory operators without a space", () => {
    const match = matchCommand("m+5");
    expect(match?.command.name).toBe("m+");
    expect(match?.args).toBe("5");
  });

  it("splits the first word from its arguments", () => {
    const match = matchCommand("precision   4");
    expect(match?.command.name).toBe("precision");
    expect(match?.args).toBe("4");
  });

  it("leaves expressions alone", () => {
    expect(matchCommand("3+4")).toBeUndefined();
    expect(matchCommand("mem+1")).toBeUndefined();
    expect(matchCommand("modem")).toBeUndefined();
  });
});
