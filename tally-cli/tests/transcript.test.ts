import { describe, expect, it } from "vitest";
import { createSessionState, handleLine } from "tally-main";
import {
  clamp,
  createEntry,
  entriesForReply,
  toDisplayLines,
  wrapContent,
  wrapSegment,
} from "../src/app/transcript.js";

function summary(input: string) {
  const state = createSessionState();
  return entriesForReply(input, handleLine(input, state)).map(({ kind, content }) => ({ kind, content }));
}

describe("entriesForReply", () => {
  it("echoes the input above a result", () => {
    expect(summary("3+4")).toEqual([
      { kind: "input", content: "3+4" },
      { kind: "result", content: "7" },
    ]);
  });

  it("echoes the input above an error", () => {
    expect(summary("1/0")).toEqual([
      { kind: "input", content: "1/0" },
      { kind: "error", content: "[error] DIVISION_BY_ZERO: Division by zero" },
    ]);
  });

  it("shows command output as info", () => {
    expect(summary("mode")).toEqual([
      { kind: "input", content: "mode" },
      { kind: "info", content: "Angle mode: rad" },
    ]);
  });

  it("keeps only the notice after clear", () => {
    expect(summary("clear")).toEqual([{ kind: "info", content: "History cleared." }]);
  });

  it("adds nothing for blank input", () => {
    expect(summary("   ")).toEqual([]);
  });

  it("gives every entry a distinct id", () => {
    const first = createEntry("info", "a");
    const second = createEntry("info", "a");
    expect(first.id).not.toBe(second.id);
  });
});

describe("wrapSegment", () => {
  it("keeps lines that fit untouched", () => {
    expect(wrapSegment("  mr               Print memory value", 80)).toEqual([
      "  mr               Print memory value",
    ]);
  });

  it("wraps on word boundaries", () => {
    expect(wrapSegment("the quick brown fox", 10)).toEqual(["the quick", "brown fox"]);
  });

  it("splits words longer than the width", () => {
    expect(wrapSegment("abcdefghij", 4)).toEqual(["abcd", "efgh", "ij"]);
  });
});

describe("wrapContent", () => {
  it("preserves blank lines", () => {
    expect(wrapContent("a\n\nb", 10)).toEqual(["a", "", "b"]);
  });

  it("treats a zero width as one column", () => {
    expect(wrapContent("ab", 0)).toEqual(["a", "b"]);
  });
});

describe("toDisplayLines", () => {
  it("colours each entry kind", () => {
    const entries = [
      createEntry("input", "1/0"),
      createEntry("error", "[error] X"),
      createEntry("input", "2+2"),
      createEntry("result", "4"),
      createEntry("info", "Bye."),
    ];
    expect(toDisplayLines(entries, 80)).toEqual([
      { text: "> 1/0", color: "green" },
      { text: "  [error] X", color: "red" },
      { text: "> 2+2", color: "green" },
      { text: "  4", color: "cyan", bold: true },
      { text: "  Bye." },
    ]);
  });

  it("wraps long results to the width minus the indent", () => {
    expect(toDisplayLines([createEntry("result", "12345678")], 6)).toEqual([
      { text: "  1234", color: "cyan", bold: true },
      { text: "  5678", color: "cyan", bold: true },
    ]);
  });
});

describe("clamp", () => {
  it("bounds a value", () => {
    expect(clamp(5, 0, 3)).toBe(3);
    expect(clamp(-1, 0, 3)).toBe(0);
    expect(clamp(2, 0, 3)).toBe(2);
  });
});
