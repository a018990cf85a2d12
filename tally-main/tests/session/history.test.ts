import { describe, expect, it } from "vitest";
import { History } from "../../src/session/history.js";

describe("History", () => {
  it("keeps entries in insertion order", () => {
    const history = new History(5);
    history.push({ input: "1+1", result: 2 });
    history.push({ input: "2*3", result: 6 });
    expect(history.list()).toEqual([
      { input: "1+1", result: 2 },
      { input: "2*3", result: 6 },
    ]);
    expect(history.size).toBe(2);
  });

  it("evicts the oldest entry at capacity", () => {
    const history = new History(3);
    for (const [i, input] of ["a", "b", "c", "d"].entries()) {
      history.push({ input, result: i });
    }
    expect(history.size).toBe(3);
    expect(history.list().map((entry) => entry.input)).toEqual(["b", "c", "d"]);
  });

  it("returns a copy from list()", () => {
    const history = new History(2);
    history.push({ input: "1", result: 1 });
    const snapshot = history.list();
    history.push({ input: "2", result: 2 });
    expect(snapshot).toHaveLength(1);
  });

  it("clears all entries", () => {
    const history = new History(2);
    history.push({ input: "1", result: 1 });
    history.clear();
    expect(history.size).toBe(0);
    expect(history.list()).toEqual([]);
  });

  it("rejects a capacity below one", () => {
    expect(() => new History(0)).toThrow(RangeError);
    expect(() => new History(2.5)).toThrow("History capacity must be a positive integer, got 2.5");
  });
});
