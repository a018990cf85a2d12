import { describe, expect, it } from "vitest";
import { DEFAULT_CONFIG } from "../../src/config/calculator.js";
import { createSessionState, resetSessionState } from "../../src/session/state.js";

describe("session state", () => {
  it("starts from the default configuration", () => {
    const state = createSessionState();
    expect(state.lastAnswer).toBe(0);
    expect(state.memory).toBe(0);
    expect(state.angleMode).toBe("rad");
    expect(state.precision).toBe(10);
    expect(state.history.capacity).toBe(20);
    expect(state.config).toBe(DEFAULT_CONFIG);
  });

  it("takes mode, precision and history size from the config", () => {
    const state = createSessionState({ angleMode: "deg", precision: 4, historySize: 5 });
    expect(state.angleMode).toBe("deg");
    expect(state.precision).toBe(4);
    expect(state.history.capacity).toBe(5);
  });

  it("reset restores the configured defaults", () => {
    const state = createSessionState({ angleMode: "deg", precision: 4, historySize: 5 });
    state.lastAnswer = 9;
    state.memory = 3;
    state.angleMode = "rad";
    state.precision = 1;
    state.history.push({ input: "9", result: 9 });

    resetSessionState(state);

    expect(state.lastAnswer).toBe(0);
    expect(state.memory).toBe(0);
    expect(state.angleMode).toBe("deg");
    expect(state.precision).toBe(4);
    expect(state.history.size).toBe(0);
  });
});
