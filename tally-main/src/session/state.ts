import type { AngleMode } from "../calculator/types.js";
import { DEFAULT_CONFIG, type CalculatorConfig } from "../config/calculator.js";
import { History } from "./history.js";

/**
 * Mutable, process-lifetime session record. Passed by reference into every
 * evaluation; nothing about it is global.
 */
export interface SessionState {
  lastAnswer: number;
  memory: number;
  angleMode: AngleMode;
  precision: number;
  readonly history: History;
  readonly config: Readonly<CalculatorConfig>;
}

export function createSessionState(config: Readonly<CalculatorConfig> = DEFAULT_CONFIG): SessionState {
  return {
    lastAnswer: 0,
    memory: 0,
    angleMode: config.angleMode,
    precision: config.precision,
    history: new History(config.historySize),
    config,
  };
}

/** Restores variables, mode, precision and history to the configured defaults. */
export function resetSessionState(state: SessionState): void {
  state.lastAnswer = 0;
  state.memory = 0;
  state.angleMode = state.config.angleMode;
  state.precision = state.config.precision;
  state.history.clear();
}
