import { calculate, evaluate } from "../calculator/evaluator.js";
import { formatResult } from "../calculator/format.js";
import { parseExpression } from "../calculator/parser.js";
import { CalcError } from "../calculator/types.js";
import { MAX_PRECISION, parseAngleMode } from "../config/calculator.js";
import { resetSessionState, type SessionState } from "../session/state.js";
import { devError, devLog } from "../shared/index.js";
import { HELP_TEXT } from "./help.js";
import type { CommandDefinition, Reply } from "./types.js";

function usageError(usage: string): CalcError {
  return new CalcError(`Usage: ${usage}`, -1, "VALUE_ERROR");
}

function noArgs(name: string, run: (state: SessionState) => Reply): CommandDefinition {
  return {
    name,
    usage: name,
    run: (args, state) => {
      if (args.length > 0) throw usageError(name);
      return run(state);
    },
  };
}

/** Evaluates a command operand without touching `ans` or history; empty means `ans`. */
function operandOrAnswer(args: string, state: SessionState): number {
  if (args.length === 0) return state.lastAnswer;
  return evaluate(parseExpression(args), state);
}

function memoryReply(state: SessionState): Reply {
  return { kind: "info", text: `Memory = ${formatResult(state.memory, state.precision)}` };
}

function formatHistory(state: SessionState): string {
  const entries = state.history.list();
  if (entries.length === 0) return "(no history)";
  return entries
    .map((entry, i) => `${String(i + 1).padStart(2)}: ${entry.input}  =  ${formatResult(entry.result, state.precision)}`)
    .join("\n");
}

function setPrecision(args: string, state: SessionState): Reply {
  if (args.length === 0) {
    return { kind: "info", text: `Precision: ${state.precision}` };
  }
  if (!/^[+]?\d+$/.test(args)) {
    throw new CalcError(`precision must be a non-negative integer, got '${args}'`, -1, "VALUE_ERROR");
  }
  const requested = Number.parseInt(args, 10);
  state.precision = Math.min(requested, MAX_PRECISION);
  const capped = requested > MAX_PRECISION ? " (maximum)" : "";
  return { kind: "info", text: `Precision set to ${state.precision}${capped}.` };
}

function setMode(args: string, state: SessionState): Reply {
  if (args.length === 0) {
    return { kind: "info", text: `Angle mode: ${state.angleMode}` };
  }
  const mode = parseAngleMode(args);
  if (!mode) throw usageError("mode deg|rad");
  state.angleMode = mode;
  return { kind: "info", text: `Angle mode set to ${mode}.` };
}

const COMMAND_LIST: CommandDefinition[] = [
  noArgs("help", () => ({ kind: "info", text: HELP_TEXT })),
  noArgs("history", (state) => ({ kind: "info", text: formatHistory(state) })),
  noArgs("clear", (state) => {
    state.history.clear();
    return { kind: "clear", text: "History cleared." };
  }),
  { name: "mode", usage: "mode deg|rad", run: setMode },
  { name: "precision", usage: "precision N", run: setPrecision },
  {
    name: "m+",
    usage: "m+ [x]",
    run: (args, state) => {
      state.memory += operandOrAnswer(args, state);
      return memoryReply(state);
    },
  },
  {
    name: "m-",
    usage: "m- [x]",
    run: (args, state) => {
      state.memory -= operandOrAnswer(args, state);
      return memoryReply(state);
    },
  },
  {
    name: "ms",
    usage: "ms [x]",
    run: (args, state) => {
      state.memory = operandOrAnswer(args, state);
      return memoryReply(state);
    },
  },
  noArgs("mr", (state) => memoryReply(state)),
  noArgs("mc", (state) => {
    state.memory = 0;
    return { kind: "info", text: "Memory cleared." };
  }),
  noArgs("reset", (state) => {
    resetSessionState(state);
    return { kind: "info", text: "State reset." };
  }),
  noArgs("quit", () => ({ kind: "exit", text: "Bye." })),
  noArgs("exit", () => ({ kind: "exit", text: "Bye." })),
];

export const COMMANDS: ReadonlyMap<string, CommandDefinition> = new Map(
  COMMAND_LIST.map((def) => [def.name, def]),
);

interface CommandMatch {
  command: CommandDefinition;
  args: string;
}

export function matchCommand(line: string): CommandMatch | undefined {
  const lower = line.toLowerCase();

  // m+ / m- may be written without a space before the operand
  const memoryOp = lower.slice(0, 2);
  if (memoryOp === "m+" || memoryOp === "m-") {
    const command = COMMANDS.get(memoryOp);
    return command ? { command, args: line.slice(2).trim() } : undefined;
  }

  const word = lower.split(/\s+/, 1)[0] ?? "";
  const command = COMMANDS.get(word);
  if (!command) return undefined;
  return { command, args: line.slice(word.length).trim() };
}

export function toErrorReply(err: unknown): Reply {
  if (err instanceof CalcError) {
    return { kind: "error", code: err.code, text: `[error] ${err.code}: ${err.message}` };
  }
  devError("Unexpected failure while handling input", err);
  const message = err instanceof Error ? err.message : "Unknown calculator error";
  return { kind: "error", code: "INTERNAL", text: `[error] ${message}` };
}

/**
 * Handles one line of user input: a command when the first word names one,
 * otherwise an expression statement. Errors never escape; they come back as
 * an `error` reply and leave the session unchanged.
 */
export function handleLine(line: string, state: SessionState): Reply {
  const trimmed = line.trim();
  if (trimmed.length === 0) return { kind: "none" };

  const match = matchCommand(trimmed);
  const start = Date.now();

  try {
    if (match) {
      return match.command.run(match.args, state);
    }

    const value = calculate(trimmed, state);
    devLog(`Evaluated '${trimmed}' in ${Date.now() - start}ms`);
    return { kind: "result", input: trimmed, value, text: formatResult(value, state.precision) };
  } catch (err) {
    return toErrorReply(err);
  }
}

export { HELP_TEXT } from "./help.js";
export type { CommandDefinition, Reply } from "./types.js";
