export { tokenize } from "./calculator/tokenizer.js";
export { parse, parseExpression } from "./calculator/parser.js";
export { evaluate, calculate, type EvaluationScope } from "./calculator/evaluator.js";
export { formatResult } from "./calculator/format.js";
export { CONSTANTS, FUNCTIONS, factorial, resolveFunctionName } from "./calculator/functions.js";
export {
  CalcError,
  type AngleMode,
  type BinaryOperator,
  type CalcErrorCode,
  type FunctionName,
  type SyntaxNode,
  type Token,
  type TokenType,
  type UnaryOperator,
} from "./calculator/types.js";
export { COMMANDS, HELP_TEXT, handleLine, matchCommand, type Reply } from "./commands/index.js";
export {
  DEFAULT_CONFIG,
  MAX_PRECISION,
  loadCalculatorConfig,
  type CalculatorConfig,
} from "./config/calculator.js";
export { History, type HistoryEntry } from "./session/history.js";
export { createSessionState, resetSessionState, type SessionState } from "./session/state.js";
export { BANNER, runLineRepl, type ReplExit } from "./repl/line-repl.js";
export { INTERRUPT_EXIT_CODE, createSession, main } from "./app/main.js";
export { devError, devLog, devWarn } from "./shared/index.js";
