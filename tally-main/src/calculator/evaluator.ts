import type { SessionState } from "../session/state.js";
import { callFunction, factorial, getConstant, isFunctionName } from "./functions.js";
import { parseExpression } from "./parser.js";
import { CalcError, type BinaryOperator, type SyntaxNode } from "./types.js";

/** The slice of session state an expression can read. */
export type EvaluationScope = Pick<SessionState, "lastAnswer" | "memory" | "angleMode">;

function resolveIdentifier(name: string, scope: EvaluationScope, pos: number): number {
  const lowered = name.toLowerCase();
  if (lowered === "ans") return scope.lastAnswer;
  if (lowered === "mem") return scope.memory;

  const constant = getConstant(name);
  if (constant !== undefined) return constant;

  if (isFunctionName(name)) {
    throw new CalcError(`'${name}' is a function, use ${name}(...)`, pos, "UNKNOWN_IDENTIFIER");
  }
  throw new CalcError(`Unknown identifier: ${name}`, pos, "UNKNOWN_IDENTIFIER");
}

function power(base: number, exponent: number, pos: number): number {
  if (base === 1 || (base === -1 && !Number.isFinite(exponent) && !Number.isNaN(exponent))) {
    return 1;
  }
  if (base === 0 && exponent < 0) {
    throw new CalcError("0 cannot be raised to a negative power", pos, "DIVISION_BY_ZERO");
  }
  const result = base ** exponent;
  if (Number.isNaN(result) && !Number.isNaN(base) && !Number.isNaN(exponent)) {
    throw new CalcError(`${base} ** ${exponent} is not a real number`, pos, "DOMAIN_ERROR");
  }
  if (!Number.isFinite(result) && Number.isFinite(base) && Number.isFinite(exponent)) {
    throw new CalcError("Numeric overflow in exponentiation", pos, "OVERFLOW");
  }
  return result;
}

/** Floored quotient and remainder; the quotient is derived from the remainder. */
function floorDivMod(left: number, right: number): [number, number] {
  let mod = left % right;
  let div = (left - mod) / right;
  if (mod !== 0) {
    // Floored: the remainder takes the sign of the divisor
    if ((mod < 0) !== (right < 0)) {
      mod += right;
      div -= 1;
    }
  } else {
    mod = right < 0 ? -0 : 0;
  }

  if (div === 0) {
    // signed zero
    return [Math.sign(left / right) * 0, mod];
  }
  let quotient = Math.floor(div);
  if (div - quotient > 0.5) quotient += 1;
  return [quotient, mod];
}

function applyBinary(op: BinaryOperator, left: number, right: number, pos: number): number {
  switch (op) {
    case "+": return left + right;
    case "-": return left - right;
    case "*": return left * right;
    case "/":
    case "//":
    case "%": {
      if (right === 0) {
        throw new CalcError("Division by zero", pos, "DIVISION_BY_ZERO");
      }
      if (op === "/") return left / right;
      const [quotient, remainder] = floorDivMod(left, right);
      return op === "//" ? quotient : remainder;
    }
    case "**": return power(left, right, pos);
  }
}

export function evaluate(node: SyntaxNode, scope: EvaluationScope): number {
  switch (node.kind) {
    case "number":
      return node.value;

    case "ident":
      return resolveIdentifier(node.name, scope, node.pos);

    case "unary": {
      const operand = evaluate(node.operand, scope);
      if (node.op === "-") return -operand;
      if (node.op === "!") return factorial(operand, node.pos);
      return operand;
    }

    case "binary": {
      const left = evaluate(node.left, scope);
      const right = evaluate(node.right, scope);
      return applyBinary(node.op, left, right, node.pos);
    }

    case "call": {
      const argument = evaluate(node.argument, scope);
      return callFunction(node.fn, argument, { angleMode: scope.angleMode, pos: node.pos });
    }
  }
}

/**
 * Evaluates one statement against the session. On success the result
 * becomes `ans` and is appended to history; a failure leaves state untouched.
 */
export function calculate(input: string, state: SessionState): number {
  const result = evaluate(parseExpression(input), state);
  state.lastAnswer = result;
  state.history.push({ input: input.trim(), result });
  return result;
}
