import { Decimal } from "decimal.js";
import { CalcError, type AngleMode, type FunctionName } from "./types.js";

const INTEGER_TOLERANCE = 1e-12;
const MAX_FACTORIAL = 170;

// --- Constants ---

export const CONSTANTS: ReadonlyMap<string, number> = new Map([
  ["pi", Math.PI],
  ["e", Math.E],
  ["tau", 2 * Math.PI],
  ["inf", Number.POSITIVE_INFINITY],
  ["nan", Number.NaN],
]);

export function getConstant(name: string): number | undefined {
  return CONSTANTS.get(name);
}

// --- Name resolution ---

const FUNCTION_NAMES: ReadonlyMap<string, FunctionName | "factorial"> = new Map<string, FunctionName | "factorial">([
  ["sin", "sin"],
  ["cos", "cos"],
  ["tan", "tan"],
  ["asin", "asin"],
  ["acos", "acos"],
  ["atan", "atan"],
  ["exp", "exp"],
  ["log", "log"],
  ["ln", "log"],
  ["log10", "log10"],
  ["sqrt", "sqrt"],
  ["floor", "floor"],
  ["ceil", "ceil"],
  ["round", "round"],
  ["abs", "abs"],
  ["factorial", "factorial"],
]);

/** Maps a call name to its table entry; `ln` is folded into `log`. */
export function resolveFunctionName(name: string): FunctionName | "factorial" | undefined {
  return FUNCTION_NAMES.get(name);
}

export function isFunctionName(name: string): boolean {
  return FUNCTION_NAMES.has(name);
}

// --- Helpers ---

function assertDomain(cond: boolean, name: string, msg: string, pos: number): void {
  if (!cond) {
    throw new CalcError(`${name}: ${msg}`, pos, "DOMAIN_ERROR");
  }
}

export function assertFinite(result: number, input: number, name: string, pos: number): number {
  if (!Number.isFinite(result) && Number.isFinite(input)) {
    throw new CalcError(`${name}: numeric overflow`, pos, "OVERFLOW");
  }
  return result;
}

export function toRadians(x: number, mode: AngleMode): number {
  return mode === "deg" ? (x * Math.PI) / 180 : x;
}

export function fromRadians(x: number, mode: AngleMode): number {
  return mode === "deg" ? (x * 180) / Math.PI : x;
}

export function factorial(x: number, pos: number): number {
  const n = Math.round(x);
  if (Number.isNaN(x) || Math.abs(x - n) > INTEGER_TOLERANCE || n < 0) {
    throw new CalcError("factorial requires a non-negative integer", pos, "DOMAIN_ERROR");
  }
  if (n > MAX_FACTORIAL) {
    throw new CalcError(`factorial: numeric overflow (max ${MAX_FACTORIAL}!)`, pos, "OVERFLOW");
  }
  // Exact product, rounded to a double once
  let result = 1n;
  for (let i = 2n; i <= BigInt(n); i++) {
    result *= i;
  }
  return Number(result);
}

function roundHalfEven(x: number): number {
  if (!Number.isFinite(x)) return x;
  return new Decimal(x).toDecimalPlaces(0, Decimal.ROUND_HALF_EVEN).toNumber();
}

// --- Function table ---

export interface FunctionContext {
  angleMode: AngleMode;
  pos: number;
}

type NumericFunction = (x: number, ctx: FunctionContext) => number;

export const FUNCTIONS: Record<FunctionName, NumericFunction> = {
  // Trig: forward functions take the argument in the active mode,
  // inverse functions return in the active mode
  sin: (x, { angleMode }) => Math.sin(toRadians(x, angleMode)),
  cos: (x, { angleMode }) => Math.cos(toRadians(x, angleMode)),
  tan: (x, { angleMode }) => Math.tan(toRadians(x, angleMode)),
  asin: (x, { angleMode, pos }) => {
    assertDomain(Number.isNaN(x) || Math.abs(x) <= 1, "asin", "argument must be in [-1, 1]", pos);
    return fromRadians(Math.asin(x), angleMode);
  },
  acos: (x, { angleMode, pos }) => {
    assertDomain(Number.isNaN(x) || Math.abs(x) <= 1, "acos", "argument must be in [-1, 1]", pos);
    return fromRadians(Math.acos(x), angleMode);
  },
  atan: (x, { angleMode }) => fromRadians(Math.atan(x), angleMode),

  // Exponential / logarithmic
  exp: (x, { pos }) => assertFinite(Math.exp(x), x, "exp", pos),
  log: (x, { pos }) => {
    assertDomain(!(x <= 0), "log", "argument must be positive", pos);
    return Math.log(x);
  },
  log10: (x, { pos }) => {
    assertDomain(!(x <= 0), "log10", "argument must be positive", pos);
    return Math.log10(x);
  },
  sqrt: (x, { pos }) => {
    assertDomain(!(x < 0), "sqrt", "argument must be non-negative", pos);
    return Math.sqrt(x);
  },

  // Rounding
  floor: (x) => Math.floor(x),
  ceil: (x) => Math.ceil(x),
  round: (x) => roundHalfEven(x),
  abs: (x) => Math.abs(x),
};

export function callFunction(fn: FunctionName, x: number, ctx: FunctionContext): number {
  return FUNCTIONS[fn](x, ctx);
}
