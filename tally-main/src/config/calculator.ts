import { dirname, resolve } from "node:path";
import { fileURLToPath } from "node:url";
import type { AngleMode } from "../calculator/types.js";
import { devLog, devWarn, readJsonFile } from "../shared/index.js";

// ── Types ──────────────────────────────────────────────────────────

export interface CalculatorConfig {
  angleMode: AngleMode;
  precision: number;
  historySize: number;
}

// ── Defaults ───────────────────────────────────────────────────────

export const MAX_PRECISION = 20;

export const DEFAULT_CONFIG: Readonly<CalculatorConfig> = {
  angleMode: "rad",
  precision: 10,
  historySize: 20,
};

// ── Config file path ───────────────────────────────────────────────

const thisDir = dirname(fileURLToPath(import.meta.url));
export const DEFAULT_CONFIG_PATH = resolve(thisDir, "..", "..", "config", "calculator.json");

// ── Parsing helpers ────────────────────────────────────────────────

export function parseAngleMode(raw: string | undefined): AngleMode | undefined {
  const normalized = raw?.trim().toLowerCase();
  if (normalized === "deg" || normalized === "degrees") return "deg";
  if (normalized === "rad" || normalized === "radians") return "rad";
  return undefined;
}

function parseIntInRange(raw: string | undefined, min: number, max: number): number | undefined {
  if (!raw || !/^\d+$/.test(raw.trim())) return undefined;
  const n = Number.parseInt(raw, 10);
  return n >= min && n <= max ? n : undefined;
}

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isValidPrecision(value: unknown): value is number {
  return typeof value === "number" && Number.isInteger(value) && value >= 0 && value <= MAX_PRECISION;
}

function isValidHistorySize(value: unknown): value is number {
  return typeof value === "number" && Number.isInteger(value) && value >= 1;
}

// ── Type guard ─────────────────────────────────────────────────────

function isPartialConfig(value: unknown): value is Partial<CalculatorConfig> {
  if (!isObject(value)) return false;
  if (value["angleMode"] !== undefined && value["angleMode"] !== "deg" && value["angleMode"] !== "rad") {
    return false;
  }
  if (value["precision"] !== undefined && !isValidPrecision(value["precision"])) return false;
  if (value["historySize"] !== undefined && !isValidHistorySize(value["historySize"])) return false;
  return true;
}

// ── Env-var overrides ──────────────────────────────────────────────

function applyEnv(config: CalculatorConfig, env: NodeJS.ProcessEnv): CalculatorConfig {
  return {
    angleMode: parseAngleMode(env["TALLY_ANGLE_MODE"]) ?? config.angleMode,
    precision: parseIntInRange(env["TALLY_PRECISION"], 0, MAX_PRECISION) ?? config.precision,
    historySize: parseIntInRange(env["TALLY_HISTORY_SIZE"], 1, Number.MAX_SAFE_INTEGER) ?? config.historySize,
  };
}

// ── Loader ─────────────────────────────────────────────────────────

export interface LoadConfigOptions {
  filePath?: string;
  env?: NodeJS.ProcessEnv;
}

export async function loadCalculatorConfig(options: LoadConfigOptions = {}): Promise<CalculatorConfig> {
  const env = options.env ?? process.env;
  const fromEnv = env["TALLY_CONFIG_PATH"]?.trim();
  const filePath = options.filePath ?? (fromEnv ? resolve(fromEnv) : DEFAULT_CONFIG_PATH);

  const raw = await readJsonFile(filePath, filePath);
  let base: CalculatorConfig = { ...DEFAULT_CONFIG };

  if (raw === undefined) {
    devWarn("Calculator config not found, using defaults.");
  } else if (!isPartialConfig(raw)) {
    devWarn(`Calculator config has invalid shape, using defaults: ${filePath}`);
  } else {
    base = { ...base, ...raw };
    devLog(`Loaded calculator config from ${filePath}`);
  }

  return applyEnv(base, env);
}
