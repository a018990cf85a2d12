import type { CalcErrorCode } from "../calculator/types.js";
import type { SessionState } from "../session/state.js";

export type Reply =
  | { kind: "result"; input: string; value: number; text: string }
  | { kind: "info"; text: string }
  | { kind: "error"; code: CalcErrorCode | "INTERNAL"; text: string }
  | { kind: "clear"; text: string }
  | { kind: "exit"; text: string }
  | { kind: "none" };

export interface CommandDefinition {
  name: string;
  usage: string;
  run: (args: string, state: SessionState) => Reply;
}
