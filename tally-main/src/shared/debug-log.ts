/**
 * Color-coded debug logger.
 *
 * Silent unless TALLY_DEBUG=1. Lines go to stderr with a [DEBUG] prefix in
 * bright magenta so they never mix with calculator results on stdout:
 *
 *   TALLY_DEBUG=1 npm start 2> debug.log
 */

const RESET = "\x1b[0m";
const MAGENTA = "\x1b[35m";
const CYAN = "\x1b[36m";
const YELLOW = "\x1b[33m";
const RED = "\x1b[31m";

const PREFIX = `${MAGENTA}[DEBUG]${RESET}`;

export function isDebugEnabled(): boolean {
  return process.env["TALLY_DEBUG"] === "1";
}

export function devLog(...args: unknown[]): void {
  if (!isDebugEnabled()) return;
  console.error(PREFIX, `${CYAN}INFO${RESET}`, ...args);
}

export function devWarn(...args: unknown[]): void {
  if (!isDebugEnabled()) return;
  console.error(PREFIX, `${YELLOW}WARN${RESET}`, ...args);
}

export function devError(...args: unknown[]): void {
  if (!isDebugEnabled()) return;
  console.error(PREFIX, `${RED}ERROR${RESET}`, ...args);
}
