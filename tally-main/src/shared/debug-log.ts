/**
 * Color-coded debug logger.
 *
 * Every line carries a bright magenta [DEBUG] prefix so it stands out in the
 * terminal. Output is off until `setDebugLogging(true)`; hosts switch it on
 * from the TALLY_DEBUG setting.
 */

const RESET = "\x1b[0m";
const MAGENTA = "\x1b[35m";
const CYAN = "\x1b[36m";
const YELLOW = "\x1b[33m";
const RED = "\x1b[31m";

const PREFIX = `${MAGENTA}[DEBUG]${RESET}`;

let enabled = false;

export function setDebugLogging(on: boolean): void {
  enabled = on;
}

export function devLog(...args: unknown[]): void {
  if (enabled) console.error(PREFIX, `${CYAN}INFO${RESET}`, ...args);
}

export function devWarn(...args: unknown[]): void {
  if (enabled) console.error(PREFIX, `${YELLOW}WARN${RESET}`, ...args);
}

export function devError(...args: unknown[]): void {
  if (enabled) console.error(PREFIX, `${RED}ERROR${RESET}`, ...args);
}
