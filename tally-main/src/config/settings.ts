import { DEFAULT_MAX_CALL_DEPTH } from "../calculator/evaluator.js";
import { DISPLAY_DIGITS } from "../calculator/format.js";

export interface Settings {
  /** Significant digits shown for results. */
  readonly displayDigits: number;
  /** Nesting limit for user-defined function calls. */
  readonly maxCallDepth: number;
  readonly debug: boolean;
}

export const DEFAULT_SETTINGS: Settings = Object.freeze({
  displayDigits: DISPLAY_DIGITS,
  maxCallDepth: DEFAULT_MAX_CALL_DEPTH,
  debug: false,
});

type Env = Readonly<Record<string, string | undefined>>;

function readPositiveIntEnv(env: Env, name: string): number | undefined {
  const raw = env[name];
  if (!raw) return undefined;
  const parsed = Number.parseInt(raw, 10);
  if (!Number.isFinite(parsed) || parsed <= 0) return undefined;
  return parsed;
}

export function loadSettings(env: Env = process.env): Settings {
  return Object.freeze({
    displayDigits: readPositiveIntEnv(env, "TALLY_DISPLAY_DIGITS") ?? DEFAULT_SETTINGS.displayDigits,
    maxCallDepth: readPositiveIntEnv(env, "TALLY_MAX_CALL_DEPTH") ?? DEFAULT_SETTINGS.maxCallDepth,
    debug: env["TALLY_DEBUG"] === "1",
  });
}
