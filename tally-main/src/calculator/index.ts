import type { Stmt } from "./ast.js";
import { Environment, type EnvMemberKind } from "./environment.js";
import { evaluate } from "./evaluator.js";
import { formatNumber } from "./format.js";
import { CalcDecimal } from "./functions.js";
import { parse } from "./parser.js";
import { tokenize } from "./tokenizer.js";
import { CalcError, type CalcErrorCode, type Dec, type Token } from "./types.js";
import { DEFAULT_SETTINGS, type Settings } from "../config/settings.js";
import { devError, devLog, devWarn, setDebugLogging } from "../shared/index.js";

export type CalcResult =
  | { ok: true; value: Dec; output: string; statement: Stmt }
  | { ok: false; error: string; code: CalcErrorCode | "INTERNAL"; pos: number };

export interface Completion {
  name: string;
  kind: EnvMemberKind;
}

function isAlpha(ch: string): boolean {
  return (ch >= "a" && ch <= "z") || (ch >= "A" && ch <= "Z");
}

function isAlphaNum(ch: string): boolean {
  return isAlpha(ch) || (ch >= "0" && ch <= "9");
}

/**
 * Range of the identifier that ends at `end`: the trailing alphanumeric run,
 * starting at its leftmost letter. Undefined when the run holds no letter.
 */
export function identifierRange(input: string, end: number): { start: number; end: number } | undefined {
  let start: number | undefined;
  for (let i = end - 1; i >= 0; i--) {
    const ch = input.charAt(i);
    if (!isAlphaNum(ch)) break;
    if (isAlpha(ch)) start = i;
  }
  return start === undefined ? undefined : { start, end };
}

export function identifierAtEnd(input: string): string | undefined {
  const range = identifierRange(input, input.length);
  return range && input.slice(range.start, range.end);
}

/**
 * One interactive session: the environment, the `ans` register and the
 * display settings, shared by every statement the host submits.
 */
export class CalculatorSession {
  readonly env = Environment.withBuiltins();
  private last: Dec = new CalcDecimal(0);

  constructor(readonly settings: Settings = DEFAULT_SETTINGS) {
    if (settings.debug) setDebugLogging(true);
  }

  get lastResult(): Dec {
    return this.last;
  }

  tokens(input: string): Token[] {
    return tokenize(input);
  }

  /** Evaluates without touching the environment or `ans`. */
  preview(input: string): CalcResult {
    return this.run(input, false);
  }

  /** Evaluates, keeps any assignment and stores the value as `ans`. */
  commit(input: string): CalcResult {
    const result = this.run(input, true);
    if (result.ok) {
      this.last = result.value;
      devLog(`commit ${JSON.stringify(input)} = ${result.output}`);
    } else {
      devError(`commit ${JSON.stringify(input)} failed: ${result.error}`);
    }
    return result;
  }

  complete(prefix: string): Completion[] {
    const completions: Completion[] = [];
    for (const [name, member] of this.env.search(prefix)) {
      completions.push({ name, kind: member.type });
    }
    return completions;
  }

  format(value: Dec): string {
    return formatNumber(value, this.settings.displayDigits);
  }

  private run(input: string, persist: boolean): CalcResult {
    try {
      const statement = parse(tokenize(input), input);
      const value = evaluate(statement, this.env, this.last, persist, {
        maxCallDepth: this.settings.maxCallDepth,
      });
      return { ok: true, value, output: this.format(value), statement };
    } catch (err) {
      if (err instanceof CalcError) {
        return { ok: false, error: err.message, code: err.code, pos: err.pos };
      }
      // Host stack exhaustion from deeply nested input lands here too.
      const message = err instanceof Error ? err.message : "Unknown calculator error";
      devWarn(`unexpected failure for ${JSON.stringify(input)}: ${message}`);
      return { ok: false, error: message, code: "INTERNAL", pos: 0 };
    }
  }
}
