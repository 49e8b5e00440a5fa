import { CalcDecimal, PRECISION_DIGITS } from "./functions.js";
import type { Token, TokenType } from "./types.js";

const SINGLE_CHAR_TOKENS: Record<string, TokenType> = {
  "(": "LPAREN",
  ")": "RPAREN",
  ",": "COMMA",
  ".": "DOT",
  "-": "MINUS",
  "+": "PLUS",
  "/": "SLASH",
  "*": "STAR",
  "=": "EQUAL",
  "^": "CARET",
};

function isDigit(ch: string | undefined): boolean {
  return ch !== undefined && ch >= "0" && ch <= "9";
}

function isAlpha(ch: string | undefined): boolean {
  return ch !== undefined && ((ch >= "a" && ch <= "z") || (ch >= "A" && ch <= "Z"));
}

function isAlphaNum(ch: string | undefined): boolean {
  return isAlpha(ch) || isDigit(ch);
}

function readNumber(input: string, start: number): Token {
  let i = start;
  while (isDigit(input[i])) i++;

  // A dot only belongs to the number when a digit follows it.
  if (input[i] === "." && isDigit(input[i + 1])) {
    i++;
    while (isDigit(input[i])) i++;
  }

  // Construction keeps every digit; round to the working precision up front.
  return {
    type: "NUMBER",
    start,
    end: i,
    literal: new CalcDecimal(input.slice(start, i)).toSignificantDigits(PRECISION_DIGITS),
  };
}

function readIdent(input: string, start: number): Token {
  let i = start;
  while (isAlphaNum(input[i])) i++;
  return { type: "IDENT", start, end: i };
}

/**
 * Splits `input` into tokens terminated by an EOF token.
 *
 * Never throws: characters outside the language become UNKNOWN tokens and
 * are rejected by the parser only if it reaches them.
 */
export function tokenize(input: string): Token[] {
  const tokens: Token[] = [];
  let i = 0;

  while (i < input.length) {
    const ch = input[i];

    if (ch === " ") {
      i++;
      continue;
    }

    if (isDigit(ch)) {
      const tok = readNumber(input, i);
      tokens.push(tok);
      i = tok.end;
      continue;
    }

    if (isAlpha(ch)) {
      const tok = readIdent(input, i);
      tokens.push(tok);
      i = tok.end;
      continue;
    }

    const tokenType = ch === undefined ? undefined : SINGLE_CHAR_TOKENS[ch];
    if (tokenType) {
      tokens.push({ type: tokenType, start: i, end: i + 1 });
      i++;
      continue;
    }

    // Astral code points span two UTF-16 units; keep them in one token.
    const width = (input.codePointAt(i) ?? 0) > 0xffff ? 2 : 1;
    tokens.push({ type: "UNKNOWN", start: i, end: i + width });
    i += width;
  }

  tokens.push({ type: "EOF", start: i, end: i });
  return tokens;
}
