import { type Decimal } from "decimal.js";

export type Dec = InstanceType<typeof Decimal>;

export type TokenType =
  | "LPAREN"
  | "RPAREN"
  | "COMMA"
  | "DOT"
  | "MINUS"
  | "PLUS"
  | "SLASH"
  | "STAR"
  | "CARET"
  | "IDENT"
  | "EQUAL"
  | "NUMBER"
  | "EOF"
  | "UNKNOWN";

/** Half-open span `[start, end)` into the scanned source. */
export interface Token {
  type: TokenType;
  start: number;
  end: number;
  literal?: Dec;
}

export type CalcErrorCode =
  | "UNEXPECTED_TOKEN"
  | "UNCLOSED_PAREN"
  | "INVALID_ASSIGNMENT"
  | "TRAILING_INPUT"
  | "UNDECLARED_VARIABLE"
  | "UNKNOWN_FUNCTION"
  | "WRONG_ARITY"
  | "EMPTY_ARGUMENTS"
  | "RECURSION_LIMIT"
  | "PRECISION_LIMIT";

export class CalcError extends Error {
  constructor(
    message: string,
    public pos: number,
    public code: CalcErrorCode,
  ) {
    super(message);
    this.name = "CalcError";
  }
}
