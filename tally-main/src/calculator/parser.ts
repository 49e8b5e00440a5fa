import { exprPos, type Expr, type Stmt } from "./ast.js";
import { CalcError, type Token, type TokenType } from "./types.js";

/**
 * Recursive-descent parser for a single statement.
 *
 * Precedence, loosest first: `+ -`, `* /`, unary `+ -`, `^`. Exponentiation
 * folds to the left like the other binary levels, so `2^3^2` is `(2^3)^2`.
 * Its right operand is a signed primary, so `2^-1` parses without pulling
 * the rest of the chain into the exponent.
 *
 * `source` is the text `tokens` were scanned from; names are read from it
 * through the token spans.
 */
export function parse(tokens: Token[], source: string): Stmt {
  let pos = 0;
  const eof: Token = { type: "EOF", start: source.length, end: source.length };

  function peek(): Token {
    return tokens[pos] ?? eof;
  }

  function advance(): Token {
    const tok = peek();
    if (tok.type !== "EOF") pos++;
    return tok;
  }

  function match(...types: TokenType[]): Token | undefined {
    const tok = peek();
    return types.includes(tok.type) ? advance() : undefined;
  }

  function expectClose(message: string): void {
    if (!match("RPAREN")) {
      throw new CalcError(message, peek().start, "UNCLOSED_PAREN");
    }
  }

  function text(tok: Token): string {
    return source.slice(tok.start, tok.end);
  }

  function statement(): Stmt {
    const target = expression();
    if (!match("EQUAL")) {
      return { kind: "expression", expr: target };
    }

    const value = expression();
    switch (target.kind) {
      case "variable":
        return { kind: "variableAssignment", name: target.name, value };
      case "call": {
        const params = target.args.map((arg) => {
          if (arg.kind !== "variable") {
            throw new CalcError("Invalid function parameter", exprPos(arg), "INVALID_ASSIGNMENT");
          }
          return arg.name;
        });
        return { kind: "functionAssignment", name: target.name, params, body: value };
      }
      default:
        throw new CalcError(
          "Expected function or variable assignment",
          exprPos(target),
          "INVALID_ASSIGNMENT",
        );
    }
  }

  function expression(): Expr {
    return term();
  }

  function term(): Expr {
    let expr = factor();
    for (let operator = match("PLUS", "MINUS"); operator; operator = match("PLUS", "MINUS")) {
      expr = { kind: "binary", left: expr, operator, right: factor() };
    }
    return expr;
  }

  function factor(): Expr {
    let expr = unary();
    for (let operator = match("STAR", "SLASH"); operator; operator = match("STAR", "SLASH")) {
      expr = { kind: "binary", left: expr, operator, right: unary() };
    }
    return expr;
  }

  function unary(): Expr {
    const operator = match("MINUS", "PLUS");
    if (operator) {
      return { kind: "unary", operator, operand: unary() };
    }
    return exponent();
  }

  function exponent(): Expr {
    let expr = primary();
    for (let operator = match("CARET"); operator; operator = match("CARET")) {
      expr = { kind: "binary", left: expr, operator, right: signedPrimary() };
    }
    return expr;
  }

  function signedPrimary(): Expr {
    const operator = match("MINUS", "PLUS");
    if (operator) {
      return { kind: "unary", operator, operand: signedPrimary() };
    }
    return primary();
  }

  function primary(): Expr {
    const tok = peek();

    if (tok.type === "NUMBER" && tok.literal) {
      advance();
      return { kind: "literal", value: tok.literal, pos: tok.start };
    }

    if (match("LPAREN")) {
      const inner = expression();
      expectClose("Expected ')' after expression");
      return { kind: "grouping", inner, pos: tok.start };
    }

    if (match("IDENT")) {
      const name = text(tok);
      if (!match("LPAREN")) {
        return { kind: "variable", name, pos: tok.start };
      }

      const args: Expr[] = [expression()];
      while (match("COMMA")) {
        args.push(expression());
      }
      expectClose("Expected ')' after arguments");
      return { kind: "call", name, args, pos: tok.start };
    }

    throw new CalcError("Expected expression", tok.start, "UNEXPECTED_TOKEN");
  }

  const result = statement();

  if (peek().type !== "EOF") {
    throw new CalcError("Unexpected input after expression", peek().start, "TRAILING_INPUT");
  }

  return result;
}

/** Renders `source` with a caret under the error position, then the message. */
export function formatErrorPointer(source: string, err: CalcError): string {
  const column = Math.max(0, Math.min(err.pos, source.length));
  return `${source}\n${" ".repeat(column)}^ ${err.message}`;
}
