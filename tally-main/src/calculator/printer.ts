import { visitExpr, visitStmt, type Expr, type Stmt } from "./ast.js";
import type { TokenType } from "./types.js";

const OPERATOR_SYMBOLS: Partial<Record<TokenType, string>> = {
  PLUS: "+",
  MINUS: "-",
  STAR: "*",
  SLASH: "/",
  CARET: "^",
};

function symbol(type: TokenType): string {
  return OPERATOR_SYMBOLS[type] ?? type;
}

/** Fully parenthesized prefix rendering, used for debugging and tests. */
export function printExpr(expr: Expr): string {
  return visitExpr(expr, {
    literal: (node) => node.value.toString(),
    binary: (node) => `(${symbol(node.operator.type)} ${printExpr(node.left)} ${printExpr(node.right)})`,
    unary: (node) => `(${symbol(node.operator.type)} ${printExpr(node.operand)})`,
    grouping: (node) => `(group ${printExpr(node.inner)})`,
    variable: (node) => node.name,
    call: (node) => `(${[node.name, ...node.args.map(printExpr)].join(" ")})`,
  });
}

export function printStmt(stmt: Stmt): string {
  return visitStmt(stmt, {
    variableAssignment: (node) => `${node.name} = ${printExpr(node.value)}`,
    functionAssignment: (node) => `(${[node.name, ...node.params].join(" ")}) = ${printExpr(node.body)}`,
    expression: (node) => printExpr(node.expr),
  });
}
