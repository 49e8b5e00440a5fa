import type { Dec, Token } from "./types.js";

export type Expr =
  | { readonly kind: "literal"; readonly value: Dec; readonly pos: number }
  | { readonly kind: "binary"; readonly left: Expr; readonly operator: Token; readonly right: Expr }
  | { readonly kind: "unary"; readonly operator: Token; readonly operand: Expr }
  | { readonly kind: "grouping"; readonly inner: Expr; readonly pos: number }
  | { readonly kind: "variable"; readonly name: string; readonly pos: number }
  | { readonly kind: "call"; readonly name: string; readonly args: readonly Expr[]; readonly pos: number };

export type Stmt =
  | { readonly kind: "variableAssignment"; readonly name: string; readonly value: Expr }
  | {
      readonly kind: "functionAssignment";
      readonly name: string;
      readonly params: readonly string[];
      readonly body: Expr;
    }
  | { readonly kind: "expression"; readonly expr: Expr };

export type ExprKind = Expr["kind"];
export type StmtKind = Stmt["kind"];

export type ExprOf<K extends ExprKind> = Extract<Expr, { kind: K }>;
export type StmtOf<K extends StmtKind> = Extract<Stmt, { kind: K }>;

/** One handler per node kind; a new kind is a compile error in every visitor. */
export type ExprVisitor<T> = { readonly [K in ExprKind]: (node: ExprOf<K>) => T };
export type StmtVisitor<T> = { readonly [K in StmtKind]: (node: StmtOf<K>) => T };

function assertNever(node: never): never {
  throw new Error(`Unhandled node: ${JSON.stringify(node)}`);
}

export function visitExpr<T>(expr: Expr, visitor: ExprVisitor<T>): T {
  switch (expr.kind) {
    case "literal":
      return visitor.literal(expr);
    case "binary":
      return visitor.binary(expr);
    case "unary":
      return visitor.unary(expr);
    case "grouping":
      return visitor.grouping(expr);
    case "variable":
      return visitor.variable(expr);
    case "call":
      return visitor.call(expr);
    default:
      return assertNever(expr);
  }
}

export function visitStmt<T>(stmt: Stmt, visitor: StmtVisitor<T>): T {
  switch (stmt.kind) {
    case "variableAssignment":
      return visitor.variableAssignment(stmt);
    case "functionAssignment":
      return visitor.functionAssignment(stmt);
    case "expression":
      return visitor.expression(stmt);
    default:
      return assertNever(stmt);
  }
}

/** Position of the first token of an expression. */
export function exprPos(expr: Expr): number {
  return visitExpr(expr, {
    literal: (node) => node.pos,
    binary: (node) => exprPos(node.left),
    unary: (node) => node.operator.start,
    grouping: (node) => node.pos,
    variable: (node) => node.pos,
    call: (node) => node.pos,
  });
}
