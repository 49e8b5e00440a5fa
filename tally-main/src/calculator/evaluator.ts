import { visitExpr, visitStmt, type Expr, type ExprOf, type ExprVisitor, type Stmt } from "./ast.js";
import type { Environment } from "./environment.js";
import { CalcDecimal } from "./functions.js";
import { CalcError, type Dec } from "./types.js";

export const DEFAULT_MAX_CALL_DEPTH = 256;

/** Value returned by a function definition. */
export const DEFINITION_RESULT = 1;

export interface EvaluateOptions {
  maxCallDepth?: number;
}

type Frame = ReadonlyMap<string, Dec>;

function bindParams(params: readonly string[], args: readonly Dec[]): Frame {
  const frame = new Map<string, Dec>();
  args.forEach((value, i) => {
    const param = params[i];
    if (param !== undefined) frame.set(param, value);
  });
  return frame;
}

class Evaluator implements ExprVisitor<Dec> {
  // Innermost call last. Lookups only consult the top frame.
  private readonly frames: Frame[] = [];

  constructor(
    private readonly env: Environment,
    private readonly lastResult: Dec,
    private readonly maxCallDepth: number,
  ) {}

  evaluateExpr(expr: Expr): Dec {
    return visitExpr(expr, this);
  }

  literal(node: ExprOf<"literal">): Dec {
    return node.value;
  }

  grouping(node: ExprOf<"grouping">): Dec {
    return this.evaluateExpr(node.inner);
  }

  variable(node: ExprOf<"variable">): Dec {
    if (node.name === "ans") return this.lastResult;

    const value = this.frames.at(-1)?.get(node.name) ?? this.env.getVariable(node.name);
    if (value === undefined) {
      throw new CalcError(`Undeclared variable '${node.name}'`, node.pos, "UNDECLARED_VARIABLE");
    }
    return value;
  }

  binary(node: ExprOf<"binary">): Dec {
    const left = this.evaluateExpr(node.left);
    const right = this.evaluateExpr(node.right);
    switch (node.operator.type) {
      case "PLUS": return left.plus(right);
      case "MINUS": return left.minus(right);
      case "STAR": return left.times(right);
      case "SLASH": return left.dividedBy(right);
      case "CARET": return left.pow(right);
      default:
        throw new Error(`Unexpected binary operator ${node.operator.type}`);
    }
  }

  unary(node: ExprOf<"unary">): Dec {
    const operand = this.evaluateExpr(node.operand);
    switch (node.operator.type) {
      case "PLUS": return operand;
      case "MINUS": return operand.negated();
      default:
        throw new Error(`Unexpected unary operator ${node.operator.type}`);
    }
  }

  call(node: ExprOf<"call">): Dec {
    const args = node.args.map((arg) => this.evaluateExpr(arg));

    const fn = this.env.getFunction(node.name);
    if (!fn) {
      throw new CalcError(`No function named '${node.name}'`, node.pos, "UNKNOWN_FUNCTION");
    }

    if (fn.type === "builtin") {
      return fn.fn(args, node.pos);
    }

    if (fn.params.length !== args.length) {
      throw new CalcError(
        `Function '${node.name}' takes ${fn.params.length} args`,
        node.pos,
        "WRONG_ARITY",
      );
    }
    if (this.frames.length >= this.maxCallDepth) {
      throw new CalcError(
        `Maximum call depth ${this.maxCallDepth} exceeded`,
        node.pos,
        "RECURSION_LIMIT",
      );
    }

    this.frames.push(bindParams(fn.params, args));
    try {
      return this.evaluateExpr(fn.body);
    } finally {
      this.frames.pop();
    }
  }
}

/**
 * Evaluates one statement.
 *
 * Assignments write to `env` only when `persist` is set and their value
 * evaluated without error; with `persist` off the environment is never
 * touched, which lets a host preview input as it is typed.
 */
export function evaluate(
  stmt: Stmt,
  env: Environment,
  lastResult: Dec,
  persist: boolean,
  options: EvaluateOptions = {},
): Dec {
  const evaluator = new Evaluator(env, lastResult, options.maxCallDepth ?? DEFAULT_MAX_CALL_DEPTH);

  return visitStmt(stmt, {
    expression: (node) => evaluator.evaluateExpr(node.expr),
    variableAssignment: (node) => {
      const value = evaluator.evaluateExpr(node.value);
      if (persist) env.setVariable(node.name, value);
      return value;
    },
    functionAssignment: (node) => {
      if (persist) {
        env.setFunction(node.name, { type: "user", params: node.params, body: node.body });
      }
      return new CalcDecimal(DEFINITION_RESULT);
    },
  });
}
