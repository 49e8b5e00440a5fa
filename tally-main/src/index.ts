export { CalculatorSession, identifierAtEnd, identifierRange } from "./calculator/index.js";
export type { CalcResult, Completion } from "./calculator/index.js";
export { tokenize } from "./calculator/tokenizer.js";
export { parse, formatErrorPointer } from "./calculator/parser.js";
export { evaluate, DEFAULT_MAX_CALL_DEPTH, DEFINITION_RESULT } from "./calculator/evaluator.js";
export type { EvaluateOptions } from "./calculator/evaluator.js";
export { Environment } from "./calculator/environment.js";
export type { CalcFunction, EnvMember, EnvMemberKind } from "./calculator/environment.js";
export { BUILTINS, CalcDecimal, PRECISION_DIGITS } from "./calculator/functions.js";
export type { BuiltinFn } from "./calculator/functions.js";
export { formatNumber, DISPLAY_DIGITS } from "./calculator/format.js";
export { printExpr, printStmt } from "./calculator/printer.js";
export { visitExpr, visitStmt } from "./calculator/ast.js";
export type { Expr, Stmt, ExprVisitor, StmtVisitor } from "./calculator/ast.js";
export { CalcError } from "./calculator/types.js";
export type { CalcErrorCode, Dec, Token, TokenType } from "./calculator/types.js";
export { loadSettings, DEFAULT_SETTINGS } from "./config/settings.js";
export type { Settings } from "./config/settings.js";
