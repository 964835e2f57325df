/**
 * uiscript AST Node Definitions
 */

export interface Span {
  line: number;
  column: number;
}

// Base node with span
export interface BaseNode {
  kind: string;
  span: Span;
}

// --- Literals ---
export interface NumberLiteral extends BaseNode {
  kind: "NumberLiteral";
  value: number;
}

export interface StrLiteral extends BaseNode {
  kind: "StrLiteral";
  value: string;
}

export interface BoolLiteral extends BaseNode {
  kind: "BoolLiteral";
  value: boolean;
}

export interface NullLiteral extends BaseNode {
  kind: "NullLiteral";
}

export type Literal = NumberLiteral | StrLiteral | BoolLiteral | NullLiteral;

// --- Expressions ---
export interface Identifier extends BaseNode {
  kind: "Identifier";
  name: string;
}

export type BinaryOp =
  | "+"
  | "-"
  | "*"
  | "/"
  | "%"
  | "=="
  | "!="
  | "<"
  | ">"
  | "<="
  | ">="
  | "and"
  | "or";

export interface BinaryExpr extends BaseNode {
  kind: "BinaryExpr";
  op: BinaryOp;
  left: Expr;
  right: Expr;
}

export type UnaryOp = "not" | "negate";

export interface UnaryExpr extends BaseNode {
  kind: "UnaryExpr";
  op: UnaryOp;
  operand: Expr;
}

export interface MemberAccess extends BaseNode {
  kind: "MemberAccess";
  object: Expr;
  name: string;
}

export interface CallExpr extends BaseNode {
  kind: "CallExpr";
  callee: Expr;
  args: Expr[];
}

export interface GroupExpr extends BaseNode {
  kind: "GroupExpr";
  expr: Expr;
}

export type Expr =
  | Literal
  | Identifier
  | BinaryExpr
  | UnaryExpr
  | MemberAccess
  | CallExpr
  | GroupExpr;

// --- Statements ---
export interface VarDecl extends BaseNode {
  kind: "VarDecl";
  name: string;
  initializer?: Expr;
}

export type AssignTarget = Identifier | MemberAccess;

export interface Assignment extends BaseNode {
  kind: "Assignment";
  target: AssignTarget;
  value: Expr;
}

export interface ExprStmt extends BaseNode {
  kind: "ExprStmt";
  expr: Expr;
}

export interface ElseIfBranch extends BaseNode {
  kind: "ElseIfBranch";
  condition: Expr;
  body: Stmt[];
}

export interface IfStmt extends BaseNode {
  kind: "IfStmt";
  condition: Expr;
  thenBody: Stmt[];
  elseIfBranches: ElseIfBranch[];
  elseBody?: Stmt[];
}

export interface WhileStmt extends BaseNode {
  kind: "WhileStmt";
  condition: Expr;
  body: Stmt[];
}

export interface ReturnStmt extends BaseNode {
  kind: "ReturnStmt";
  value?: Expr;
}

export type Stmt = VarDecl | Assignment | ExprStmt | IfStmt | WhileStmt | ReturnStmt;

// --- Program ---
export interface Program extends BaseNode {
  kind: "Program";
  statements: Stmt[];
}

export function isAssignTarget(expr: Expr): expr is AssignTarget {
  return expr.kind === "Identifier" || expr.kind === "MemberAccess";
}
