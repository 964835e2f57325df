/**
 * uiscript Parser using Chevrotain.
 *
 * The driver in `parse()` parses the remaining statements in one pass. When a
 * statement fails it keeps the statements before it, reports the failure and
 * resumes at the next statement keyword or `;`, so a single malformed
 * statement never discards the rest of its block.
 */
import {
  CstParser,
  EOF,
  createTokenInstance,
  type CstElement,
  type CstNode,
  type IToken,
  type TokenType,
} from "chevrotain";
import * as T from "./tokens.js";
import type { Token } from "./tokens.js";
import type * as AST from "./ast.js";
import type { Span } from "./ast.js";
import { isAssignTarget } from "./ast.js";
import type { Diagnostic } from "./diagnostics.js";
import { makeDiag } from "./diagnostics.js";
import { tokenizeScript } from "./lexer.js";

class ScriptCstParser extends CstParser {
  constructor() {
    super(T.allTokens, { recoveryEnabled: false });
    this.performSelfAnalysis();
  }

  /** First token of the last top-level statement `program` entered. */
  lastStatementStart: IToken | undefined;

  program = this.RULE("program", () => {
    this.MANY(() => {
      this.ACTION(() => {
        this.lastStatementStart = this.LA(1);
      });
      this.SUBRULE(this.statement);
    });
  });

  statement = this.RULE("statement", () => {
    this.OR([
      { ALT: () => this.SUBRULE(this.varDecl) },
      { ALT: () => this.SUBRULE(this.ifStmt) },
      { ALT: () => this.SUBRULE(this.whileStmt) },
      { ALT: () => this.SUBRULE(this.returnStmt) },
      { ALT: () => this.SUBRULE(this.exprStmt) },
    ]);
  });

  varDecl = this.RULE("varDecl", () => {
    this.CONSUME(T.Var);
    this.CONSUME(T.Identifier);
    this.OPTION(() => {
      this.CONSUME(T.Equals);
      this.SUBRULE(this.expression, { LABEL: "initializer" });
    });
    this.OPTION2(() => this.CONSUME(T.Semicolon));
  });

  ifStmt = this.RULE("ifStmt", () => {
    this.CONSUME(T.If);
    this.SUBRULE(this.expression, { LABEL: "condition" });
    this.CONSUME(T.Then);
    this.SUBRULE(this.block, { LABEL: "thenBody" });
    this.MANY(() => this.SUBRULE(this.elseIfClause));
    this.OPTION(() => {
      this.CONSUME(T.Else);
      this.SUBRULE2(this.block, { LABEL: "elseBody" });
    });
    this.CONSUME(T.EndIf);
  });

  elseIfClause = this.RULE("elseIfClause", () => {
    this.CONSUME(T.ElseIf);
    this.SUBRULE(this.expression, { LABEL: "condition" });
    this.CONSUME(T.Then);
    this.SUBRULE(this.block, { LABEL: "body" });
  });

  whileStmt = this.RULE("whileStmt", () => {
    this.CONSUME(T.While);
    this.SUBRULE(this.expression, { LABEL: "condition" });
    this.CONSUME(T.Do);
    this.SUBRULE(this.block, { LABEL: "body" });
    this.CONSUME(T.EndWhile);
  });

  block = this.RULE("block", () => {
    this.MANY(() => this.SUBRULE(this.statement));
  });

  returnStmt = this.RULE("returnStmt", () => {
    this.CONSUME(T.Return);
    this.OPTION(() => this.SUBRULE(this.expression, { LABEL: "value" }));
    this.OPTION2(() => this.CONSUME(T.Semicolon));
  });

  // Assignment is recognised after a full expression: `target = value`.
  exprStmt = this.RULE("exprStmt", () => {
    this.SUBRULE(this.expression, { LABEL: "expr" });
    this.OPTION(() => {
      this.CONSUME(T.Equals);
      this.SUBRULE2(this.expression, { LABEL: "value" });
    });
    this.OPTION2(() => this.CONSUME(T.Semicolon));
  });

  expression = this.RULE("expression", () => {
    this.SUBRULE(this.orExpr);
  });

  orExpr = this.RULE("orExpr", () => {
    this.SUBRULE(this.andExpr, { LABEL: "operands" });
    this.MANY(() => {
      this.CONSUME(T.Or, { LABEL: "operators" });
      this.SUBRULE2(this.andExpr, { LABEL: "operands" });
    });
  });

  andExpr = this.RULE("andExpr", () => {
    this.SUBRULE(this.equality, { LABEL: "operands" });
    this.MANY(() => {
      this.CONSUME(T.And, { LABEL: "operators" });
      this.SUBRULE2(this.equality, { LABEL: "operands" });
    });
  });

  equality = this.RULE("equality", () => {
    this.SUBRULE(this.relational, { LABEL: "operands" });
    this.MANY(() => {
      this.CONSUME(T.EqualityOperator, { LABEL: "operators" });
      this.SUBRULE2(this.relational, { LABEL: "operands" });
    });
  });

  relational = this.RULE("relational", () => {
    this.SUBRULE(this.additive, { LABEL: "operands" });
    this.MANY(() => {
      this.CONSUME(T.RelationalOperator, { LABEL: "operators" });
      this.SUBRULE2(this.additive, { LABEL: "operands" });
    });
  });

  additive = this.RULE("additive", () => {
    this.SUBRULE(this.multiplicative, { LABEL: "operands" });
    this.MANY(() => {
      this.CONSUME(T.AdditiveOperator, { LABEL: "operators" });
      this.SUBRULE2(this.multiplicative, { LABEL: "operands" });
    });
  });

  multiplicative = this.RULE("multiplicative", () => {
    this.SUBRULE(this.unary, { LABEL: "operands" });
    this.MANY(() => {
      this.CONSUME(T.MultiplicativeOperator, { LABEL: "operators" });
      this.SUBRULE2(this.unary, { LABEL: "operands" });
    });
  });

  unary = this.RULE("unary", () => {
    this.OR([
      {
        ALT: () => {
          this.CONSUME(T.UnaryOperator, { LABEL: "operator" });
          this.SUBRULE(this.unary, { LABEL: "operand" });
        },
      },
      { ALT: () => this.SUBRULE(this.postfix) },
    ]);
  });

  postfix = this.RULE("postfix", () => {
    this.SUBRULE(this.primary);
    this.MANY(() => this.SUBRULE(this.suffix));
  });

  suffix = this.RULE("suffix", () => {
    this.OR([
      {
        ALT: () => {
          this.CONSUME(T.Dot);
          this.CONSUME(T.Identifier, { LABEL: "member" });
        },
      },
      {
        ALT: () => {
          this.CONSUME(T.LParen);
          this.OPTION(() => {
            this.SUBRULE(this.expression, { LABEL: "args" });
            this.MANY(() => {
              this.CONSUME(T.Comma);
              this.SUBRULE2(this.expression, { LABEL: "args" });
            });
          });
          this.CONSUME(T.RParen);
        },
      },
    ]);
  });

  primary = this.RULE("primary", () => {
    this.OR([
      { ALT: () => this.CONSUME(T.NumberLit) },
      { ALT: () => this.CONSUME(T.StringLit) },
      { ALT: () => this.CONSUME(T.True) },
      { ALT: () => this.CONSUME(T.False) },
      { ALT: () => this.CONSUME(T.Null) },
      { ALT: () => this.CONSUME(T.Identifier) },
      { ALT: () => this.SUBRULE(this.group) },
    ]);
  });

  group = this.RULE("group", () => {
    this.CONSUME(T.LParen);
    this.SUBRULE(this.expression);
    this.CONSUME(T.RParen);
  });
}

// Singleton parser instance
const cstParser = new ScriptCstParser();

export interface ParseResult {
  program: AST.Program;
  diagnostics: Diagnostic[];
}

// --- CST helpers ---

function isToken(el: CstElement): el is IToken {
  return "image" in el;
}

function isCstNode(el: CstElement): el is CstNode {
  return "children" in el;
}

function childNodes(cst: CstNode, key: string): CstNode[] {
  return (cst.children[key] ?? []).filter(isCstNode);
}

function childTokens(cst: CstNode, key: string): IToken[] {
  return (cst.children[key] ?? []).filter(isToken);
}

function childNode(cst: CstNode, key: string): CstNode {
  const [node] = childNodes(cst, key);
  if (!node) throw new Error(`Malformed '${cst.name}': missing '${key}'.`);
  return node;
}

function childToken(cst: CstNode, key: string): IToken {
  const [token] = childTokens(cst, key);
  if (!token) throw new Error(`Malformed '${cst.name}': missing '${key}'.`);
  return token;
}

function countTokens(cst: CstNode): number {
  let count = 0;
  for (const elements of Object.values(cst.children)) {
    for (const el of elements) {
      count += isToken(el) ? 1 : countTokens(el);
    }
  }
  return count;
}

function tokenSpan(token: IToken): Span {
  return { line: token.startLine ?? 1, column: token.startColumn ?? 1 };
}

class AssignTargetError extends Error {
  constructor(public readonly span: Span) {
    super("Invalid assignment target: only variables and members can be assigned.");
  }
}

// --- CST to AST ---

function visitBlock(cst: CstNode): AST.Stmt[] {
  return childNodes(cst, "statement").map(visitStatement);
}

function visitStatement(cst: CstNode): AST.Stmt {
  const [varDecl] = childNodes(cst, "varDecl");
  if (varDecl) return visitVarDecl(varDecl);
  const [ifStmt] = childNodes(cst, "ifStmt");
  if (ifStmt) return visitIfStmt(ifStmt);
  const [whileStmt] = childNodes(cst, "whileStmt");
  if (whileStmt) return visitWhileStmt(whileStmt);
  const [returnStmt] = childNodes(cst, "returnStmt");
  if (returnStmt) return visitReturnStmt(returnStmt);
  return visitExprStmt(childNode(cst, "exprStmt"));
}

function visitVarDecl(cst: CstNode): AST.VarDecl {
  const [init] = childNodes(cst, "initializer");
  const decl: AST.VarDecl = {
    kind: "VarDecl",
    name: childToken(cst, "Identifier").image,
    span: tokenSpan(childToken(cst, "Var")),
  };
  if (init) decl.initializer = visitExpr(init);
  return decl;
}

function visitIfStmt(cst: CstNode): AST.IfStmt {
  const stmt: AST.IfStmt = {
    kind: "IfStmt",
    condition: visitExpr(childNode(cst, "condition")),
    thenBody: visitBlock(childNode(cst, "thenBody")),
    elseIfBranches: childNodes(cst, "elseIfClause").map((clause) => ({
      kind: "ElseIfBranch",
      condition: visitExpr(childNode(clause, "condition")),
      body: visitBlock(childNode(clause, "body")),
      span: tokenSpan(childToken(clause, "ElseIf")),
    })),
    span: tokenSpan(childToken(cst, "If")),
  };
  const [elseBody] = childNodes(cst, "elseBody");
  if (elseBody) stmt.elseBody = visitBlock(elseBody);
  return stmt;
}

function visitWhileStmt(cst: CstNode): AST.WhileStmt {
  return {
    kind: "WhileStmt",
    condition: visitExpr(childNode(cst, "condition")),
    body: visitBlock(childNode(cst, "body")),
    span: tokenSpan(childToken(cst, "While")),
  };
}

function visitReturnStmt(cst: CstNode): AST.ReturnStmt {
  const stmt: AST.ReturnStmt = { kind: "ReturnStmt", span: tokenSpan(childToken(cst, "Return")) };
  const [value] = childNodes(cst, "value");
  if (value) stmt.value = visitExpr(value);
  return stmt;
}

function visitExprStmt(cst: CstNode): AST.ExprStmt | AST.Assignment {
  const expr = visitExpr(childNode(cst, "expr"));
  const [valueNode] = childNodes(cst, "value");
  if (!valueNode) {
    return { kind: "ExprStmt", expr, span: expr.span };
  }
  if (!isAssignTarget(expr)) {
    throw new AssignTargetError(tokenSpan(childToken(cst, "Equals")));
  }
  return { kind: "Assignment", target: expr, value: visitExpr(valueNode), span: expr.span };
}

const BINARY_OPS = new Map<TokenType, AST.BinaryOp>([
  [T.Or, "or"],
  [T.And, "and"],
  [T.EqualsEquals, "=="],
  [T.NotEquals, "!="],
  [T.Less, "<"],
  [T.Greater, ">"],
  [T.LessEquals, "<="],
  [T.GreaterEquals, ">="],
  [T.Plus, "+"],
  [T.Minus, "-"],
  [T.Star, "*"],
  [T.Slash, "/"],
  [T.Percent, "%"],
]);

function binaryOp(token: IToken): AST.BinaryOp {
  const op = BINARY_OPS.get(token.tokenType);
  if (!op) throw new Error(`Unknown binary operator '${token.image}'.`);
  return op;
}

function visitExpr(cst: CstNode): AST.Expr {
  switch (cst.name) {
    case "expression":
      return visitExpr(childNode(cst, "orExpr"));
    case "orExpr":
    case "andExpr":
    case "equality":
    case "relational":
    case "additive":
    case "multiplicative":
      return visitChain(cst);
    case "unary":
      return visitUnary(cst);
    case "postfix":
      return visitPostfix(cst);
    case "primary":
      return visitPrimary(cst);
    case "group":
      return visitExpr(childNode(cst, "expression"));
  }
  throw new Error(`Unexpected expression node '${cst.name}'.`);
}

// Left-associative: a - b - c == (a - b) - c
function visitChain(cst: CstNode): AST.Expr {
  const operands = childNodes(cst, "operands");
  const operators = childTokens(cst, "operators");
  let left = visitExpr(operands[0]);
  operators.forEach((opToken, i) => {
    left = {
      kind: "BinaryExpr",
      op: binaryOp(opToken),
      left,
      right: visitExpr(operands[i + 1]),
      span: tokenSpan(opToken),
    };
  });
  return left;
}

function visitUnary(cst: CstNode): AST.Expr {
  const [opToken] = childTokens(cst, "operator");
  if (!opToken) return visitExpr(childNode(cst, "postfix"));
  return {
    kind: "UnaryExpr",
    op: opToken.tokenType === T.Not ? "not" : "negate",
    operand: visitExpr(childNode(cst, "operand")),
    span: tokenSpan(opToken),
  };
}

function visitPostfix(cst: CstNode): AST.Expr {
  let expr = visitExpr(childNode(cst, "primary"));
  for (const suffix of childNodes(cst, "suffix")) {
    const [member] = childTokens(suffix, "member");
    if (member) {
      expr = { kind: "MemberAccess", object: expr, name: member.image, span: tokenSpan(member) };
    } else {
      expr = {
        kind: "CallExpr",
        callee: expr,
        args: childNodes(suffix, "args").map(visitExpr),
        span: expr.span,
      };
    }
  }
  return expr;
}

function visitPrimary(cst: CstNode): AST.Expr {
  const [num] = childTokens(cst, "Number");
  if (num) return { kind: "NumberLiteral", value: Number(num.image), span: tokenSpan(num) };
  const [str] = childTokens(cst, "String");
  if (str) return { kind: "StrLiteral", value: str.image, span: tokenSpan(str) };
  const [t] = childTokens(cst, "True");
  if (t) return { kind: "BoolLiteral", value: true, span: tokenSpan(t) };
  const [f] = childTokens(cst, "False");
  if (f) return { kind: "BoolLiteral", value: false, span: tokenSpan(f) };
  const [n] = childTokens(cst, "Null");
  if (n) return { kind: "NullLiteral", span: tokenSpan(n) };
  const [ident] = childTokens(cst, "Identifier");
  if (ident) return { kind: "Identifier", name: ident.image, span: tokenSpan(ident) };

  const group = childNode(cst, "group");
  return {
    kind: "GroupExpr",
    expr: visitExpr(group),
    span: tokenSpan(childToken(group, "LParen")),
  };
}

// --- Driver ---

function toChevrotainToken(token: Token, index: number): IToken {
  const type = T.typeOfKind(token.kind) ?? T.Unrecognized;
  const width = Math.max(token.text.length, 1);
  return createTokenInstance(
    type,
    token.text,
    index,
    index,
    token.line,
    token.line,
    token.column,
    token.column + width - 1
  );
}

/** Position of a token in the parser input, or -1 for the synthetic EOF. */
function tokenIndex(token: IToken): number {
  return Number.isInteger(token.startOffset) && token.tokenType !== EOF ? token.startOffset : -1;
}

const STATEMENT_KEYWORDS = new Set<TokenType>([T.Var, T.If, T.While, T.Return]);

/**
 * Index of the first token after a failure at `failedAt`: skips at least one
 * token, then stops after a `;` or before a statement keyword.
 */
function synchronize(tokens: IToken[], failedAt: number): number {
  let i = failedAt + 1;
  while (i < tokens.length) {
    if (tokens[i - 1].tokenType === T.Semicolon) return i;
    if (STATEMENT_KEYWORDS.has(tokens[i].tokenType)) return i;
    i++;
  }
  return i;
}

/**
 * Parses a block's token list. A leading BlockStart is skipped; parsing stops
 * at the first BlockEnd or EOF. An Error token is reported and ends the input.
 */
export function parse(tokens: readonly Token[]): ParseResult {
  const diagnostics: Diagnostic[] = [];
  const first = tokens[0];
  const stream: Token[] = [];

  for (let i = first?.kind === "BlockStart" ? 1 : 0; i < tokens.length; i++) {
    const token = tokens[i];
    if (token.kind === "EOF" || token.kind === "BlockEnd") break;
    if (token.kind === "Error") {
      diagnostics.push(
        makeDiag(
          "E_LEX",
          token.text,
          { line: token.line, column: token.column },
          "Check for unterminated strings or unsupported characters."
        )
      );
      break;
    }
    stream.push(token);
  }

  const input = stream.map(toChevrotainToken);
  const statements: AST.Stmt[] = [];

  const collect = (cst: CstNode): void => {
    try {
      statements.push(visitStatement(cst));
    } catch (e) {
      if (!(e instanceof AssignTargetError)) throw e;
      diagnostics.push(makeDiag("E_ASSIGN_TARGET", e.message, e.span, "Assign to a name or to obj.member."));
    }
  };

  // Parses the single statement at `at` and returns where the next one starts.
  const parseOne = (at: number): number => {
    cstParser.input = input.slice(at);
    const cst = cstParser.statement();
    const error = cstParser.errors.find((e) => e.name !== "NotAllInputParsedException");
    if (!error) {
      collect(cst);
      return at + Math.max(countTokens(cst), 1);
    }

    const failedAt = tokenIndex(error.token);
    const stop = failedAt === -1 ? input.length : failedAt;
    const anchor = input[Math.min(stop, input.length - 1)];
    diagnostics.push(
      makeDiag("E_PARSE", error.message, tokenSpan(anchor), "Check syntax near this location.")
    );
    return synchronize(input, stop);
  };

  let pos = 0;
  while (pos < input.length) {
    cstParser.lastStatementStart = undefined;
    cstParser.input = pos === 0 ? input : input.slice(pos);
    const run = cstParser.program();
    const errors = cstParser.errors;
    if (errors.length === 0) {
      childNodes(run, "statement").forEach(collect);
      break;
    }

    const failure = errors.find((e) => e.name !== "NotAllInputParsedException");
    const failedToken = failure ? cstParser.lastStatementStart : errors[0].token;
    const failedAt = failedToken ? tokenIndex(failedToken) : -1;
    const failed = failedAt < pos ? pos : failedAt;

    if (failed > pos) {
      cstParser.input = input.slice(pos, failed);
      const prefix = cstParser.program();
      if (cstParser.errors.length === 0) {
        childNodes(prefix, "statement").forEach(collect);
        pos = failed;
      }
    }
    pos = parseOne(pos);
  }

  return {
    program: {
      kind: "Program",
      statements,
      span: first ? { line: first.line, column: first.column } : { line: 1, column: 1 },
    },
    diagnostics,
  };
}

/** Tokenizes and parses bare script text. */
export function parseScript(source: string): ParseResult {
  return parse(tokenizeScript(source));
}
