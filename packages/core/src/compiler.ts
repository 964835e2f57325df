/**
 * uiscript Compiler - lowers a Program to a bytecode chunk.
 *
 * Every expression leaves exactly one value on the operand stack; every
 * statement except `return` leaves the depth unchanged.
 */
import type * as AST from "./ast.js";
import { ChunkBuilder, OpCode, type CompiledChunk } from "./bytecode.js";
import { CompileError } from "./errors.js";

const BINARY_OPCODES: Record<Exclude<AST.BinaryOp, "and" | "or">, OpCode> = {
  "+": OpCode.ADD,
  "-": OpCode.SUB,
  "*": OpCode.MUL,
  "/": OpCode.DIV,
  "%": OpCode.MOD,
  "==": OpCode.EQ,
  "!=": OpCode.NE,
  "<": OpCode.LT,
  ">": OpCode.GT,
  "<=": OpCode.LE,
  ">=": OpCode.GE,
};

const MAX_ARGS = 0xff;

function assertNever(node: never): never {
  throw new CompileError(`Unsupported syntax node: ${JSON.stringify(node)}`);
}

class Compiler {
  constructor(private readonly out: ChunkBuilder) {}

  statements(stmts: AST.Stmt[]): void {
    for (const stmt of stmts) this.statement(stmt);
  }

  statement(stmt: AST.Stmt): void {
    switch (stmt.kind) {
      case "VarDecl":
        if (stmt.initializer) this.expression(stmt.initializer);
        else this.out.emit(OpCode.PUSH_NULL);
        this.out.emitU16(OpCode.STORE_VAR, this.out.addName(stmt.name));
        return;

      case "Assignment":
        this.assignment(stmt);
        return;

      case "ExprStmt":
        this.expression(stmt.expr);
        this.out.emit(OpCode.POP);
        return;

      case "IfStmt":
        this.ifStatement(stmt);
        return;

      case "WhileStmt": {
        const loopStart = this.out.position;
        this.expression(stmt.condition);
        const exit = this.out.emitJump(OpCode.JUMP_IF_FALSE);
        this.out.emit(OpCode.POP);
        this.statements(stmt.body);
        this.out.emitLoop(loopStart);
        this.out.patchJump(exit);
        this.out.emit(OpCode.POP);
        return;
      }

      case "ReturnStmt":
        if (stmt.value) {
          this.expression(stmt.value);
          this.out.emit(OpCode.RETURN_VALUE);
        } else {
          this.out.emit(OpCode.RETURN);
        }
        return;
    }
    assertNever(stmt);
  }

  private assignment(stmt: AST.Assignment): void {
    const { target } = stmt;
    switch (target.kind) {
      case "Identifier":
        this.expression(stmt.value);
        this.out.emitU16(OpCode.STORE_VAR, this.out.addName(target.name));
        return;
      case "MemberAccess":
        this.expression(target.object);
        this.expression(stmt.value);
        this.out.emitU16(OpCode.SET_MEMBER, this.out.addName(target.name));
        return;
    }
    assertNever(target);
  }

  // The conditional jumps peek, so the condition is popped on both edges.
  private ifStatement(stmt: AST.IfStmt): void {
    const endJumps: number[] = [];
    const branches = [
      { condition: stmt.condition, body: stmt.thenBody },
      ...stmt.elseIfBranches,
    ];

    for (const branch of branches) {
      this.expression(branch.condition);
      const next = this.out.emitJump(OpCode.JUMP_IF_FALSE);
      this.out.emit(OpCode.POP);
      this.statements(branch.body);
      endJumps.push(this.out.emitJump(OpCode.JUMP));
      this.out.patchJump(next);
      this.out.emit(OpCode.POP);
    }

    if (stmt.elseBody) this.statements(stmt.elseBody);
    for (const jump of endJumps) this.out.patchJump(jump);
  }

  expression(expr: AST.Expr): void {
    switch (expr.kind) {
      case "NumberLiteral":
      case "StrLiteral":
        this.out.emitU16(OpCode.PUSH_CONST, this.out.addConstant(expr.value));
        return;
      case "BoolLiteral":
        this.out.emit(expr.value ? OpCode.PUSH_TRUE : OpCode.PUSH_FALSE);
        return;
      case "NullLiteral":
        this.out.emit(OpCode.PUSH_NULL);
        return;
      case "Identifier":
        this.out.emitU16(OpCode.LOAD_VAR, this.out.addName(expr.name));
        return;
      case "GroupExpr":
        this.expression(expr.expr);
        return;
      case "UnaryExpr":
        this.expression(expr.operand);
        this.out.emit(expr.op === "not" ? OpCode.NOT : OpCode.NEG);
        return;
      case "BinaryExpr":
        this.binary(expr);
        return;
      case "MemberAccess":
        this.expression(expr.object);
        this.out.emitU16(OpCode.GET_MEMBER, this.out.addName(expr.name));
        return;
      case "CallExpr":
        this.call(expr);
        return;
    }
    assertNever(expr);
  }

  private binary(expr: AST.BinaryExpr): void {
    const { op } = expr;
    if (op === "and" || op === "or") {
      // The left value stays on the stack as the result when short-circuiting.
      this.expression(expr.left);
      const skip = this.out.emitJump(op === "and" ? OpCode.JUMP_IF_FALSE : OpCode.JUMP_IF_TRUE);
      this.out.emit(OpCode.POP);
      this.expression(expr.right);
      this.out.patchJump(skip);
      return;
    }
    this.expression(expr.left);
    this.expression(expr.right);
    this.out.emit(BINARY_OPCODES[op]);
  }

  private call(expr: AST.CallExpr): void {
    if (expr.args.length > MAX_ARGS) {
      throw new CompileError(`Too many arguments (${expr.args.length}, max ${MAX_ARGS}).`, expr.span);
    }
    const { callee } = expr;
    if (callee.kind === "MemberAccess") {
      this.expression(callee.object);
      for (const arg of expr.args) this.expression(arg);
      this.out.emitU16(OpCode.CALL_METHOD, this.out.addName(callee.name), expr.args.length);
      return;
    }
    this.expression(callee);
    for (const arg of expr.args) this.expression(arg);
    this.out.emit(OpCode.CALL, expr.args.length);
  }
}

export function compile(program: AST.Program): CompiledChunk {
  const out = new ChunkBuilder();
  new Compiler(out).statements(program.statements);
  out.emit(OpCode.HALT);
  return out.build();
}
