import * as AST from '../parser/ast';
import { ImpError } from '../errors';
import { Environment } from './environment';

export interface InterpreterOptions {
  trace?: boolean;
  /** Upper bound on executed statements. Unbounded when omitted. */
  maxSteps?: number;
}

export class Interpreter {
  private traceEnabled: boolean;
  private traceLog: string[] = [];
  private maxSteps: number | undefined;
  private steps = 0;

  constructor(options: InterpreterOptions = {}) {
    this.traceEnabled = options.trace ?? false;
    this.maxSteps = options.maxSteps;
  }

  run(program: AST.Statement, env: Environment = new Environment()): Environment {
    this.steps = 0;
    this.traceLog = [];
    this.execute(program, env);
    this.trace(`Finished after ${this.steps} step(s).`);
    return env;
  }

  getTraceLog(): string[] {
    return [...this.traceLog];
  }

  // ─── Statements ────────────────────────────────────────

  private execute(stmt: AST.Statement, env: Environment): void {
    switch (stmt.type) {
      case 'AssignStatement': {
        this.step();
        const value = this.evalAexp(stmt.aexp, env);
        env.set(stmt.name, value);
        this.trace(`${stmt.name} := ${value}`);
        return;
      }
      case 'CompoundStatement':
        for (const child of AST.flattenCompound(stmt)) {
          this.execute(child, env);
        }
        return;
      case 'IfStatement': {
        this.step();
        const condition = this.evalBexp(stmt.condition, env);
        this.trace(`if -> ${condition ? 'then' : 'else'}`);
        if (condition) {
          this.execute(stmt.trueStmt, env);
        } else if (stmt.falseStmt) {
          this.execute(stmt.falseStmt, env);
        }
        return;
      }
      case 'WhileStatement': {
        this.step();
        while (this.evalBexp(stmt.condition, env)) {
          this.execute(stmt.body, env);
          this.step();
        }
        this.trace('while -> done');
        return;
      }
    }
  }

  // ─── Expressions ───────────────────────────────────────

  evalAexp(aexp: AST.Aexp, env: Environment): number {
    switch (aexp.type) {
      case 'IntAexp':
        return aexp.value;
      case 'VarAexp':
        return env.get(aexp.name);
      case 'BinopAexp': {
        const left = this.evalAexp(aexp.left, env);
        const right = this.evalAexp(aexp.right, env);
        return checkedInteger(aexp.op, left, right, applyArith(aexp.op, left, right));
      }
    }
  }

  evalBexp(bexp: AST.Bexp, env: Environment): boolean {
    switch (bexp.type) {
      case 'RelopBexp': {
        const left = this.evalAexp(bexp.left, env);
        const right = this.evalAexp(bexp.right, env);
        switch (bexp.op) {
          case '<': return left < right;
          case '<=': return left <= right;
          case '>': return left > right;
          case '>=': return left >= right;
          case '=': return left === right;
          case '!=': return left !== right;
        }
      }
      case 'AndBexp':
        return this.evalBexp(bexp.left, env) && this.evalBexp(bexp.right, env);
      case 'OrBexp':
        return this.evalBexp(bexp.left, env) || this.evalBexp(bexp.right, env);
      case 'NotBexp':
        return !this.evalBexp(bexp.operand, env);
    }
  }

  private step(): void {
    this.steps++;
    if (this.maxSteps !== undefined && this.steps > this.maxSteps) {
      throw new ImpError('StepLimitError', `exceeded ${this.maxSteps} steps`);
    }
  }

  private trace(message: string): void {
    this.traceLog.push(message);
    if (this.traceEnabled) {
      console.log(`  [trace] ${message}`);
    }
  }
}

function applyArith(op: AST.ArithOp, left: number, right: number): number {
  switch (op) {
    case '+': return left + right;
    case '-': return left - right;
    case '*': return left * right;
    case '/':
      if (right === 0) {
        throw new ImpError('ZeroDivisionError', 'division by zero');
      }
      return floorDiv(left, right);
  }
}

/** Floor division, computed exactly rather than through a float quotient. */
function floorDiv(left: number, right: number): number {
  const l = BigInt(left);
  const r = BigInt(right);
  let q = l / r;
  if (l % r !== 0n && (l < 0n) !== (r < 0n)) q -= 1n;
  return Number(q);
}

/** Integers are exact only up to `Number.MAX_SAFE_INTEGER` in magnitude. */
function checkedInteger(op: AST.ArithOp, left: number, right: number, result: number): number {
  if (!Number.isSafeInteger(result)) {
    throw new ImpError('OverflowError', `${left} ${op} ${right} is outside the exact integer range`);
  }
  return result;
}
