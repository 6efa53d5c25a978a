export type Aexp = IntAexp | VarAexp | BinopAexp;

export type Bexp = RelopBexp | AndBexp | OrBexp | NotBexp;

export type Statement = AssignStatement | CompoundStatement | IfStatement | WhileStatement;

export type ArithOp = '*' | '/' | '+' | '-';

export type RelOp = '<' | '<=' | '>' | '>=' | '=' | '!=';

export type LogicOp = 'and' | 'or';

// ─── Arithmetic ──────────────────────────────────────────

export interface IntAexp {
  type: 'IntAexp';
  value: number;
}

export interface VarAexp {
  type: 'VarAexp';
  name: string;
}

export interface BinopAexp {
  type: 'BinopAexp';
  op: ArithOp;
  left: Aexp;
  right: Aexp;
}

// ─── Boolean ─────────────────────────────────────────────

export interface RelopBexp {
  type: 'RelopBexp';
  op: RelOp;
  left: Aexp;
  right: Aexp;
}

export interface AndBexp {
  type: 'AndBexp';
  left: Bexp;
  right: Bexp;
}

export interface OrBexp {
  type: 'OrBexp';
  left: Bexp;
  right: Bexp;
}

export interface NotBexp {
  type: 'NotBexp';
  operand: Bexp;
}

// ─── Statements ──────────────────────────────────────────

export interface AssignStatement {
  type: 'AssignStatement';
  name: string;
  aexp: Aexp;
}

export interface CompoundStatement {
  type: 'CompoundStatement';
  first: Statement;
  second: Statement;
}

export interface IfStatement {
  type: 'IfStatement';
  condition: Bexp;
  trueStmt: Statement;
  /** `null` when the `else` branch is absent. */
  falseStmt: Statement | null;
}

export interface WhileStatement {
  type: 'WhileStatement';
  condition: Bexp;
  body: Statement;
}

// ─── Constructors ────────────────────────────────────────

export function intAexp(value: number): IntAexp {
  return { type: 'IntAexp', value };
}

export function varAexp(name: string): VarAexp {
  return { type: 'VarAexp', name };
}

export function binopAexp(op: ArithOp, left: Aexp, right: Aexp): BinopAexp {
  return { type: 'BinopAexp', op, left, right };
}

export function relopBexp(op: RelOp, left: Aexp, right: Aexp): RelopBexp {
  return { type: 'RelopBexp', op, left, right };
}

export function andBexp(left: Bexp, right: Bexp): AndBexp {
  return { type: 'AndBexp', left, right };
}

export function orBexp(left: Bexp, right: Bexp): OrBexp {
  return { type: 'OrBexp', left, right };
}

export function notBexp(operand: Bexp): NotBexp {
  return { type: 'NotBexp', operand };
}

export function assignStatement(name: string, aexp: Aexp): AssignStatement {
  return { type: 'AssignStatement', name, aexp };
}

export function compoundStatement(first: Statement, second: Statement): CompoundStatement {
  return { type: 'CompoundStatement', first, second };
}

export function ifStatement(condition: Bexp, trueStmt: Statement, falseStmt: Statement | null): IfStatement {
  return { type: 'IfStatement', condition, trueStmt, falseStmt };
}

export function whileStatement(condition: Bexp, body: Statement): WhileStatement {
  return { type: 'WhileStatement', condition, body };
}

/**
 * The statements of a left-nested `CompoundStatement` chain, in execution
 * order. Stack use is constant in the length of the chain.
 */
export function flattenCompound(stmt: Statement): Statement[] {
  const reversed: Statement[] = [];
  let current = stmt;
  while (current.type === 'CompoundStatement') {
    reversed.push(current.second);
    current = current.first;
  }
  reversed.push(current);
  return reversed.reverse();
}
