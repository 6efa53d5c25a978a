/**
 * IMP grammar, composed from the combinators.
 *
 * Every rule is a function that builds a fresh combinator. Rules that reach
 * back to themselves (statement bodies, parenthesised expressions, `not`)
 * go through `lazy`, so building a rule never recurses into itself.
 */

import { TokenTag } from '../lexer/tokens';
import { Combinator, Combine, anyOf, keyword, lazy, optional, phrase, tag } from './combinators';
import { precedence } from './precedence';
import * as AST from './ast';

// Earlier levels bind tighter.
export const AEXP_PRECEDENCE_LEVELS: readonly (readonly AST.ArithOp[])[] = [
  ['*', '/'],
  ['+', '-'],
];

export const BEXP_PRECEDENCE_LEVELS: readonly (readonly AST.LogicOp[])[] = [
  ['and'],
  ['or'],
];

export const RELATIONAL_OPERATORS: readonly AST.RelOp[] = ['<', '<=', '>', '>=', '=', '!='];

/** Integer literal; literals beyond `Number.MAX_SAFE_INTEGER` do not match. */
export const num: Combinator<number> = tag(TokenTag.INT)
  .filter(isSafeIntegerLiteral)
  .map(text => parseInt(text, 10));

export const id: Combinator<string> = tag(TokenTag.ID);

/** The whole program: a statement list that must consume every token. */
export function program(): Combinator<AST.Statement> {
  return phrase(stmtList());
}

// ─── Statements ────────────────────────────────────────

export function stmtList(): Combinator<AST.Statement> {
  const separator = keyword(';').map((): Combine<AST.Statement> => AST.compoundStatement);
  return stmt().foldSeparated(separator);
}

export function stmt(): Combinator<AST.Statement> {
  return assignStmt().alternate(ifStmt()).alternate(whileStmt());
}

export function assignStmt(): Combinator<AST.Statement> {
  return id
    .sequence(keyword(':='))
    .sequence(aexp())
    .map(([[name], value]): AST.Statement => AST.assignStatement(name, value));
}

export function ifStmt(): Combinator<AST.Statement> {
  return keyword('if')
    .sequence(bexp())
    .sequence(keyword('then'))
    .sequence(lazy(stmtList))
    .sequence(optional(keyword('else').sequence(lazy(stmtList))))
    .sequence(keyword('end'))
    .map((parsed): AST.Statement => {
      // ((((('if', condition), 'then'), trueStmt), else?), 'end')
      const [[[[[, condition]], trueStmt], falsePart]] = parsed;
      const falseStmt = falsePart.present ? falsePart.value[1] : null;
      return AST.ifStatement(condition, trueStmt, falseStmt);
    });
}

export function whileStmt(): Combinator<AST.Statement> {
  return keyword('while')
    .sequence(bexp())
    .sequence(keyword('do'))
    .sequence(lazy(stmtList))
    .sequence(keyword('end'))
    .map(([[[[, condition]], body]]): AST.Statement => AST.whileStatement(condition, body));
}

// ─── Boolean expressions ───────────────────────────────

export function bexp(): Combinator<AST.Bexp> {
  return precedence(bexpTerm(), BEXP_PRECEDENCE_LEVELS, processLogic);
}

export function bexpTerm(): Combinator<AST.Bexp> {
  return bexpNot().alternate(bexpRelop()).alternate(bexpGroup());
}

export function bexpNot(): Combinator<AST.Bexp> {
  return keyword('not')
    .sequence(lazy(bexpTerm))
    .map(([, operand]): AST.Bexp => AST.notBexp(operand));
}

export function bexpRelop(): Combinator<AST.Bexp> {
  return aexp()
    .sequence(anyOf(RELATIONAL_OPERATORS))
    .sequence(aexp())
    .map(([[left, op], right]): AST.Bexp => AST.relopBexp(op, left, right));
}

export function bexpGroup(): Combinator<AST.Bexp> {
  return keyword('(').sequence(lazy(bexp)).sequence(keyword(')')).map(processGroup);
}

// ─── Arithmetic expressions ────────────────────────────

export function aexp(): Combinator<AST.Aexp> {
  return precedence(aexpTerm(), AEXP_PRECEDENCE_LEVELS, processBinop);
}

export function aexpTerm(): Combinator<AST.Aexp> {
  return aexpValue().alternate(aexpGroup());
}

export function aexpValue(): Combinator<AST.Aexp> {
  const int = num.map((value): AST.Aexp => AST.intAexp(value));
  const variable = id.map((name): AST.Aexp => AST.varAexp(name));
  return int.alternate(variable);
}

export function aexpGroup(): Combinator<AST.Aexp> {
  return keyword('(').sequence(lazy(aexp)).sequence(keyword(')')).map(processGroup);
}

// ─── Operator processing ───────────────────────────────

export function processBinop(op: AST.ArithOp): Combine<AST.Aexp> {
  return (left, right) => AST.binopAexp(op, left, right);
}

export function processLogic(op: AST.LogicOp): Combine<AST.Bexp> {
  switch (op) {
    case 'and':
      return (left, right) => AST.andBexp(left, right);
    case 'or':
      return (left, right) => AST.orBexp(left, right);
  }
}

export function isSafeIntegerLiteral(text: string): boolean {
  return Number.isSafeInteger(Number(text));
}

function processGroup<T>([[, inner]]: [[string, T], string]): T {
  return inner;
}
