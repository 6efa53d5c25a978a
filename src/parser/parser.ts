import { Token } from '../lexer/tokens';
import { ImpError } from '../errors';
import { Combinator, ParseOutcome } from './combinators';
import { program } from './grammar';
import * as AST from './ast';

/**
 * Parse a whole token stream. Failure carries no position or expected-token
 * information.
 */
export function impParse(tokens: readonly Token[]): ParseOutcome<AST.Statement> {
  return program().attempt(tokens, 0);
}

/**
 * Reusable top-level parser. The grammar is built once and shared by every
 * call to `parse`; combinators hold no per-parse state, so calls never
 * interfere with each other.
 */
export class Parser {
  private readonly grammar: Combinator<AST.Statement> = program();

  parse(tokens: readonly Token[]): AST.Statement {
    const result = this.grammar.attempt(tokens, 0);
    if (!result.ok) {
      throw new ImpError('ParseError', 'could not parse program');
    }
    return result.value;
  }
}
