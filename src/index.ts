export { Lexer } from './lexer/lexer';
export { Token, TokenTag, RESERVED_SYMBOLS, RESERVED_WORDS } from './lexer/tokens';
export { ImpError, SourcePosition } from './errors';
export {
  Combinator,
  Combine,
  Option,
  ParseOutcome,
  Success,
  Failure,
  FAILURE,
  success,
  literal,
  keyword,
  tag,
  repeat,
  optional,
  lazy,
  phrase,
  anyOf,
} from './parser/combinators';
export { foldSeparated, precedence } from './parser/precedence';
export {
  AEXP_PRECEDENCE_LEVELS,
  BEXP_PRECEDENCE_LEVELS,
  RELATIONAL_OPERATORS,
  aexp,
  bexp,
  stmtList,
  program,
} from './parser/grammar';
export { Parser, impParse } from './parser/parser';
export { toPrintable, PrintableStatement } from './parser/printable';
export * as AST from './parser/ast';
export { Interpreter, InterpreterOptions } from './runtime/interpreter';
export { Environment } from './runtime/environment';
export { ImpConfig, loadConfig, loadConfigForScript } from './runtime/config';

import { Lexer } from './lexer/lexer';
import { Parser } from './parser/parser';
import { Interpreter, InterpreterOptions } from './runtime/interpreter';
import { Environment } from './runtime/environment';

/**
 * Parse an IMP source string into an AST.
 */
export function parse(source: string) {
  const lexer = new Lexer(source);
  const tokens = lexer.tokenize();
  const parser = new Parser();
  return parser.parse(tokens);
}

/**
 * Execute an IMP source string and return the final variable bindings.
 */
export function execute(
  source: string,
  options?: InterpreterOptions & { variables?: Record<string, number> },
): Environment {
  const ast = parse(source);
  const interpreter = new Interpreter({
    trace: options?.trace,
    maxSteps: options?.maxSteps,
  });
  return interpreter.run(ast, new Environment(options?.variables));
}
