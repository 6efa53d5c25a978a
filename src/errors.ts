export interface SourcePosition {
  line: number;
  column: number;
}

/**
 * Error raised by the lexer, the top-level parser, the evaluator and the
 * config loader. Combinators never throw; they return a failure outcome.
 */
export class ImpError extends Error {
  constructor(
    public errorType: string,
    message: string,
    public position?: SourcePosition,
  ) {
    super(`${errorType}: ${message}`);
    this.name = 'ImpError';
  }
}
