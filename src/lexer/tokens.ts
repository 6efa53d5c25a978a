export enum TokenTag {
  RESERVED = 'RESERVED',
  INT = 'INT',
  ID = 'ID',
}

/** Symbols, longest first so that `<=` wins over `<`. */
export const RESERVED_SYMBOLS: readonly string[] = [
  ':=',
  '<=',
  '>=',
  '!=',
  '(',
  ')',
  ';',
  '+',
  '-',
  '*',
  '/',
  '<',
  '>',
  '=',
];

export const RESERVED_WORDS: ReadonlySet<string> = new Set([
  'and',
  'or',
  'not',
  'if',
  'then',
  'else',
  'while',
  'do',
  'end',
]);

export interface Token {
  tag: TokenTag;
  text: string;
  line: number;
  column: number;
}
