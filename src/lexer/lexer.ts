import { Token, TokenTag, RESERVED_SYMBOLS, RESERVED_WORDS } from './tokens';
import { ImpError } from '../errors';

export class Lexer {
  private source: string;
  private tokens: Token[] = [];
  private pos = 0;
  private line = 1;
  private column = 1;

  constructor(source: string) {
    this.source = source;
  }

  tokenize(): Token[] {
    this.tokens = [];
    this.pos = 0;
    this.line = 1;
    this.column = 1;

    while (this.pos < this.source.length) {
      const ch = this.source[this.pos];

      if (ch === ' ' || ch === '\t' || ch === '\r') {
        this.advance();
        continue;
      }

      if (ch === '\n') {
        this.advance();
        this.line++;
        this.column = 1;
        continue;
      }

      // Comments run to end of line
      if (ch === '#') {
        while (this.pos < this.source.length && this.source[this.pos] !== '\n') {
          this.advance();
        }
        continue;
      }

      if (this.isDigit(ch)) {
        this.readInteger();
        continue;
      }

      if (this.isAlpha(ch)) {
        this.readWord();
        continue;
      }

      this.readSymbol();
    }

    return this.tokens;
  }

  private readInteger(): void {
    const startCol = this.column;
    let digits = '';
    while (this.pos < this.source.length && this.isDigit(this.source[this.pos])) {
      digits += this.source[this.pos];
      this.advance();
    }
    if (!Number.isSafeInteger(Number(digits))) {
      throw new ImpError('LexError', `Integer literal ${digits} exceeds ${Number.MAX_SAFE_INTEGER} at line ${this.line}, column ${startCol}`, {
        line: this.line,
        column: startCol,
      });
    }
    this.addTokenAt(TokenTag.INT, digits, startCol);
  }

  private readWord(): void {
    const startCol = this.column;
    let word = '';
    while (this.pos < this.source.length && (this.isAlphaNumeric(this.source[this.pos]) || this.source[this.pos] === '_')) {
      word += this.source[this.pos];
      this.advance();
    }
    const tag = RESERVED_WORDS.has(word) ? TokenTag.RESERVED : TokenTag.ID;
    this.addTokenAt(tag, word, startCol);
  }

  private readSymbol(): void {
    const startCol = this.column;
    const symbol = RESERVED_SYMBOLS.find(s => this.source.startsWith(s, this.pos));
    if (symbol === undefined) {
      throw this.error(`Illegal character '${this.source[this.pos]}'`);
    }
    for (let i = 0; i < symbol.length; i++) this.advance();
    this.addTokenAt(TokenTag.RESERVED, symbol, startCol);
  }

  private advance(): void {
    this.pos++;
    this.column++;
  }

  private addTokenAt(tag: TokenTag, text: string, column: number): void {
    this.tokens.push({ tag, text, line: this.line, column });
  }

  private isDigit(ch: string): boolean {
    return ch >= '0' && ch <= '9';
  }

  private isAlpha(ch: string): boolean {
    return (ch >= 'a' && ch <= 'z') || (ch >= 'A' && ch <= 'Z');
  }

  private isAlphaNumeric(ch: string): boolean {
    return this.isAlpha(ch) || this.isDigit(ch);
  }

  private error(message: string): ImpError {
    return new ImpError('LexError', `${message} at line ${this.line}, column ${this.column}`, {
      line: this.line,
      column: this.column,
    });
  }
}
