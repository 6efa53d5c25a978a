import { Lexer } from '../src/lexer/lexer';
import { Combine, keyword } from '../src/parser/combinators';
import { foldSeparated, precedence } from '../src/parser/precedence';
import { num } from '../src/parser/grammar';

function lex(source: string) {
  return new Lexer(source).tokenize();
}

describe('foldSeparated', () => {
  const minus = keyword('-').map((): Combine<number> => (l, r) => l - r);
  const show = keyword('-').map((): Combine<string> => (l, r) => `(${l}-${r})`);
  const digits = num.map(n => String(n));

  it('should fold left-associatively', () => {
    expect(foldSeparated(num, minus).attempt(lex('10 - 3 - 2'), 0)).toEqual({ ok: true, value: 5, next: 5 });
    expect(foldSeparated(digits, show).attempt(lex('1 - 2 - 3'), 0)).toEqual({
      ok: true,
      value: '((1-2)-3)',
      next: 5,
    });
  });

  it('should return the seed when there is no separator', () => {
    expect(foldSeparated(num, minus).attempt(lex('7'), 0)).toEqual({ ok: true, value: 7, next: 1 });
  });

  it('should leave a dangling separator unconsumed', () => {
    expect(foldSeparated(num, minus).attempt(lex('1 -'), 0)).toEqual({ ok: true, value: 1, next: 1 });
  });

  it('should be available as a method', () => {
    expect(num.foldSeparated(minus).attempt(lex('9 - 4'), 0)).toEqual({ ok: true, value: 5, next: 3 });
  });
});

describe('precedence', () => {
  function combine(op: '*' | '+' | '-'): Combine<number> {
    switch (op) {
      case '*': return (l, r) => l * r;
      case '+': return (l, r) => l + r;
      case '-': return (l, r) => l - r;
    }
  }

  function evaluate(levels: readonly (readonly ('*' | '+' | '-')[])[], source: string) {
    const result = precedence(num, levels, combine).attempt(lex(source), 0);
    return result.ok ? result.value : undefined;
  }

  it('should bind earlier levels tighter', () => {
    expect(evaluate([['*'], ['+']], '2 * 3 + 4')).toBe(10);
    expect(evaluate([['*'], ['+']], '2 + 3 * 4')).toBe(14);
  });

  it('should change meaning when the levels are swapped', () => {
    expect(evaluate([['+'], ['*']], '2 * 3 + 4')).toBe(14);
    expect(evaluate([['+'], ['*']], '2 + 3 * 4')).toBe(20);
  });

  it('should fold operators of one level left to right', () => {
    expect(evaluate([['+', '-']], '8 - 2 + 1')).toBe(7);
  });

  it('should return the base parser for no levels', () => {
    expect(evaluate([], '5')).toBe(5);
  });
});
