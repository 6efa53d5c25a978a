import { Lexer } from '../src/lexer/lexer';
import { TokenTag } from '../src/lexer/tokens';
import {
  Combinator,
  FAILURE,
  anyOf,
  keyword,
  lazy,
  literal,
  optional,
  phrase,
  repeat,
  tag,
} from '../src/parser/combinators';

function lex(source: string) {
  return new Lexer(source).tokenize();
}

describe('Combinators', () => {
  describe('literal / keyword', () => {
    it('should match text and tag together', () => {
      expect(keyword(':=').attempt(lex(':='), 0)).toEqual({ ok: true, value: ':=', next: 1 });
    });

    it('should fail when the tag differs', () => {
      expect(literal('x', TokenTag.RESERVED).attempt(lex('x'), 0)).toEqual(FAILURE);
    });

    it('should fail when the text differs', () => {
      expect(keyword('if').attempt(lex('while'), 0)).toEqual(FAILURE);
    });

    it('should fail at end of input', () => {
      expect(keyword(';').attempt(lex('x'), 1)).toEqual({ ok: false });
    });
  });

  describe('tag', () => {
    it('should yield the token text', () => {
      expect(tag(TokenTag.INT).attempt(lex('42'), 0)).toEqual({ ok: true, value: '42', next: 1 });
    });

    it('should fail on another tag', () => {
      expect(tag(TokenTag.INT).attempt(lex('x'), 0)).toEqual(FAILURE);
    });
  });

  describe('sequence', () => {
    it('should pair both values', () => {
      const p = keyword('(').sequence(tag(TokenTag.INT));
      expect(p.attempt(lex('( 1'), 0)).toEqual({ ok: true, value: ['(', '1'], next: 2 });
    });

    it('should fail if the second parser fails', () => {
      const p = keyword('(').sequence(tag(TokenTag.INT));
      expect(p.attempt(lex('( )'), 0)).toEqual(FAILURE);
    });
  });

  describe('alternate', () => {
    it('should fall back to the second parser', () => {
      const p = tag(TokenTag.INT).alternate(tag(TokenTag.ID));
      expect(p.attempt(lex('x'), 0)).toEqual({ ok: true, value: 'x', next: 1 });
    });

    it('should commit to the first success', () => {
      const p = tag(TokenTag.ID)
        .map(() => 'first')
        .alternate(tag(TokenTag.ID).map(() => 'second'));
      expect(p.attempt(lex('x'), 0)).toEqual({ ok: true, value: 'first', next: 1 });
    });

    it('should not prefer a longer match', () => {
      const short = keyword('(').map(() => 'short');
      const long = keyword('(').sequence(tag(TokenTag.INT)).map(() => 'long');
      expect(short.alternate(long).attempt(lex('( 1'), 0)).toEqual({ ok: true, value: 'short', next: 1 });
    });

    it('should retry the second branch at the original position', () => {
      // Fails on the third token, after two tokens matched
      const group = keyword('(').sequence(tag(TokenTag.INT)).sequence(keyword(')')).map(() => 'group');
      const open = keyword('(').map(() => 'open');
      const tokens = lex('( 1 ;');
      expect(group.attempt(tokens, 0)).toEqual(FAILURE);
      expect(group.alternate(open).attempt(tokens, 0)).toEqual({ ok: true, value: 'open', next: 1 });
    });
  });

  describe('map', () => {
    it('should transform the value and keep the position', () => {
      const p = tag(TokenTag.INT).map(text => parseInt(text, 10) * 2);
      expect(p.attempt(lex('21 x'), 0)).toEqual({ ok: true, value: 42, next: 1 });
    });

    it('should not call the function on failure', () => {
      const fn = jest.fn((text: string) => text);
      expect(tag(TokenTag.INT).map(fn).attempt(lex('x'), 0)).toEqual(FAILURE);
      expect(fn).not.toHaveBeenCalled();
    });
  });

  describe('repeat', () => {
    it('should collect matches until failure', () => {
      expect(repeat(tag(TokenTag.INT)).attempt(lex('1 2 3 x'), 0)).toEqual({
        ok: true,
        value: ['1', '2', '3'],
        next: 3,
      });
    });

    it('should succeed with no matches', () => {
      expect(repeat(tag(TokenTag.INT)).attempt(lex('x'), 0)).toEqual({ ok: true, value: [], next: 0 });
    });

    it('should stop on a match that consumes nothing', () => {
      expect(repeat(optional(tag(TokenTag.INT))).attempt(lex('x'), 0)).toEqual({
        ok: true,
        value: [{ present: false }],
        next: 0,
      });
    });
  });

  describe('optional', () => {
    it('should wrap a present value', () => {
      expect(optional(tag(TokenTag.ID)).attempt(lex('x'), 0)).toEqual({
        ok: true,
        value: { present: true, value: 'x' },
        next: 1,
      });
    });

    it('should mark an absent value without consuming', () => {
      expect(optional(tag(TokenTag.ID)).attempt(lex('1'), 0)).toEqual({
        ok: true,
        value: { present: false },
        next: 0,
      });
    });
  });

  describe('lazy', () => {
    it('should build the parser on first use only', () => {
      const supplier = jest.fn(() => tag(TokenTag.INT));
      const p = lazy(supplier);
      expect(supplier).not.toHaveBeenCalled();

      expect(p.attempt(lex('1'), 0)).toEqual({ ok: true, value: '1', next: 1 });
      expect(p.attempt(lex('2'), 0)).toEqual({ ok: true, value: '2', next: 1 });
      expect(supplier).toHaveBeenCalledTimes(1);
    });

    it('should allow a rule to refer to itself', () => {
      // depth := '(' depth ')' | INT
      const depth = (): Combinator<number> =>
        keyword('(')
          .sequence(lazy(depth))
          .sequence(keyword(')'))
          .map(([[, inner]]) => inner + 1)
          .alternate(tag(TokenTag.INT).map(() => 0));

      expect(depth().attempt(lex('( ( ( 7 ) ) )'), 0)).toEqual({ ok: true, value: 3, next: 7 });
    });
  });

  describe('phrase', () => {
    it('should accept a parse that reaches the end', () => {
      expect(phrase(tag(TokenTag.INT)).attempt(lex('1'), 0)).toEqual({ ok: true, value: '1', next: 1 });
    });

    it('should reject trailing tokens', () => {
      const tokens = lex('1 2');
      expect(tag(TokenTag.INT).attempt(tokens, 0)).toEqual({ ok: true, value: '1', next: 1 });
      expect(phrase(tag(TokenTag.INT)).attempt(tokens, 0)).toEqual(FAILURE);
    });
  });

  describe('anyOf', () => {
    it('should match any listed operator', () => {
      expect(anyOf(['+', '-']).attempt(lex('-'), 0)).toEqual({ ok: true, value: '-', next: 1 });
    });

    it('should fail on an operator outside the list', () => {
      expect(anyOf(['+', '-']).attempt(lex('*'), 0)).toEqual(FAILURE);
    });

    it('should throw on an empty list', () => {
      expect(() => anyOf([])).toThrow('anyOf requires at least one operator');
    });
  });

  describe('statelessness', () => {
    it('should give the same result when reused at different positions', () => {
      const p = keyword('(').sequence(tag(TokenTag.INT));
      const tokens = lex('( 1 ( 2');
      const first = p.attempt(tokens, 0);
      const second = p.attempt(tokens, 2);
      expect(second).toEqual({ ok: true, value: ['(', '2'], next: 4 });
      expect(p.attempt(tokens, 0)).toEqual(first);
    });
  });
});
