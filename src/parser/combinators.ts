/**
 * Parser combinators over a token array.
 *
 * A combinator is an immutable object with one capability, `attempt`, which
 * maps (tokens, position) to a success carrying a value and the next
 * position, or to a failure. Failure never consumes input, so ordered
 * alternation can retry the next branch at the same position without any
 * backtracking bookkeeping.
 */

import { Token, TokenTag } from '../lexer/tokens';

export interface Success<T> {
  ok: true;
  value: T;
  next: number;
}

export interface Failure {
  ok: false;
}

export type ParseOutcome<T> = Success<T> | Failure;

export type Option<T> = { present: true; value: T } | { present: false };

/** Binary combining function produced by a separator parser. */
export type Combine<T> = (left: T, right: T) => T;

export const FAILURE: Failure = { ok: false };

export function success<T>(value: T, next: number): Success<T> {
  return { ok: true, value, next };
}

export abstract class Combinator<T> {
  abstract attempt(tokens: readonly Token[], pos: number): ParseOutcome<T>;

  sequence<U>(other: Combinator<U>): Combinator<[T, U]> {
    return new Sequence(this, other);
  }

  alternate<U>(other: Combinator<U>): Combinator<T | U> {
    return new Alternate<T | U>(this, other);
  }

  map<U>(fn: (value: T) => U): Combinator<U> {
    return new MapCombinator(this, fn);
  }

  /** Fails, consuming nothing, when the parsed value does not satisfy `predicate`. */
  filter(predicate: (value: T) => boolean): Combinator<T> {
    return new Filter(this, predicate);
  }

  /**
   * `this (sep this)*`, folded left with the function each separator yields:
   * `a, b, c` become `f(f(a, b), c)`.
   */
  foldSeparated<R>(this: Combinator<R>, separator: Combinator<Combine<R>>): Combinator<R> {
    return new FoldSeparated(this, separator);
  }
}

// ─── Primitives ────────────────────────────────────────

export class Literal<K extends string> extends Combinator<K> {
  constructor(
    private readonly text: K,
    private readonly tag: TokenTag,
  ) {
    super();
  }

  attempt(tokens: readonly Token[], pos: number): ParseOutcome<K> {
    const tok = tokens[pos];
    if (tok !== undefined && tok.text === this.text && tok.tag === this.tag) {
      return success(this.text, pos + 1);
    }
    return FAILURE;
  }
}

export class TagMatch extends Combinator<string> {
  constructor(private readonly tag: TokenTag) {
    super();
  }

  attempt(tokens: readonly Token[], pos: number): ParseOutcome<string> {
    const tok = tokens[pos];
    if (tok !== undefined && tok.tag === this.tag) {
      return success(tok.text, pos + 1);
    }
    return FAILURE;
  }
}

// ─── Combinators ───────────────────────────────────────

export class Sequence<A, B> extends Combinator<[A, B]> {
  constructor(
    private readonly left: Combinator<A>,
    private readonly right: Combinator<B>,
  ) {
    super();
  }

  attempt(tokens: readonly Token[], pos: number): ParseOutcome<[A, B]> {
    const l = this.left.attempt(tokens, pos);
    if (!l.ok) return FAILURE;
    const r = this.right.attempt(tokens, l.next);
    if (!r.ok) return FAILURE;
    return success<[A, B]>([l.value, r.value], r.next);
  }
}

export class Alternate<T> extends Combinator<T> {
  constructor(
    private readonly first: Combinator<T>,
    private readonly second: Combinator<T>,
  ) {
    super();
  }

  attempt(tokens: readonly Token[], pos: number): ParseOutcome<T> {
    const result = this.first.attempt(tokens, pos);
    if (result.ok) return result;
    return this.second.attempt(tokens, pos);
  }
}

export class MapCombinator<T, U> extends Combinator<U> {
  constructor(
    private readonly inner: Combinator<T>,
    private readonly fn: (value: T) => U,
  ) {
    super();
  }

  attempt(tokens: readonly Token[], pos: number): ParseOutcome<U> {
    const result = this.inner.attempt(tokens, pos);
    if (!result.ok) return FAILURE;
    return success(this.fn(result.value), result.next);
  }
}

export class Filter<T> extends Combinator<T> {
  constructor(
    private readonly inner: Combinator<T>,
    private readonly predicate: (value: T) => boolean,
  ) {
    super();
  }

  attempt(tokens: readonly Token[], pos: number): ParseOutcome<T> {
    const result = this.inner.attempt(tokens, pos);
    if (!result.ok || !this.predicate(result.value)) return FAILURE;
    return result;
  }
}

export class Repeat<T> extends Combinator<T[]> {
  constructor(private readonly inner: Combinator<T>) {
    super();
  }

  attempt(tokens: readonly Token[], pos: number): ParseOutcome<T[]> {
    const values: T[] = [];
    let current = pos;
    for (;;) {
      const result = this.inner.attempt(tokens, current);
      if (!result.ok) break;
      values.push(result.value);
      // A zero-width match would repeat forever
      if (result.next === current) break;
      current = result.next;
    }
    return success(values, current);
  }
}

export class OptionalCombinator<T> extends Combinator<Option<T>> {
  constructor(private readonly inner: Combinator<T>) {
    super();
  }

  attempt(tokens: readonly Token[], pos: number): ParseOutcome<Option<T>> {
    const result = this.inner.attempt(tokens, pos);
    if (result.ok) return success<Option<T>>({ present: true, value: result.value }, result.next);
    return success<Option<T>>({ present: false }, pos);
  }
}

/**
 * Defers building its parser until first use, then keeps it. Grammar rules
 * that refer back to themselves go through this, or building them would
 * recurse without end.
 */
export class Lazy<T> extends Combinator<T> {
  private resolved: Combinator<T> | null = null;

  constructor(private readonly supplier: () => Combinator<T>) {
    super();
  }

  attempt(tokens: readonly Token[], pos: number): ParseOutcome<T> {
    if (this.resolved === null) {
      this.resolved = this.supplier();
    }
    return this.resolved.attempt(tokens, pos);
  }
}

export class Phrase<T> extends Combinator<T> {
  constructor(private readonly inner: Combinator<T>) {
    super();
  }

  attempt(tokens: readonly Token[], pos: number): ParseOutcome<T> {
    const result = this.inner.attempt(tokens, pos);
    if (result.ok && result.next === tokens.length) return result;
    return FAILURE;
  }
}

export class FoldSeparated<T> extends Combinator<T> {
  private readonly parser: Combinator<T>;

  constructor(item: Combinator<T>, separator: Combinator<Combine<T>>) {
    super();
    this.parser = item
      .sequence(new Repeat(separator.sequence(item)))
      .map(([seed, rest]) => rest.reduce((acc, [combine, next]) => combine(acc, next), seed));
  }

  attempt(tokens: readonly Token[], pos: number): ParseOutcome<T> {
    return this.parser.attempt(tokens, pos);
  }
}

// ─── Factories ─────────────────────────────────────────

export function literal<K extends string>(text: K, tag: TokenTag): Combinator<K> {
  return new Literal(text, tag);
}

export function keyword<K extends string>(text: K): Combinator<K> {
  return new Literal(text, TokenTag.RESERVED);
}

export function tag(tokenTag: TokenTag): Combinator<string> {
  return new TagMatch(tokenTag);
}

export function repeat<T>(parser: Combinator<T>): Combinator<T[]> {
  return new Repeat(parser);
}

export function optional<T>(parser: Combinator<T>): Combinator<Option<T>> {
  return new OptionalCombinator(parser);
}

export function lazy<T>(supplier: () => Combinator<T>): Combinator<T> {
  return new Lazy(supplier);
}

export function phrase<T>(parser: Combinator<T>): Combinator<T> {
  return new Phrase(parser);
}

/** Ordered choice over `keyword(op)` for each operator, in list order. */
export function anyOf<K extends string>(ops: readonly K[]): Combinator<K> {
  if (ops.length === 0) {
    throw new Error('anyOf requires at least one operator');
  }
  return ops.map(op => keyword(op)).reduce((acc, next) => acc.alternate(next));
}
