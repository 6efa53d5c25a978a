import { Combinator, Combine, anyOf } from './combinators';

/** One or more `item`s joined by `separator`, folded left. */
export function foldSeparated<T>(item: Combinator<T>, separator: Combinator<Combine<T>>): Combinator<T> {
  return item.foldSeparated(separator);
}

/**
 * Builds a binary-operator parser from an ordered list of precedence levels.
 *
 * Each level folds its operators over the parser produced by the levels
 * before it, so earlier levels bind tighter: with `[['*', '/'], ['+', '-']]`
 * products become the terms that sums are made of. Reordering the levels
 * changes the language.
 */
export function precedence<T, K extends string>(
  base: Combinator<T>,
  levels: readonly (readonly K[])[],
  combine: (op: K) => Combine<T>,
): Combinator<T> {
  let parser = base;
  for (const level of levels) {
    parser = foldSeparated(parser, anyOf(level).map(combine));
  }
  return parser;
}
