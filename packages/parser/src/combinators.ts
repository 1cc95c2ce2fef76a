/**
 * Programmatic combinator API for @weft/parser
 *
 * Thin constructors over the parser classes. Every returned parser supports
 * both execution modes: call `parse`/`tryParse` to interpret it, or pass it
 * to `assemble` for the compiled path.
 */

import { identity } from "./compilation.js";
import { ArgumentError } from "./errors.js";
import { TextLiteral, PatternLiteral } from "./literals.js";
import { OneOf, OneOf2 } from "./one-of.js";
import type { Parser } from "./parser.js";
import type { CharPredicate } from "./scanner.js";
import { Then } from "./then.js";

// ---------------------------------------------------------------------------
// Leaves
// ---------------------------------------------------------------------------

/** Match an exact string literal. */
export function literal(text: string, options: { caseInsensitive?: boolean } = {}): Parser<string> {
  return new TextLiteral(text, options.caseInsensitive ?? false);
}

/** Match a run of characters accepted by `predicate`. */
export function pattern(
  predicate: CharPredicate,
  options: { min?: number; max?: number } = {}
): Parser<string> {
  return new PatternLiteral(predicate, options.min ?? 1, options.max ?? 0);
}

export const isDigit: CharPredicate = (ch) => ch >= "0" && ch <= "9";

export const isLetter: CharPredicate = (ch) => (ch >= "a" && ch <= "z") || (ch >= "A" && ch <= "Z");

/** One or more ASCII digits. */
export function digits(): Parser<string> {
  return pattern(isDigit);
}

/** One or more ASCII letters. */
export function letters(): Parser<string> {
  return pattern(isLetter);
}

// ---------------------------------------------------------------------------
// Transformation
// ---------------------------------------------------------------------------

/** Transform a parser's result with a function. */
export function map<T, U>(parser: Parser<T>, transform: (value: T) => U): Parser<U> {
  return new Then(parser, transform);
}

// ---------------------------------------------------------------------------
// Alternation
// ---------------------------------------------------------------------------

/** Ordered choice over any number of same-typed alternatives. */
export function oneOf<T>(...parsers: Parser<T>[]): OneOf<T> {
  return new OneOf(parsers);
}

/** Ordered choice between two differently typed parsers, typed as their union. */
export function or<A, B>(a: Parser<A>, b: Parser<B>): OneOf2<A, B, A | B>;
/** Ordered choice between two parsers, converting each result to `T`. */
export function or<A, B, T>(
  a: Parser<A>,
  b: Parser<B>,
  convertA: (value: A) => T,
  convertB: (value: B) => T
): OneOf2<A, B, T>;
export function or<A, B, T>(
  a: Parser<A>,
  b: Parser<B>,
  convertA?: (value: A) => T,
  convertB?: (value: B) => T
): OneOf2<A, B, T> | OneOf2<A, B, A | B> {
  if (convertA == null && convertB == null) {
    return new OneOf2<A, B, A | B>(a, b, identity, identity);
  }
  // conversions come in pairs
  if (convertA == null) throw new ArgumentError("convertA");
  if (convertB == null) throw new ArgumentError("convertB");
  return new OneOf2(a, b, convertA, convertB);
}
