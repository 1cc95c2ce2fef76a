/**
 * @weft/parser
 *
 * Execution core of the weft parser-combinator toolkit.
 *
 * Provides:
 * - The `Parser` capability: interpreted `parse` plus fragment-producing `compile`
 * - Position, cursor and scanner; per-call `ParseContext`; `ParseResult`
 * - Ordered choice: n-ary `OneOf<T>` and two-way `OneOf2<A, B, T>`
 * - Leaf parsers and `map`
 * - `assemble`, which compiles a parser graph into one generated function
 *
 * @module
 */

// Positions and scanning
export { TextPosition, Cursor, Scanner, type CharPredicate } from "./scanner.js";

// Per-call state
export { ParseContext, type ParseContextOptions } from "./context.js";
export { ParseResult } from "./parse-result.js";

// Capability
export { Parser, type ParseOutcome } from "./parser.js";

// Compilation
export {
  CompilationContext,
  PARAMETERS,
  identity,
  isIdentity,
  type Fragment,
} from "./compilation.js";
export { CompiledParser, type ParseFunction } from "./compiled-parser.js";
export { assemble } from "./assemble.js";

// Parsers
export { OneOf, OneOf2 } from "./one-of.js";
export { TextLiteral, PatternLiteral } from "./literals.js";
export { Then } from "./then.js";

// Combinator API
export {
  literal,
  pattern,
  digits,
  letters,
  isDigit,
  isLetter,
  map,
  oneOf,
  or,
} from "./combinators.js";

// Errors
export { ArgumentError, ParseError, CompilationError } from "./errors.js";
