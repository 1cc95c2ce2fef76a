/**
 * Error types for @weft/parser
 *
 * Grammar mismatches are never errors: parsers report them by returning
 * `false`. These classes cover programmer mistakes and the two convenience
 * surfaces that turn a failed match into an exception.
 */

import type { TextPosition } from "./scanner.js";

/** A combinator was constructed with an absent argument. */
export class ArgumentError extends TypeError {
  /** Name of the offending constructor argument. */
  readonly argument: string;

  constructor(argument: string, message?: string) {
    super(message ?? `Argument '${argument}' must not be null or undefined`);
    this.name = "ArgumentError";
    this.argument = argument;
  }
}

/** Descriptive parse error with position context, thrown by `Parser.parseAll`. */
export class ParseError extends Error {
  readonly position: TextPosition;
  /** What the parser expected at the failure position. */
  readonly expected: string;

  constructor(input: string, position: TextPosition, expected: string) {
    const snippet = input.slice(Math.max(0, position.offset - 10), position.offset + 20);
    super(
      `Parse error at line ${position.line}, col ${position.column}: expected ${expected}\n  ...${snippet}...`
    );
    this.name = "ParseError";
    this.position = position;
    this.expected = expected;
  }
}

/** Assembling a compiled parser failed to generate or materialize its code. */
export class CompilationError extends Error {
  /** The generated function body; empty when generation itself failed. */
  readonly source: string;

  constructor(message: string, source: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "CompilationError";
    this.source = source;
  }
}
