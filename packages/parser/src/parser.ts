/**
 * The parser capability every combinator implements.
 *
 * A parser is stateless and immutable once constructed: everything a single
 * parse needs lives in the `ParseContext` and `ParseResult` passed in, so one
 * parser graph can serve any number of independent parses.
 */

import type { CompilationContext, Fragment } from "./compilation.js";
import { ParseContext, type ParseContextOptions } from "./context.js";
import { ParseError } from "./errors.js";
import { ParseResult } from "./parse-result.js";
import type { TextPosition } from "./scanner.js";

/** Outcome of `Parser.tryParse`. */
export type ParseOutcome<T> =
  | { ok: true; value: T; start: TextPosition; end: TextPosition }
  | { ok: false; position: TextPosition };

export abstract class Parser<T> {
  /** Display name used in diagnostics and logs. */
  get name(): string {
    return this.constructor.name;
  }

  /**
   * Attempt a match at the context's cursor.
   *
   * On success, writes `(start, end, value)` to `result` and returns true;
   * `start` is the cursor position on entry and `end` the position after the
   * consumed input. On failure, returns false and leaves `result` untouched.
   */
  abstract parse(context: ParseContext, result: ParseResult<T>): boolean;

  /**
   * Produce the fragment that reproduces `parse`.
   *
   * The default delegates to `parse` through the constants table, which lets
   * any parser take part in compilation. Combinators override it to splice
   * their logic (and their children's) inline.
   */
  compile(context: CompilationContext): Fragment {
    const f = context.factory;
    const success = context.declare("delegateSuccess");
    const result = context.declare("delegateResult");

    return {
      variables: [success, result],
      body: [
        context.assign(result, f.createNewExpression(context.constant(ParseResult), undefined, [])),
        context.assign(
          success,
          f.createCallExpression(
            f.createPropertyAccessExpression(context.constant(this), "parse"),
            undefined,
            [context.parseContext, result]
          )
        ),
      ],
      success,
      value: f.createPropertyAccessExpression(result, "value"),
    };
  }

  /** Run against `text` from its start. Never throws on a mismatch. */
  tryParse(text: string, options?: ParseContextOptions): ParseOutcome<T> {
    const context = new ParseContext(text, options);
    const result = new ParseResult<T>();

    if (this.parse(context, result)) {
      return { ok: true, value: result.value, start: result.start, end: result.end };
    }
    return { ok: false, position: context.cursor.position };
  }

  /**
   * Parse the whole of `text`.
   *
   * @throws ParseError if the parser fails or stops before the end of input
   */
  parseAll(text: string): T {
    const outcome = this.tryParse(text);
    if (!outcome.ok) {
      throw new ParseError(text, outcome.position, this.name);
    }
    if (outcome.end.offset !== text.length) {
      throw new ParseError(text, outcome.end, "end of input");
    }
    return outcome.value;
  }

  toString(): string {
    return this.name;
  }
}
