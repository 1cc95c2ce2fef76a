/**
 * Leaf parsers: they read the cursor directly and never call other parsers.
 */

import type { CompilationContext, Fragment } from "./compilation.js";
import type { ParseContext } from "./context.js";
import { ArgumentError } from "./errors.js";
import type { ParseResult } from "./parse-result.js";
import { Parser } from "./parser.js";
import type { CharPredicate } from "./scanner.js";

/** Match an exact string. The value is the consumed text. */
export class TextLiteral extends Parser<string> {
  constructor(
    readonly text: string,
    readonly caseInsensitive = false
  ) {
    super();
    if (typeof text !== "string") throw new ArgumentError("text");
  }

  override get name(): string {
    return JSON.stringify(this.text);
  }

  parse(context: ParseContext, result: ParseResult<string>): boolean {
    context.enterParser(this);

    const cursor = context.scanner.cursor;
    const start = cursor.position;
    const matched = cursor.readText(this.text, this.caseInsensitive);

    if (matched === null) return false;

    result.set(start, cursor.position, matched);
    return true;
  }

  override compile(context: CompilationContext): Fragment {
    const f = context.factory;
    const success = context.declare("litSuccess");
    const value = context.declare("litValue");

    return {
      variables: [success, value],
      body: [
        context.enterParser(this),
        context.assign(
          value,
          context.callCursor("readText", [
            f.createStringLiteral(this.text),
            this.caseInsensitive ? f.createTrue() : f.createFalse(),
          ])
        ),
        context.assign(success, f.createStrictInequality(value, f.createNull())),
      ],
      success,
      value,
    };
  }
}

/**
 * Match a run of characters accepted by `predicate`: at least `min`, at
 * most `max` (`0` = unbounded). The value is the consumed run.
 */
export class PatternLiteral extends Parser<string> {
  constructor(
    readonly predicate: CharPredicate,
    readonly min = 1,
    readonly max = 0
  ) {
    super();
    if (typeof predicate !== "function") throw new ArgumentError("predicate");
    if (!Number.isInteger(min) || min < 0) {
      throw new ArgumentError("min", `Argument 'min' must be a non-negative integer, got ${min}`);
    }
    if (!Number.isInteger(max) || max < 0 || (max !== 0 && max < min)) {
      throw new ArgumentError("max", `Argument 'max' must be 0 or an integer >= min, got ${max}`);
    }
  }

  parse(context: ParseContext, result: ParseResult<string>): boolean {
    context.enterParser(this);

    const cursor = context.scanner.cursor;
    const start = cursor.position;
    const matched = cursor.readWhile(this.predicate, this.min, this.max);

    if (matched === null) return false;

    result.set(start, cursor.position, matched);
    return true;
  }

  override compile(context: CompilationContext): Fragment {
    const f = context.factory;
    const success = context.declare("patSuccess");
    const value = context.declare("patValue");

    return {
      variables: [success, value],
      body: [
        context.enterParser(this),
        context.assign(
          value,
          context.callCursor("readWhile", [
            context.constant(this.predicate),
            f.createNumericLiteral(this.min),
            f.createNumericLiteral(this.max),
          ])
        ),
        context.assign(success, f.createStrictInequality(value, f.createNull())),
      ],
      success,
      value,
    };
  }
}
