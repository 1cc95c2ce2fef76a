/**
 * Ordered choice (PEG semantics): try each alternative in order, first
 * match wins. A failing alternative is rolled back before the next one
 * starts, so every alternative sees the input exactly as the choice did.
 */

import * as ts from "typescript";
import { type CompilationContext, type Fragment, identity } from "./compilation.js";
import type { ParseContext } from "./context.js";
import { ArgumentError } from "./errors.js";
import { ParseResult } from "./parse-result.js";
import { Parser } from "./parser.js";

/** One step of a compiled choice: a child fragment and how to upcast its value. */
interface CompiledAlternative {
  readonly fragment: Fragment;
  readonly convert: (value: never) => unknown;
}

/**
 * Build the choice fragment shared by both `OneOf` forms: one labelled block
 * in which the alternatives follow each other, so nesting depth does not grow
 * with their number.
 *
 * ```js
 * context.enterParser(self);
 * orStart = context.scanner.cursor.position;
 * choice: {
 *   <alt 1> if (alt1.success) { orSuccess = true; orValue = alt1.value; break choice; }
 *   context.scanner.cursor.resetPosition(orStart);
 *   <alt 2> if (alt2.success) { ...; break choice; }
 *   context.scanner.cursor.resetPosition(orStart);
 *   orSuccess = false;
 * }
 * ```
 */
function compileChoice(
  self: Parser<unknown>,
  context: CompilationContext,
  count: number,
  compileAlternative: (index: number) => CompiledAlternative
): Fragment {
  const f = context.factory;
  const success = context.declare("orSuccess");
  const value = context.declare("orValue");
  const enter = context.enterParser(self);

  if (count === 0) {
    return {
      variables: [success],
      body: [enter, context.assign(success, f.createFalse())],
      success,
      value: f.createVoidZero(),
    };
  }

  const start = context.declare("orStart");
  const label = context.declare("choice");
  const statements: ts.Statement[] = [];

  for (let index = 0; index < count; index++) {
    const { fragment, convert } = compileAlternative(index);
    statements.push(
      ...context.inline(fragment),
      f.createIfStatement(
        fragment.success,
        f.createBlock(
          [
            context.assign(success, f.createTrue()),
            context.assign(value, context.convert(fragment.value, convert)),
            f.createBreakStatement(label),
          ],
          true
        )
      ),
      // the alternative may have consumed input before failing
      context.resetPosition(start)
    );
  }
  statements.push(context.assign(success, f.createFalse()));

  return {
    variables: [success, value, start],
    body: [
      enter,
      context.assign(start, context.cursorPosition()),
      f.createLabeledStatement(label, f.createBlock(statements, true)),
    ],
    success,
    value,
  };
}

/**
 * OneOf the inner choices when all parsers return the same type. The
 * winning alternative's result is reported as is.
 */
export class OneOf<T> extends Parser<T> {
  readonly parsers: readonly Parser<T>[];

  constructor(parsers: readonly Parser<T>[]) {
    super();
    const candidate: unknown = parsers;
    if (!Array.isArray(candidate)) {
      throw new ArgumentError("parsers");
    }
    parsers.forEach((parser, index) => {
      if (parser == null) throw new ArgumentError(`parsers[${index}]`);
    });
    this.parsers = Object.freeze([...parsers]);
  }

  parse(context: ParseContext, result: ParseResult<T>): boolean {
    context.enterParser(this);

    if (this.parsers.length === 0) {
      return false;
    }

    const cursor = context.scanner.cursor;
    const start = cursor.position;

    for (const parser of this.parsers) {
      if (parser.parse(context, result)) {
        return true;
      }

      // the alternative may have consumed input before failing
      cursor.resetPosition(start);
    }

    return false;
  }

  override compile(context: CompilationContext): Fragment {
    return compileChoice(this, context, this.parsers.length, (index) => ({
      fragment: context.compileChild(this.parsers[index]),
      convert: identity,
    }));
  }
}

/**
 * Two-way choice between parsers of different result types, both upcast to
 * `T`. Avoids the array walk of `OneOf` for the common binary case.
 *
 * The conversions make the upcast explicit; pass `identity` (the default in
 * `or`) when `A` and `B` are already subtypes of `T`.
 */
export class OneOf2<A, B, T> extends Parser<T> {
  constructor(
    readonly parserA: Parser<A>,
    readonly parserB: Parser<B>,
    readonly convertA: (value: A) => T,
    readonly convertB: (value: B) => T
  ) {
    super();
    if (parserA == null) throw new ArgumentError("parserA");
    if (parserB == null) throw new ArgumentError("parserB");
    if (typeof convertA !== "function") throw new ArgumentError("convertA");
    if (typeof convertB !== "function") throw new ArgumentError("convertB");
  }

  parse(context: ParseContext, result: ParseResult<T>): boolean {
    context.enterParser(this);

    const cursor = context.scanner.cursor;
    const start = cursor.position;

    const resultA = new ParseResult<A>();
    if (this.parserA.parse(context, resultA)) {
      result.set(resultA.start, resultA.end, this.convertA(resultA.value));
      return true;
    }

    cursor.resetPosition(start);

    // B's own span and value: A's record may hold whatever A wrote before failing
    const resultB = new ParseResult<B>();
    if (this.parserB.parse(context, resultB)) {
      result.set(resultB.start, resultB.end, this.convertB(resultB.value));
      return true;
    }

    cursor.resetPosition(start);
    return false;
  }

  override compile(context: CompilationContext): Fragment {
    return compileChoice(this, context, 2, (index) =>
      index === 0
        ? { fragment: context.compileChild(this.parserA), convert: this.convertA }
        : { fragment: context.compileChild(this.parserB), convert: this.convertB }
    );
  }
}
