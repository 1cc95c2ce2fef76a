/**
 * Shared helpers for the parser tests: misbehaving parsers and a harness that
 * runs a parser through both execution modes.
 */

import {
  Parser,
  ParseContext,
  ParseResult,
  assemble,
  type ParseContextOptions,
} from "../index.js";

/**
 * Consumes `count` characters and then fails without restoring the cursor
 * or touching the result.
 */
export class Overrun extends Parser<string> {
  constructor(readonly count: number) {
    super();
  }

  parse(context: ParseContext, _result: ParseResult<string>): boolean {
    context.enterParser(this);
    context.scanner.cursor.advance(this.count);
    return false;
  }
}

/**
 * Consumes `count` characters, writes them to the result as if it had
 * matched, then reports failure.
 */
export class StaleWriter extends Parser<string> {
  constructor(readonly count: number) {
    super();
  }

  parse(context: ParseContext, result: ParseResult<string>): boolean {
    context.enterParser(this);
    const cursor = context.scanner.cursor;
    const start = cursor.position;
    cursor.advance(this.count);
    result.set(start, cursor.position, cursor.buffer.slice(start.offset, cursor.offset));
    return false;
  }
}

/** What one parse call did, reduced to comparable values. */
export type Observation<T> =
  | { success: true; start: number; end: number; value: T; cursor: number }
  | { success: false; cursor: number };

/**
 * Run `parser` over `text`, starting `from` characters in.
 */
export function observe<T>(
  parser: Parser<T>,
  text: string,
  from = 0,
  options?: ParseContextOptions
): Observation<T> {
  const context = new ParseContext(text, options);
  context.cursor.advance(from);
  const result = new ParseResult<T>();

  if (parser.parse(context, result)) {
    return {
      success: true,
      start: result.start.offset,
      end: result.end.offset,
      value: result.value,
      cursor: context.cursor.offset,
    };
  }
  return { success: false, cursor: context.cursor.offset };
}

/** Observe `parser` interpreted and assembled on the same input. */
export function observeBoth<T>(
  parser: Parser<T>,
  text: string,
  from = 0
): { interpreted: Observation<T>; compiled: Observation<T> } {
  return {
    interpreted: observe(parser, text, from),
    compiled: observe(assemble(parser), text, from),
  };
}

/** Runs a parser as is, or assembled first. */
export type ExecutionMode = <T>(parser: Parser<T>) => Parser<T>;

/** Both execution modes, labelled for `describe.each`. */
export const executionModes: Array<[string, ExecutionMode]> = [
  ["interpreted", (parser) => parser],
  ["compiled", (parser) => assemble(parser)],
];

/** Names of the parsers entered during one parse, in order. */
export function entries<T>(parser: Parser<T>, text: string): string[] {
  const names: string[] = [];
  observe(parser, text, 0, { onEnterParser: (entered) => names.push(entered.name) });
  return names;
}
