/**
 * Per-call parse context.
 *
 * A context lives for exactly one top-level parse: it owns the scanner (and
 * through it the only cursor the call mutates) and the entry hook the wider
 * framework uses for recursion diagnostics. Parsers never keep a reference
 * to it after they return.
 */

import type { Parser } from "./parser.js";
import { Cursor, Scanner } from "./scanner.js";

export interface ParseContextOptions {
  /**
   * Called once each time a parser starts matching, in the order parsers
   * are entered. The context does not interpret it.
   */
  onEnterParser?: (parser: Parser<unknown>) => void;
}

export class ParseContext {
  readonly scanner: Scanner;
  private readonly onEnterParser: ((parser: Parser<unknown>) => void) | undefined;

  constructor(input: Scanner | string, options: ParseContextOptions = {}) {
    this.scanner = typeof input === "string" ? new Scanner(input) : input;
    this.onEnterParser = options.onEnterParser;
  }

  get cursor(): Cursor {
    return this.scanner.cursor;
  }

  enterParser(parser: Parser<unknown>): void {
    this.onEnterParser?.(parser);
  }
}
