import { invariant } from "@weft/core";
import type { TextPosition } from "./scanner.js";

interface Span<T> {
  readonly start: TextPosition;
  readonly end: TextPosition;
  readonly value: T;
}

/**
 * Output record written by a successful match.
 *
 * `set` replaces start, end and value together. Reading a record that was
 * never set throws, so a caller cannot observe a value left behind by a
 * failed attempt on a fresh record.
 */
export class ParseResult<T> {
  private span: Span<T> | undefined;

  get hasValue(): boolean {
    return this.span !== undefined;
  }

  get start(): TextPosition {
    return this.read().start;
  }

  get end(): TextPosition {
    return this.read().end;
  }

  get value(): T {
    return this.read().value;
  }

  set(start: TextPosition, end: TextPosition, value: T): void {
    this.span = { start, end, value };
  }

  reset(): void {
    this.span = undefined;
  }

  private read(): Span<T> {
    const span = this.span;
    invariant(span !== undefined, "ParseResult was read before a successful match set it");
    return span;
  }
}
