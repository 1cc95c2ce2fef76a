/**
 * Positions, cursor and scanner
 *
 * The cursor is the only mutable state a parse touches. Combinators take a
 * `position` checkpoint before trying something and hand it back to
 * `resetPosition` when the attempt fails; a reset restores every field the
 * cursor exposes, not just the offset.
 */

import { invariant } from "@weft/core";

/** Immutable point in the input. Lines and columns are 1-based. */
export class TextPosition {
  static readonly start: TextPosition = new TextPosition(0, 1, 1);

  constructor(
    readonly offset: number,
    readonly line: number,
    readonly column: number
  ) {
    Object.freeze(this);
  }

  equals(other: TextPosition): boolean {
    return this.offset === other.offset && this.line === other.line && this.column === other.column;
  }

  /** Negative, zero or positive as this position is before, at or after `other`. */
  compareTo(other: TextPosition): number {
    return this.offset - other.offset;
  }

  toString(): string {
    return `(${this.line}:${this.column})`;
  }
}

/** Character test used by pattern parsers. */
export type CharPredicate = (ch: string) => boolean;

/**
 * Mutable scan state over a string.
 *
 * `current` is the character under the cursor, or `""` at end of input.
 * `\n` starts a new line.
 */
export class Cursor {
  readonly buffer: string;

  private _offset: number;
  private _line: number;
  private _column: number;
  private _current: string;

  constructor(buffer: string, position: TextPosition = TextPosition.start) {
    this.buffer = buffer;
    this._offset = 0;
    this._line = 1;
    this._column = 1;
    this._current = "";
    this.resetPosition(position);
  }

  get position(): TextPosition {
    return new TextPosition(this._offset, this._line, this._column);
  }

  get offset(): number {
    return this._offset;
  }

  get line(): number {
    return this._line;
  }

  get column(): number {
    return this._column;
  }

  get current(): string {
    return this._current;
  }

  get eof(): boolean {
    return this._offset >= this.buffer.length;
  }

  /** Character `distance` places ahead of the cursor, `""` past the end. */
  peek(distance = 1): string {
    return this.buffer.charAt(this._offset + distance);
  }

  advance(count = 1): void {
    for (let i = 0; i < count && this._offset < this.buffer.length; i++) {
      if (this.buffer.charCodeAt(this._offset) === 10) {
        this._line++;
        this._column = 1;
      } else {
        this._column++;
      }
      this._offset++;
    }
    this._current = this.buffer.charAt(this._offset);
  }

  /**
   * Move back (or forward) to a checkpoint taken on this cursor.
   */
  resetPosition(position: TextPosition): void {
    invariant(
      position.offset >= 0 && position.offset <= this.buffer.length,
      `Position ${position.offset} is outside a buffer of length ${this.buffer.length}`
    );
    this._offset = position.offset;
    this._line = position.line;
    this._column = position.column;
    this._current = this.buffer.charAt(position.offset);
  }

  /** Whether `text` starts at the cursor. Does not move. */
  match(text: string): boolean {
    return this.buffer.startsWith(text, this._offset);
  }

  /** Case-insensitive `match`. Does not move. */
  matchIgnoreCase(text: string): boolean {
    const slice = this.buffer.slice(this._offset, this._offset + text.length);
    return slice.length === text.length && slice.toLowerCase() === text.toLowerCase();
  }

  /**
   * Consume `text` if it starts at the cursor and return the consumed slice,
   * or return `null` without moving.
   */
  readText(text: string, caseInsensitive = false): string | null {
    if (!(caseInsensitive ? this.matchIgnoreCase(text) : this.match(text))) {
      return null;
    }
    const consumed = this.buffer.slice(this._offset, this._offset + text.length);
    this.advance(text.length);
    return consumed;
  }

  /**
   * Consume characters while `predicate` holds, up to `max` of them
   * (`0` = unbounded). Returns the consumed run, or `null` with the cursor
   * unmoved when fewer than `min` characters matched.
   */
  readWhile(predicate: CharPredicate, min = 1, max = 0): string | null {
    const start = this.position;
    let count = 0;
    while (!this.eof && (max === 0 || count < max) && predicate(this._current)) {
      this.advance();
      count++;
    }
    if (count < min) {
      this.resetPosition(start);
      return null;
    }
    return this.buffer.slice(start.offset, this._offset);
  }
}

/** Owns the cursor for one input. */
export class Scanner {
  readonly buffer: string;
  readonly cursor: Cursor;

  constructor(buffer: string) {
    this.buffer = buffer;
    this.cursor = new Cursor(buffer);
  }
}
