import { describe, it, expect } from "vitest";
import { InvariantError } from "@weft/core";
import { ParseResult, TextPosition } from "../index.js";

describe("ParseResult", () => {
  it("refuses to be read before it is set", () => {
    const result = new ParseResult<string>();
    expect(result.hasValue).toBe(false);
    expect(() => result.value).toThrow(InvariantError);
    expect(() => result.start).toThrow("ParseResult was read before a successful match set it");
  });

  it("replaces start, end and value together", () => {
    const result = new ParseResult<string>();
    result.set(TextPosition.start, new TextPosition(2, 1, 3), "ab");
    result.set(new TextPosition(1, 1, 2), new TextPosition(4, 1, 5), "bcd");

    expect(result.hasValue).toBe(true);
    expect(result.start.offset).toBe(1);
    expect(result.end.offset).toBe(4);
    expect(result.value).toBe("bcd");
  });

  it("holds falsy values", () => {
    const result = new ParseResult<number>();
    result.set(TextPosition.start, TextPosition.start, 0);
    expect(result.value).toBe(0);
  });

  it("can be reset for reuse", () => {
    const result = new ParseResult<string>();
    result.set(TextPosition.start, TextPosition.start, "");
    result.reset();
    expect(result.hasValue).toBe(false);
  });
});
