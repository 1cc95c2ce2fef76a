import { describe, it, expect } from "vitest";
import {
  ArgumentError,
  OneOf2,
  assemble,
  digits,
  identity,
  letters,
  literal,
  map,
  or,
} from "../index.js";
import { Overrun, StaleWriter, entries, executionModes, observe } from "./fixtures.js";

type Token = { kind: "number"; value: number } | { kind: "word"; text: string };

describe.each(executionModes)("OneOf2 (%s)", (_mode, prepare) => {
  it("reports the first alternative's value and span", () => {
    const parser = prepare(or(map(digits(), Number), letters()));
    expect(observe(parser, "42x")).toEqual({
      success: true,
      start: 0,
      end: 2,
      value: 42,
      cursor: 2,
    });
  });

  it("falls through to the second alternative", () => {
    const parser = prepare(or(map(digits(), Number), letters()));
    expect(observe(parser, "abc1")).toEqual({
      success: true,
      start: 0,
      end: 3,
      value: "abc",
      cursor: 3,
    });
  });

  it("applies each side's conversion", () => {
    const parser = prepare(
      or<string, string, Token>(
        digits(),
        letters(),
        (text) => ({ kind: "number", value: Number(text) }),
        (text) => ({ kind: "word", text })
      )
    );
    expect(observe(parser, "7")).toEqual({
      success: true,
      start: 0,
      end: 1,
      value: { kind: "number", value: 7 },
      cursor: 1,
    });
    expect(observe(parser, "go")).toEqual({
      success: true,
      start: 0,
      end: 2,
      value: { kind: "word", text: "go" },
      cursor: 2,
    });
  });

  it("reports the second alternative's own span after the first wrote a stale one", () => {
    const parser = prepare(or(new StaleWriter(2), literal("abc")));
    expect(observe(parser, "xabcd", 1)).toEqual({
      success: true,
      start: 1,
      end: 4,
      value: "abc",
      cursor: 4,
    });
  });

  it("rolls back a partial advance of the first alternative", () => {
    const parser = prepare(or(new Overrun(3), literal("ab")));
    expect(observe(parser, "abc")).toEqual({
      success: true,
      start: 0,
      end: 2,
      value: "ab",
      cursor: 2,
    });
  });

  it("restores the cursor when both alternatives fail", () => {
    const parser = prepare(or(new Overrun(3), new Overrun(1)));
    expect(observe(parser, "abcd", 1)).toEqual({ success: false, cursor: 1 });
  });
});

describe("OneOf2 entry hook", () => {
  it("enters the choice, then each side tried", () => {
    const parser = or(literal("a"), literal("b"));
    expect(entries(parser, "b")).toEqual(["OneOf2", '"a"', '"b"']);
    expect(entries(assemble(parser), "b")).toEqual(["OneOf2", '"a"', '"b"']);
  });

  it("does not enter the second side when the first matches", () => {
    expect(entries(or(literal("a"), literal("b")), "a")).toEqual(["OneOf2", '"a"']);
  });
});

describe("OneOf2 construction", () => {
  it("rejects absent parsers", () => {
    expect(() => Reflect.construct(OneOf2, [null, literal("b"), identity, identity])).toThrow(
      ArgumentError
    );
    expect(() => Reflect.construct(OneOf2, [literal("a"), undefined, identity, identity])).toThrow(
      "Argument 'parserB' must not be null or undefined"
    );
  });

  it("rejects absent conversions", () => {
    expect(() => Reflect.construct(OneOf2, [literal("a"), literal("b"), null, identity])).toThrow(
      "Argument 'convertA' must not be null or undefined"
    );
  });
});

describe("or", () => {
  it("rejects a single conversion", () => {
    expect(() => Reflect.apply(or, undefined, [literal("a"), literal("b"), () => 1])).toThrow(
      "Argument 'convertB' must not be null or undefined"
    );
    expect(() =>
      Reflect.apply(or, undefined, [literal("a"), literal("b"), undefined, () => 1])
    ).toThrow(ArgumentError);
  });

  it("applies both conversions when given", () => {
    const parser = or(
      literal("a"),
      literal("bb"),
      () => 1,
      () => 2
    );
    expect(parser.parseAll("a")).toBe(1);
    expect(parser.parseAll("bb")).toBe(2);
  });
});

describe("OneOf2 compiled code", () => {
  it("elides identity conversions", () => {
    const { code } = assemble(or(literal("a"), literal("b")));
    expect(code).toContain("orValue_0 = litValue_1;");
    expect(code).toContain("orValue_0 = litValue_2;");
  });

  it("calls other conversions through the constants table", () => {
    const { code } = assemble(
      or(
        literal("a"),
        literal("b"),
        (text) => text.length,
        (text) => -text.length
      )
    );
    expect(code).toContain("orValue_0 = constants[2](litValue_1);");
    expect(code).toContain("orValue_0 = constants[4](litValue_2);");
  });
});
