/**
 * Fragment composition for the compiled execution path.
 *
 * `Parser.compile` does not run anything: it returns a `Fragment`: the
 * locals, statements, success flag and value holder that reproduce the
 * parser's behavior when spliced into a generated function. Composite
 * parsers splice their children's fragments into their own, so a whole
 * grammar ends up as one function body with no per-node calls.
 *
 * Statements are TypeScript AST nodes built with `ts.factory`; `assemble`
 * prints them and materializes the result.
 */

import * as ts from "typescript";
import { HygieneContext } from "@weft/core";
import type { Parser } from "./parser.js";

/**
 * Compiled form of one parser node.
 *
 * Composing code must only read `value` on paths where `success` is true.
 */
export interface Fragment {
  /** Fresh locals introduced by this fragment, declared by whoever splices it. */
  readonly variables: readonly ts.Identifier[];
  /** Statements to splice, in program order. */
  readonly body: readonly ts.Statement[];
  /** Holds `true` after `body` ran iff the parser matched. */
  readonly success: ts.Identifier;
  /** The matched value; valid only when `success` is true. */
  readonly value: ts.Expression;
}

/** Parameter names of every generated function. */
export const PARAMETERS = {
  context: "context",
  result: "result",
  constants: "constants",
} as const;

/**
 * State shared by all `compile` calls of one assembly: hygienic names, the
 * constants table, and builders for the statements every fragment needs.
 */
export class CompilationContext {
  readonly factory: ts.NodeFactory = ts.factory;
  /** The `ParseContext` parameter of the generated function. */
  readonly parseContext: ts.Identifier;
  readonly result: ts.Identifier;

  private readonly hygiene = new HygieneContext();
  private readonly constantsIdentifier: ts.Identifier;
  private readonly constants: unknown[] = [];
  private readonly constantIndex = new Map<unknown, number>();

  constructor() {
    this.parseContext = this.hygiene.createUnhygienicIdentifier(PARAMETERS.context);
    this.result = this.hygiene.createUnhygienicIdentifier(PARAMETERS.result);
    this.constantsIdentifier = this.hygiene.createUnhygienicIdentifier(PARAMETERS.constants);
  }

  /**
   * Compile `parser` in its own hygiene scope so its locals cannot collide
   * with the caller's.
   */
  compileChild<T>(parser: Parser<T>): Fragment {
    return this.hygiene.withScope(() => parser.compile(this));
  }

  /** A local of the fragment being compiled. Same name, same identifier within one node. */
  declare(name: string): ts.Identifier {
    return this.hygiene.createIdentifier(name);
  }

  /**
   * Reference a runtime object (a parser, a predicate, a function) from
   * generated code. Identical objects share a slot.
   */
  constant(value: unknown): ts.Expression {
    let index = this.constantIndex.get(value);
    if (index === undefined) {
      index = this.constants.length;
      this.constants.push(value);
      this.constantIndex.set(value, index);
    }
    return this.factory.createElementAccessExpression(this.constantsIdentifier, index);
  }

  get constantCount(): number {
    return this.constants.length;
  }

  /** Frozen snapshot of the constants table, in slot order. */
  getConstants(): readonly unknown[] {
    return Object.freeze([...this.constants]);
  }

  // -------------------------------------------------------------------------
  // Statement builders
  // -------------------------------------------------------------------------

  /** `context.scanner.cursor` */
  cursor(): ts.Expression {
    const f = this.factory;
    return f.createPropertyAccessExpression(
      f.createPropertyAccessExpression(this.parseContext, "scanner"),
      "cursor"
    );
  }

  /** `context.scanner.cursor.position` */
  cursorPosition(): ts.Expression {
    return this.factory.createPropertyAccessExpression(this.cursor(), "position");
  }

  /** `context.scanner.cursor.<method>(...args)` */
  callCursor(method: string, args: readonly ts.Expression[]): ts.Expression {
    const f = this.factory;
    return f.createCallExpression(f.createPropertyAccessExpression(this.cursor(), method), undefined, [
      ...args,
    ]);
  }

  /** `context.scanner.cursor.resetPosition(position);` */
  resetPosition(position: ts.Expression): ts.Statement {
    return this.factory.createExpressionStatement(this.callCursor("resetPosition", [position]));
  }

  /** `context.enterParser(<parser>);` */
  enterParser(parser: Parser<unknown>): ts.Statement {
    const f = this.factory;
    return f.createExpressionStatement(
      f.createCallExpression(
        f.createPropertyAccessExpression(this.parseContext, "enterParser"),
        undefined,
        [this.constant(parser)]
      )
    );
  }

  /** `target = value;` */
  assign(target: ts.Identifier, value: ts.Expression): ts.Statement {
    const f = this.factory;
    return f.createExpressionStatement(f.createAssignment(target, value));
  }

  /** `let a, b, c;` */
  declareVariables(variables: readonly ts.Identifier[]): ts.Statement {
    const f = this.factory;
    return f.createVariableStatement(
      undefined,
      f.createVariableDeclarationList(
        variables.map((variable) => f.createVariableDeclaration(variable)),
        ts.NodeFlags.Let
      )
    );
  }

  /** A fragment's locals and statements, ready to splice into a block. */
  inline(fragment: Fragment): ts.Statement[] {
    if (fragment.variables.length === 0) return [...fragment.body];
    return [this.declareVariables(fragment.variables), ...fragment.body];
  }

  /** `convert(value)`, or `value` itself when `convert` is the identity. */
  convert(value: ts.Expression, convert: (value: never) => unknown): ts.Expression {
    if (isIdentity(convert)) return value;
    return this.factory.createCallExpression(this.constant(convert), undefined, [value]);
  }
}

/** Conversion that returns its argument; elided by the compiler. */
export function identity<T>(value: T): T {
  return value;
}

export function isIdentity(fn: unknown): boolean {
  return fn === identity;
}
