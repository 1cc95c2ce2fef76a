/**
 * Assembly: turn a parser graph into one reusable function.
 *
 * The root's fragment (with every child fragment spliced in) is wrapped in a
 * function body that captures the start position, runs the fragment and, on
 * success, writes the result record. The body is printed with the TypeScript
 * printer and compiled once with `node:vm`; every later parse is a plain
 * function call.
 *
 * @example
 * ```typescript
 * const keyword = assemble(oneOf(literal("let"), literal("const")));
 * keyword.tryParse("const x"); // { ok: true, value: "const", ... }
 * console.log(keyword.code);   // the generated body
 * ```
 */

import * as vm from "node:vm";
import * as ts from "typescript";
import { config, createLogger } from "@weft/core";
import { CompilationContext, PARAMETERS } from "./compilation.js";
import { CompiledParser, type ParseFunction } from "./compiled-parser.js";
import { CompilationError } from "./errors.js";
import type { Parser } from "./parser.js";

const log = createLogger("compile");

const printer = ts.createPrinter({ newLine: ts.NewLineKind.LineFeed });
const dummySource = ts.createSourceFile(
  "weft-compiled.js",
  "",
  ts.ScriptTarget.ES2022,
  false,
  ts.ScriptKind.JS
);

/**
 * Compile `parser` into a `CompiledParser`.
 *
 * When `compile.enabled` is false in the configuration, no code is
 * generated and the returned parser runs the interpreter.
 *
 * @throws CompilationError if code generation fails or the generated code
 *   cannot be compiled
 */
export function assemble<T>(parser: Parser<T>): CompiledParser<T> {
  if (!config.compileOptions().enabled) {
    log.debug(`code generation disabled; ${parser.name} stays interpreted`);
    return new CompiledParser(parser, (context, result) => parser.parse(context, result), [], null);
  }

  const context = new CompilationContext();
  let code: string;
  try {
    code = generate(parser, context);
  } catch (error) {
    throw new CompilationError(`Could not generate code for ${parser.name}`, "", { cause: error });
  }
  const constants = context.getConstants();

  log.debug(`assembled ${parser.name} (${constants.length} constants, ${code.length} chars)`);
  if (config.compileOptions().dumpSource) {
    log.info(`generated code for ${parser.name}:\n${code}`);
  }

  let fn: Function;
  try {
    fn = vm.compileFunction(code, [PARAMETERS.context, PARAMETERS.result, PARAMETERS.constants], {
      filename: `weft-compiled-${parser.name}.js`,
    });
  } catch (error) {
    throw new CompilationError(`Generated code for ${parser.name} does not compile`, code, {
      cause: error,
    });
  }

  const run: ParseFunction<T> = (parseContext, result, table) => {
    const matched: unknown = Reflect.apply(fn, undefined, [parseContext, result, table]);
    if (typeof matched !== "boolean") {
      throw new CompilationError(
        `Compiled ${parser.name} returned ${typeof matched} instead of a boolean`,
        code
      );
    }
    return matched;
  };

  return new CompiledParser(parser, run, constants, code);
}

/**
 * Print the function body for `parser`:
 *
 * ```js
 * const start = context.scanner.cursor.position;
 * let ...fragment locals;
 * ...fragment statements
 * if (success) { result.set(start, context.scanner.cursor.position, value); return true; }
 * return false;
 * ```
 */
function generate<T>(parser: Parser<T>, context: CompilationContext): string {
  const f = context.factory;
  const fragment = context.compileChild(parser);
  const start = context.declare("start");

  const statements: ts.Statement[] = [
    f.createVariableStatement(
      undefined,
      f.createVariableDeclarationList(
        [f.createVariableDeclaration(start, undefined, undefined, context.cursorPosition())],
        ts.NodeFlags.Const
      )
    ),
    ...context.inline(fragment),
    f.createIfStatement(
      fragment.success,
      f.createBlock(
        [
          f.createExpressionStatement(
            f.createCallExpression(
              f.createPropertyAccessExpression(context.result, "set"),
              undefined,
              [start, context.cursorPosition(), fragment.value]
            )
          ),
          f.createReturnStatement(f.createTrue()),
        ],
        true
      )
    ),
    f.createReturnStatement(f.createFalse()),
  ];

  return statements
    .map((statement) => printer.printNode(ts.EmitHint.Unspecified, statement, dummySource))
    .join("\n");
}
