import type { CompilationContext, Fragment } from "./compilation.js";
import type { ParseContext } from "./context.js";
import type { ParseResult } from "./parse-result.js";
import { Parser } from "./parser.js";

/**
 * Signature of an assembled parse function. `constants` is the table the
 * generated code indexes into.
 */
export type ParseFunction<T> = (
  context: ParseContext,
  result: ParseResult<T>,
  constants: readonly unknown[]
) => boolean;

/**
 * A parser whose `parse` runs one assembled function instead of walking
 * the node graph. Behaves exactly like the parser it was built from.
 *
 * Holds no per-call state: locals live in the function's own frame, so a
 * compiled parser is as shareable as its source graph.
 */
export class CompiledParser<T> extends Parser<T> {
  constructor(
    /** The parser this was assembled from. */
    readonly source: Parser<T>,
    private readonly run: ParseFunction<T>,
    private readonly constants: readonly unknown[],
    /** Generated function body, or `null` when code generation was disabled. */
    readonly code: string | null
  ) {
    super();
  }

  override get name(): string {
    return `Compiled(${this.source.name})`;
  }

  parse(context: ParseContext, result: ParseResult<T>): boolean {
    return this.run(context, result, this.constants);
  }

  /** Splicing a compiled parser into another compilation re-inlines its source. */
  override compile(context: CompilationContext): Fragment {
    return context.compileChild(this.source);
  }
}
