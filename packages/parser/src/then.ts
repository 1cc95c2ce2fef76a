import type { CompilationContext, Fragment } from "./compilation.js";
import type { ParseContext } from "./context.js";
import { ArgumentError } from "./errors.js";
import { ParseResult } from "./parse-result.js";
import { Parser } from "./parser.js";

/**
 * Transform a parser's value. The reported span is the inner parser's.
 */
export class Then<T, U> extends Parser<U> {
  constructor(
    readonly parser: Parser<T>,
    readonly transform: (value: T) => U
  ) {
    super();
    if (parser == null) throw new ArgumentError("parser");
    if (typeof transform !== "function") throw new ArgumentError("transform");
  }

  parse(context: ParseContext, result: ParseResult<U>): boolean {
    context.enterParser(this);

    const inner = new ParseResult<T>();
    if (!this.parser.parse(context, inner)) return false;

    result.set(inner.start, inner.end, this.transform(inner.value));
    return true;
  }

  override compile(context: CompilationContext): Fragment {
    const f = context.factory;
    const success = context.declare("thenSuccess");
    const value = context.declare("thenValue");
    const inner = context.compileChild(this.parser);

    return {
      variables: [success, value],
      body: [
        context.enterParser(this),
        ...context.inline(inner),
        f.createIfStatement(
          inner.success,
          f.createBlock(
            [
              context.assign(success, f.createTrue()),
              context.assign(
                value,
                f.createCallExpression(context.constant(this.transform), undefined, [inner.value])
              ),
            ],
            true
          ),
          f.createBlock([context.assign(success, f.createFalse())], true)
        ),
      ],
      success,
      value,
    };
  }
}
