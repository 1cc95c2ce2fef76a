/**
 * Runtime Safety Primitives
 *
 * - `invariant(condition, message)`: runtime assertion, narrows on success
 * - `unreachable(value?)`: mark impossible code paths
 *
 * @example
 * ```typescript
 * type Shape = { kind: "circle" } | { kind: "square" };
 * function area(shape: Shape): number {
 *   switch (shape.kind) {
 *     case "circle": return Math.PI;
 *     case "square": return 1;
 *     default: return unreachable(shape); // Type error if Shape is extended
 *   }
 * }
 * ```
 */

/**
 * Thrown when an internal invariant does not hold. Indicates a bug in the
 * caller or in weft itself, never a grammar mismatch.
 */
export class InvariantError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "InvariantError";
  }
}

/**
 * Runtime invariant check.
 *
 * @throws InvariantError if condition is false
 */
export function invariant(condition: boolean, message?: string): asserts condition {
  if (!condition) {
    throw new InvariantError(message ?? "Invariant violation");
  }
}

/**
 * Mark a code path as unreachable. Useful for exhaustiveness checking.
 *
 * @param value - A value of type `never` (for type-level exhaustiveness)
 */
export function unreachable(value?: never): never {
  throw new InvariantError(`Unreachable code reached${value === undefined ? "" : `: ${String(value)}`}`);
}
