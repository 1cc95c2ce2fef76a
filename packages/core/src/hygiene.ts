/**
 * Identifier Hygiene for generated code
 *
 * Generated functions are assembled from fragments that each introduce
 * their own locals. Every fragment asks for names like `orSuccess` or
 * `litValue`; the hygiene context mangles them so that two fragments spliced
 * into the same function never capture each other's variables.
 *
 * Key concepts:
 * - Each fragment is compiled inside its own scope (a unique scope ID)
 * - The same logical name within a scope always maps to the same identifier
 * - Outside any scope every request yields a fresh name
 *
 * @example
 * ```typescript
 * const hygiene = new HygieneContext();
 *
 * hygiene.withScope(() => {
 *   const a = hygiene.createIdentifier("orSuccess"); // orSuccess_0
 *   const b = hygiene.createIdentifier("orSuccess"); // orSuccess_0 (same scope)
 * });
 * hygiene.withScope(() => hygiene.createIdentifier("orSuccess")); // orSuccess_1
 * ```
 */

import * as ts from "typescript";

/** A hygiene scope tracks identifiers created while compiling one fragment */
interface HygieneScope {
  id: number;
  parent: HygieneScope | null;
  /** logical name -> mangled name */
  nameMap: Map<string, string>;
}

const IDENTIFIER = /^[A-Za-z_$][A-Za-z0-9_$]*$/;

/**
 * Hands out collision-free identifiers for one generated function.
 *
 * Create one per assembly; it is not meant to be shared between unrelated
 * compilations.
 */
export class HygieneContext {
  private scopeCounter = 0;
  private currentScope: HygieneScope | null = null;
  private globalCounter = 0;

  /**
   * Run `fn` inside a new scope. All identifiers created inside the callback
   * (and not inside a nested scope) are scoped together.
   */
  withScope<T>(fn: () => T): T {
    const scope: HygieneScope = {
      id: this.scopeCounter++,
      parent: this.currentScope,
      nameMap: new Map(),
    };

    const previousScope = this.currentScope;
    this.currentScope = scope;

    try {
      return fn();
    } finally {
      this.currentScope = previousScope;
    }
  }

  createIdentifier(name: string): ts.Identifier {
    return ts.factory.createIdentifier(this.mangleName(name));
  }

  /**
   * Get the mangled name for a logical name in the current scope.
   */
  mangleName(name: string): string {
    if (!IDENTIFIER.test(name)) {
      throw new TypeError(`Not a valid identifier: ${JSON.stringify(name)}`);
    }

    if (this.currentScope) {
      const existing = this.currentScope.nameMap.get(name);
      if (existing) return existing;

      const mangled = `${name}_${this.currentScope.id}`;
      this.currentScope.nameMap.set(name, mangled);
      return mangled;
    }

    return `${name}_g${this.globalCounter++}`;
  }

  /**
   * Create an unhygienic identifier: the exact name, no mangling. Used for
   * the parameters of generated functions.
   */
  createUnhygienicIdentifier(name: string): ts.Identifier {
    return ts.factory.createIdentifier(name);
  }

  isInScope(): boolean {
    return this.currentScope !== null;
  }

  /**
   * Current scope depth (0 = top level).
   */
  getScopeDepth(): number {
    let depth = 0;
    let scope = this.currentScope;
    while (scope) {
      depth++;
      scope = scope.parent;
    }
    return depth;
  }

  /**
   * Names introduced in the current scope, logical -> mangled.
   */
  getCurrentScopeNames(): ReadonlyMap<string, string> {
    if (!this.currentScope) return new Map();
    return this.currentScope.nameMap;
  }
}
