/**
 * Lexical scoping environment for the Soorj interpreter.
 *
 * Each environment holds a map of bindings and a reference to its
 * parent scope. Closures keep their defining environment alive simply
 * by holding a reference to it.
 */

import type { Position } from './ast';
import type { SoorjValue } from './values';
import { SoorjNameError } from './errors';

export class Environment {
  private readonly vars: Map<string, SoorjValue>;
  private readonly parent: Environment | null;

  constructor(parent: Environment | null = null) {
    this.vars = new Map();
    this.parent = parent;
  }

  /**
   * Look up a variable by name, traversing the parent chain.
   */
  lookup(name: string): SoorjValue | undefined {
    const value = this.vars.get(name);
    if (value !== undefined) return value;
    return this.parent?.lookup(name);
  }

  /**
   * Like `lookup`, but an unbound name is a NameError reported at `at`.
   */
  get(name: string, at?: Position): SoorjValue {
    const value = this.lookup(name);
    if (value === undefined) {
      throw new SoorjNameError(name, at?.line, at?.column);
    }
    return value;
  }

  /**
   * Assignment: update the nearest existing binding, or create one in
   * this scope when no enclosing scope has the name.
   */
  assign(name: string, value: SoorjValue): void {
    if (!this.update(name, value)) {
      this.vars.set(name, value);
    }
  }

  /**
   * Bind a name in this scope, replacing any binding it already has here.
   */
  define(name: string, value: SoorjValue): void {
    this.vars.set(name, value);
  }

  /**
   * Bindings made directly in this scope (parents excluded).
   */
  entries(): IterableIterator<[string, SoorjValue]> {
    return this.vars.entries();
  }

  /**
   * Create a child scope.
   */
  child(): Environment {
    return new Environment(this);
  }

  private update(name: string, value: SoorjValue): boolean {
    if (this.vars.has(name)) {
      this.vars.set(name, value);
      return true;
    }
    return this.parent !== null && this.parent.update(name, value);
  }
}
