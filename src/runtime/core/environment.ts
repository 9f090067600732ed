/**
 * Variable Environment
 *
 * Scoped name -> value bindings. Lookups walk outward through parent
 * scopes; definitions always land in the scope they are made in.
 */

import type { LoxValue } from './values.js';

/** Result of a successful lookup; distinguishes a bound `nil` from no binding */
export interface Binding {
  readonly value: LoxValue;
}

export class Environment {
  private readonly values = new Map<string, LoxValue>();

  constructor(readonly parent: Environment | undefined = undefined) {}

  /** Bind `name` in this scope, replacing any earlier binding */
  define(name: string, value: LoxValue): void {
    this.values.set(name, value);
  }

  lookup(name: string): Binding | undefined {
    if (this.values.has(name)) {
      return { value: this.values.get(name) ?? null };
    }
    return this.parent?.lookup(name);
  }

  /** Bindings of this scope only, in definition order */
  entries(): Record<string, LoxValue> {
    return Object.fromEntries(this.values);
  }
}
