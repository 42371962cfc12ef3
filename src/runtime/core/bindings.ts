/**
 * Bindings
 *
 * Ordered list of Variables holding a script's top-level state.
 * Lookup is linear; order is insertion order and never changes on update.
 */

import { Scope } from './scope.js';
import {
  toEngineValue,
  toHostValue,
  type Value,
  type Variable,
} from './values.js';

export class Bindings {
  private readonly variables: Variable[];

  constructor(variables: Iterable<Variable> = []) {
    this.variables = [];
    for (const entry of variables) {
      this.set(entry.name, entry.value);
    }
  }

  /** Build bindings from host values, encoding each entry */
  static fromRecord(record: Record<string, unknown>): Bindings {
    return new Bindings(
      Object.entries(record).map(([name, value]) => ({
        name,
        value: toEngineValue(value),
      }))
    );
  }

  get size(): number {
    return this.variables.length;
  }

  /** Replace the value at the existing position, or append a new binding */
  set(name: string, value: Value): void {
    const index = this.variables.findIndex((entry) => entry.name === name);
    if (index === -1) {
      this.variables.push({ name, value });
      return;
    }
    this.variables[index] = { name, value };
  }

  get(name: string): Value | undefined {
    return this.variables.find((entry) => entry.name === name)?.value;
  }

  has(name: string): boolean {
    return this.variables.some((entry) => entry.name === name);
  }

  names(): string[] {
    return this.variables.map((entry) => entry.name);
  }

  /** Copy of the underlying list, safe to hand to an engine */
  toVariables(): Variable[] {
    return [...this.variables];
  }

  /** Independent host-side mapping of every binding */
  toHostMapping(): Scope {
    return new Scope(
      this.variables.map((entry) => [entry.name, toHostValue(entry.value)])
    );
  }

  toString(): string {
    return this.toHostMapping().toString();
  }
}
