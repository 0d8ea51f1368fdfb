/**
 * Parsed arguments of one invocation
 */

import type { AnyArgumentDeclaration, ArgumentDeclaration, ArgumentEntry } from './types.js';

/**
 * Read-only result of a successful parse, created fresh for every call and
 * handed to the command callback.
 *
 * Values are read through the declarations the command was defined with:
 *
 * ```typescript
 * execute: (args) => args.value(word).repeat(args.value(times))
 * ```
 */
export class ArgumentValues {
  private readonly entries: ReadonlyMap<AnyArgumentDeclaration, ArgumentEntry>;

  constructor(entries: Iterable<readonly [AnyArgumentDeclaration, ArgumentEntry]>) {
    this.entries = new Map(entries);
    Object.freeze(this);
  }

  /**
   * Value of a required or defaulted argument
   */
  value<T>(declaration: ArgumentDeclaration<T, 'required' | 'defaulted'>): T;
  /**
   * Value of an optional argument without default; undefined when omitted
   */
  value<T>(declaration: ArgumentDeclaration<T, 'optional'>): T | undefined;
  value<T>(declaration: ArgumentDeclaration<T>): T | undefined {
    const { value } = this.entryFor(declaration);

    if (value === undefined) {
      if (declaration.presence === 'optional') {
        return undefined;
      }
      throw new Error(`Argument "${declaration.spec.name}" has no value`);
    }

    if (!declaration.type.is(value)) {
      throw new Error(`Argument "${declaration.spec.name}" holds a value of another type`);
    }
    return value;
  }

  /**
   * Whether the user left the argument out
   */
  omitted(declaration: AnyArgumentDeclaration): boolean {
    return this.entryFor(declaration).omitted;
  }

  /**
   * Entry by argument name
   */
  get(name: string): ArgumentEntry | undefined {
    for (const entry of this.entries.values()) {
      if (entry.name === name) {
        return entry;
      }
    }
    return undefined;
  }

  /**
   * Entries in position order
   */
  list(): ArgumentEntry[] {
    return [...this.entries.values()];
  }

  get size(): number {
    return this.entries.size;
  }

  toJSON(): Record<string, { omitted: boolean; value: unknown }> {
    const result: Record<string, { omitted: boolean; value: unknown }> = {};
    for (const entry of this.entries.values()) {
      result[entry.name] = {
        omitted: entry.omitted,
        value: typeof entry.value === 'bigint' ? entry.value.toString() : entry.value,
      };
    }
    return result;
  }

  private entryFor(declaration: AnyArgumentDeclaration): ArgumentEntry {
    const entry = this.entries.get(declaration);
    if (!entry) {
      throw new Error(`Argument "${declaration.spec.name}" is not declared by this command`);
    }
    return entry;
  }
}
