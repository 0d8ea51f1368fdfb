/**
 * Factory for argument types built from a parse function, an error text and
 * an optional validation rule
 */

import { parseFailure } from '../messages.js';
import type { ArgumentType, Conversion } from './types.js';

export interface ValidationRule<T> {
  check(value: T): boolean;
  /** Full message shown to the user; receives the argument name */
  message(name: string): string;
}

export interface TypedArgumentOptions<T> {
  label: string;
  is(value: unknown): value is T;
  /** Returns undefined when the token is not a valid T */
  parse(token: string): T | undefined;
  /** Detail appended to `Error parsing argument "<name>".` */
  error: string;
  validation?: ValidationRule<T>;
  multisegmentedOnly?: boolean;
}

/**
 * Build an argument type.
 *
 * @example
 * ```typescript
 * const PortArgument = typedArgument({
 *   label: 'port',
 *   is: (value): value is number => typeof value === 'number',
 *   parse: (token) => (/^\d{1,5}$/.test(token) ? Number(token) : undefined),
 *   error: 'Port number expected.',
 *   validation: {
 *     check: (port) => port > 0 && port < 65536,
 *     message: (name) => `Error validating argument "${name}". Port out of range.`,
 *   },
 * });
 * ```
 */
export function typedArgument<T>(options: TypedArgumentOptions<T>): ArgumentType<T> {
  const { label, parse, error, validation, multisegmentedOnly = false } = options;

  return Object.freeze({
    label,
    multisegmentedOnly,
    is: options.is,
    convert(token: string, name: string): Conversion<T> {
      const value = parse(token);
      if (value === undefined) {
        return { ok: false, message: parseFailure(name, error) };
      }
      return { ok: true, value };
    },
    validate(value: T, name: string): string | undefined {
      if (!validation || validation.check(value)) {
        return undefined;
      }
      return validation.message(name);
    },
  });
}

/**
 * Derive a stricter type: the base conversion and validation run first, then `rule`.
 *
 * @example
 * ```typescript
 * const DivisorArgument = withValidation(IntArgument, {
 *   check: (value) => value !== 0,
 *   message: () => 'Divisor can not be zero!',
 * });
 * ```
 */
export function withValidation<T>(base: ArgumentType<T>, rule: ValidationRule<T>, label?: string): ArgumentType<T> {
  return Object.freeze({
    label: label ?? base.label,
    multisegmentedOnly: base.multisegmentedOnly ?? false,
    is: (value: unknown): value is T => base.is(value),
    convert: (token: string, name: string): Conversion<T> => base.convert(token, name),
    validate(value: T, name: string): string | undefined {
      return base.validate(value, name) ?? (rule.check(value) ? undefined : rule.message(name));
    },
  });
}
