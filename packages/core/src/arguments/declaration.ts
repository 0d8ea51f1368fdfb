/**
 * Argument declarations
 *
 * A command lists its arguments as frozen declarations built here. The same
 * declaration object later reads the parsed value back out of
 * {@link ArgumentValues}.
 */

import { ConfigErrorCode, ConfigurationError } from '../errors.js';
import { isValidAlias, validateDescription } from '../names.js';
import type { ArgumentDeclaration, ArgumentSpec, ArgumentType } from './types.js';

export interface ArgumentInfo {
  name: string;
  description: string;
  multisegmented?: boolean;
}

export interface OptionalArgumentInfo extends ArgumentInfo {
  /** Converted and validated at run time whenever the argument is omitted */
  defaultValue?: string;
}

function createSpec(
  position: number,
  type: ArgumentType<unknown>,
  info: OptionalArgumentInfo,
  optional: boolean
): ArgumentSpec {
  const { name, description, multisegmented = false, defaultValue } = info;

  if (!isValidAlias(name)) {
    throw new ConfigurationError(ConfigErrorCode.INVALID_NAME, `Invalid argument name: "${name}".`, { name });
  }

  if (!Number.isInteger(position) || position < 0) {
    throw new ConfigurationError(
      ConfigErrorCode.INVALID_ARGUMENT,
      `"${name}" argument position is invalid (${position < 0 ? 'negative' : 'not an integer'}).`,
      { name, position }
    );
  }

  validateDescription(description, `"${name}" argument`);

  if (type.multisegmentedOnly && !multisegmented) {
    throw new ConfigurationError(
      ConfigErrorCode.INVALID_ARGUMENT,
      `Argument "${name}" of type "${type.label}" should always be multisegmented.`,
      { name, type: type.label }
    );
  }

  const spec: ArgumentSpec = {
    position,
    name,
    description,
    optional,
    multisegmented,
    ...(defaultValue === undefined ? {} : { defaultValue }),
  };
  return Object.freeze(spec);
}

/**
 * Declare an argument the user must supply.
 *
 * @throws ConfigurationError when the name, position or description is invalid
 */
export function required<T>(position: number, type: ArgumentType<T>, info: ArgumentInfo): ArgumentDeclaration<T, 'required'> {
  const declaration: ArgumentDeclaration<T, 'required'> = {
    spec: createSpec(position, type, info, false),
    type,
    presence: 'required',
  };
  return Object.freeze(declaration);
}

/**
 * Declare an argument the user may leave out. Only the last argument of a
 * command can be optional.
 *
 * @example
 * ```typescript
 * const times = optional(1, NonNegativeIntArgument, {
 *   name: 'times',
 *   description: 'number of repetitions',
 *   defaultValue: '2',
 * });
 * ```
 */
export function optional<T>(
  position: number,
  type: ArgumentType<T>,
  info: ArgumentInfo & { defaultValue: string }
): ArgumentDeclaration<T, 'defaulted'>;
export function optional<T>(
  position: number,
  type: ArgumentType<T>,
  info: ArgumentInfo & { defaultValue?: undefined }
): ArgumentDeclaration<T, 'optional'>;
export function optional<T>(
  position: number,
  type: ArgumentType<T>,
  info: OptionalArgumentInfo
): ArgumentDeclaration<T, 'optional' | 'defaulted'> {
  const spec = createSpec(position, type, info, true);
  const declaration: ArgumentDeclaration<T, 'optional' | 'defaulted'> = {
    spec,
    type,
    presence: spec.defaultValue === undefined ? 'optional' : 'defaulted',
  };
  return Object.freeze(declaration);
}
