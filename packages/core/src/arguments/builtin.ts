/**
 * Built-in argument types
 */

import moment from 'moment-timezone';
import { validationFailure } from '../messages.js';
import { typedArgument, withValidation } from './typed-argument.js';
import type { ArgumentType, Conversion } from './types.js';

const INTEGER_PATTERN = /^[+-]?\d+$/;
const FLOAT_PATTERN = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;
const DECIMAL_PATTERN = /^[+-]?(\d+\.?\d*|\.\d+)$/;

const INT32_MIN = -2147483648;
const INT32_MAX = 2147483647;
const INT64_MIN = -(2n ** 63n);
const INT64_MAX = 2n ** 63n - 1n;

const INTEGER_EXPECTED = 'Integer value expected.';
const NUMERIC_EXPECTED = 'Numeric value expected.';

/**
 * Accepted date/time layouts, tried in order in strict mode
 */
export const DATE_TIME_FORMATS: moment.MomentFormatSpecification = [
  moment.ISO_8601,
  'YYYY-MM-DD',
  'YYYY-MM-DD HH:mm',
  'DD.MM.YYYY',
  'MM/DD/YYYY',
  'HH:mm',
];

function isNumber(value: unknown): value is number {
  return typeof value === 'number';
}

function isString(value: unknown): value is string {
  return typeof value === 'string';
}

function parseInt32(token: string): number | undefined {
  const text = token.trim();
  if (!INTEGER_PATTERN.test(text)) {
    return undefined;
  }
  const value = Number(text);
  return value >= INT32_MIN && value <= INT32_MAX ? value : undefined;
}

function parseFinite(pattern: RegExp, token: string): number | undefined {
  const text = token.trim();
  if (!pattern.test(text)) {
    return undefined;
  }
  const value = Number(text);
  return Number.isFinite(value) ? value : undefined;
}

export const IntArgument: ArgumentType<number> = typedArgument({
  label: 'integer',
  is: (value): value is number => isNumber(value) && Number.isInteger(value),
  parse: parseInt32,
  error: INTEGER_EXPECTED,
});

export const LongArgument: ArgumentType<bigint> = typedArgument({
  label: 'long',
  is: (value): value is bigint => typeof value === 'bigint',
  parse: (token) => {
    const text = token.trim();
    if (!INTEGER_PATTERN.test(text)) {
      return undefined;
    }
    const value = BigInt(text);
    return value >= INT64_MIN && value <= INT64_MAX ? value : undefined;
  },
  error: INTEGER_EXPECTED,
});

export const FloatArgument: ArgumentType<number> = typedArgument({
  label: 'float',
  is: isNumber,
  parse: (token) => {
    const value = parseFinite(FLOAT_PATTERN, token);
    if (value === undefined) {
      return undefined;
    }
    const single = Math.fround(value);
    return Number.isFinite(single) ? single : undefined;
  },
  error: NUMERIC_EXPECTED,
});

export const DoubleArgument: ArgumentType<number> = typedArgument({
  label: 'double',
  is: isNumber,
  parse: (token) => parseFinite(FLOAT_PATTERN, token),
  error: NUMERIC_EXPECTED,
});

export const DecimalArgument: ArgumentType<number> = typedArgument({
  label: 'decimal',
  is: isNumber,
  parse: (token) => parseFinite(DECIMAL_PATTERN, token),
  error: NUMERIC_EXPECTED,
});

export const NonNegativeIntArgument: ArgumentType<number> = withValidation(
  IntArgument,
  {
    check: (value) => value >= 0,
    message: (name) => validationFailure(name, 'Non-negative value expected.'),
  },
  'non-negative integer'
);

/**
 * Whitespace-separated integers. Must be declared multisegmented.
 */
export const IntArrayArgument: ArgumentType<readonly number[]> = Object.freeze({
  label: 'integer array',
  multisegmentedOnly: true,
  is: (value: unknown): value is readonly number[] => Array.isArray(value) && value.every(isNumber),
  convert(token: string, name: string): Conversion<readonly number[]> {
    const elements = token.split(/\s+/u).filter((element) => element.length > 0);
    const values: number[] = [];
    for (const [index, element] of elements.entries()) {
      const value = parseInt32(element);
      if (value === undefined) {
        return {
          ok: false,
          message: `Error parsing element #${index + 1} of "${name}" argument. ${INTEGER_EXPECTED}`,
        };
      }
      values.push(value);
    }
    return { ok: true, value: Object.freeze(values) };
  },
  validate: (): undefined => undefined,
});

/**
 * Identity conversion. Declare it multisegmented to accept embedded spaces.
 */
export const StringArgument: ArgumentType<string> = typedArgument({
  label: 'string',
  is: isString,
  parse: (token) => token,
  error: 'Text expected.',
});

/**
 * Exactly one code point
 */
export const CharArgument: ArgumentType<string> = typedArgument({
  label: 'character',
  is: isString,
  parse: (token) => ([...token].length === 1 ? token : undefined),
  error: 'Character expected.',
});

export const DateTimeArgument: ArgumentType<Date> = typedArgument({
  label: 'date/time',
  is: (value): value is Date => value instanceof Date,
  parse: (token) => {
    const parsed = moment(token.trim(), DATE_TIME_FORMATS, true);
    return parsed.isValid() ? parsed.toDate() : undefined;
  },
  error: 'Date/time expected.',
});

export interface Choice<K extends string> {
  readonly value: K;
  /** Lowercase spellings that select this value */
  readonly synonyms: readonly string[];
}

/**
 * Keyword enumeration: each value is reachable through several case-insensitive
 * synonyms.
 *
 * @example
 * ```typescript
 * const FormatArgument = choiceArgument('format', [
 *   { value: 'date', synonyms: ['d', 'date'] },
 *   { value: 'time', synonyms: ['t', 'time'] },
 * ]);
 * ```
 *
 * @param error - Parse failure detail; defaults to a list of the permissible synonyms
 */
export function choiceArgument<K extends string>(
  label: string,
  choices: readonly Choice<K>[],
  error?: string
): ArgumentType<K> {
  const lookup = new Map<string, K>();
  for (const choice of choices) {
    for (const synonym of choice.synonyms) {
      lookup.set(synonym.toLowerCase(), choice.value);
    }
  }

  const detail =
    error ??
    `Permissible values are: ${choices.map((choice) => choice.synonyms.join(', ')).join('; or: ')}.`;

  return typedArgument({
    label,
    is: (value): value is K => choices.some((choice) => choice.value === value),
    parse: (token) => lookup.get(token.trim().toLowerCase()),
    error: detail,
  });
}

function booleanArgument(
  label: string,
  trueSynonyms: readonly string[],
  falseSynonyms: readonly string[]
): ArgumentType<boolean> {
  const synonyms = new Map<string, boolean>([
    ...trueSynonyms.map((synonym): [string, boolean] => [synonym, true]),
    ...falseSynonyms.map((synonym): [string, boolean] => [synonym, false]),
  ]);

  return typedArgument({
    label,
    is: (value): value is boolean => typeof value === 'boolean',
    parse: (token) => synonyms.get(token.trim().toLowerCase()),
    error: `Permissible values are: ${trueSynonyms.join(', ')}; or: ${falseSynonyms.join(', ')}.`,
  });
}

export const TrueFalseArgument: ArgumentType<boolean> = booleanArgument('true/false', ['t', 'true'], ['f', 'false']);

export const YesNoArgument: ArgumentType<boolean> = booleanArgument('yes/no', ['y', 'yes'], ['n', 'no']);

export const AllowedForbiddenArgument: ArgumentType<boolean> = booleanArgument(
  'allowed/forbidden',
  ['a', 'allowed'],
  ['f', 'forbidden']
);
