/**
 * Arithmetic commands of the sample command set
 */

import {
  IntArgument,
  IntArrayArgument,
  optional,
  required,
  withValidation,
  type CommandDefinition,
} from '@tapline/core';

const INT32_MIN = -2147483648;
const INT32_MAX = 2147483647;

export const SUM_TOO_BIG = 'Can not compute, sum is too big.';
export const ZERO_DIVISOR = 'Divisor can not be zero!';

/**
 * Integer that must not be zero
 */
export const DivisorArgument = withValidation(
  IntArgument,
  {
    check: (value) => value !== 0,
    message: () => ZERO_DIVISOR,
  },
  'divisor'
);

const values = optional(0, IntArrayArgument, {
  name: 'values',
  description: 'array of values, split by spaces',
  multisegmented: true,
  defaultValue: '',
});

/**
 * Sums 32-bit integers; fails as soon as a running total leaves the range
 */
export const add: CommandDefinition = {
  names: 'add',
  description: 'add arbitrary number of values',
  arguments: [values],
  execute(args) {
    let sum = 0;
    for (const value of args.value(values)) {
      sum += value;
      if (sum < INT32_MIN || sum > INT32_MAX) {
        return SUM_TOO_BIG;
      }
    }
    return String(sum);
  },
};

/**
 * Quotients are single precision, printed with the fewest digits that read
 * back as the same value
 */
function formatSingle(value: number): string {
  const single = Math.fround(value);
  for (let digits = 1; digits < 9; digits++) {
    const shortest = Number(single.toPrecision(digits));
    if (Math.fround(shortest) === single) {
      return String(shortest);
    }
  }
  return String(Number(single.toPrecision(9)));
}

const dividend = required(0, IntArgument, { name: 'dvd', description: 'dividend' });
const divisor = required(1, DivisorArgument, { name: 'dvs', description: 'divisor' });

export const divide: CommandDefinition = {
  names: 'divide|div',
  description: 'divide two integer values',
  arguments: [dividend, divisor],
  execute: (args) => formatSingle(args.value(dividend) / args.value(divisor)),
};
