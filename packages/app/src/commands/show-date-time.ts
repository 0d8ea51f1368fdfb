/**
 * Current date and time in the configured zone
 */

import moment from 'moment-timezone';
import { choiceArgument, optional, type CommandDefinition } from '@tapline/core';

export type DisplayFormat = 'date' | 'time' | 'full';

export const DisplayFormatArgument = choiceArgument<DisplayFormat>(
  'date/time format',
  [
    { value: 'date', synonyms: ['d', 'date'] },
    { value: 'time', synonyms: ['t', 'time'] },
    { value: 'full', synonyms: ['f', 'full'] },
  ],
  'Only date/time/full or d/t/f values are expected.'
);

const LAYOUTS: Record<DisplayFormat, string> = {
  date: 'YYYY-MM-DD',
  time: 'HH:mm',
  full: 'YYYY-MM-DD HH:mm:ss z',
};

export interface ShowDateTimeOptions {
  timezone: string;
  /** Clock; `new Date()` by default */
  now?: () => Date;
}

export function createShowDateTimeCommand(options: ShowDateTimeOptions): CommandDefinition {
  const { timezone, now = () => new Date() } = options;

  const format = optional(0, DisplayFormatArgument, {
    name: 'format',
    description: 'date time format: date/time/full or d/t/f',
    defaultValue: 'full',
  });

  return {
    names: 'showdatetime|sdt',
    description: 'show current date and time',
    arguments: [format],
    execute: (args) => moment(now()).tz(timezone).format(LAYOUTS[args.value(format)]),
  };
}
