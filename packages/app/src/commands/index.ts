export { createCommandSet } from './command-set.js';
export type { CommandSetOptions } from './command-set.js';
export { add, divide, DivisorArgument, SUM_TOO_BIG, ZERO_DIVISOR } from './calculus.js';
export { createHelpCommand, HELP_HINT, HELP_NOT_FOUND } from './help.js';
export { createShowDateTimeCommand, DisplayFormatArgument } from './show-date-time.js';
export type { DisplayFormat, ShowDateTimeOptions } from './show-date-time.js';
export {
  countChars,
  countWords,
  displaySampleText,
  removeChar,
  repeatPhrase,
  repeatWord,
  SAMPLE_TEXT,
} from './text-utils.js';
