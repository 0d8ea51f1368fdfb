/**
 * Sample command set
 *
 * Shows both registration styles: by path, where any combination of a
 * group's aliases may be used, and by handle, which keeps working when a
 * group is renamed.
 */

import { CommandProcessor } from '@tapline/core';
import type { Logger } from '@tapline/logger';
import { add, divide } from './calculus.js';
import { createHelpCommand } from './help.js';
import { createShowDateTimeCommand } from './show-date-time.js';
import {
  countChars,
  countWords,
  displaySampleText,
  removeChar,
  repeatPhrase,
  repeatWord,
} from './text-utils.js';

export interface CommandSetOptions {
  /** Root description, printed at the top of the command tree */
  name: string;
  /** Zone for `showdatetime` */
  timezone: string;
  /** Clock for `showdatetime`; `new Date()` by default */
  now?: () => Date;
  logger?: Logger;
}

/**
 * @example
 * ```typescript
 * const processor = createCommandSet({ name: 'Tapline test console', timezone: 'UTC' });
 * processor.processLine('tu cw the bird is the word'); // '5'
 * ```
 */
export function createCommandSet(options: CommandSetOptions): CommandProcessor {
  const processor = new CommandProcessor({ description: options.name, logger: options.logger });

  processor.addGroup('', 'textutils|tu', 'some useful text utils');
  processor.addGroup('tu', 'metrics|metr|mt', 'calculate various string metrics');
  processor.addGroup('', 'fr', 'frequently used commands');

  const dst = processor.addCommand('tu', displaySampleText);
  processor.addCommand('textutils', removeChar);
  const cc = processor.addCommand('tu mt', countChars);
  const cw = processor.addCommand('textutils mt', countWords);
  processor.addCommand('tu', cw);
  processor.addCommand('textutils', repeatWord);
  processor.addCommand('tu', repeatPhrase);

  processor.addCommand('fr', dst);
  processor.addCommand('fr', cc);
  processor.addCommand('', createShowDateTimeCommand({ timezone: options.timezone, now: options.now }));
  processor.addCommand('', createHelpCommand(processor));

  const calc = processor.addGroup(processor.root, 'calc', 'do some calculus');
  processor.addCommand(calc, add);
  processor.addCommand(calc, divide);

  return processor;
}
