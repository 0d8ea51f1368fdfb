/**
 * Tests for the sample command set
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';
import type { CommandProcessor } from '@tapline/core';
import { createLogger } from '@tapline/logger';
import { createCommandSet } from '../src/commands/command-set.js';
import { HELP_HINT, HELP_NOT_FOUND } from '../src/commands/help.js';
import { SUM_TOO_BIG } from '../src/commands/calculus.js';
import { SAMPLE_TEXT } from '../src/commands/text-utils.js';
import { collectOutput } from './helpers/streams.js';

const FIXED_NOW = new Date('2024-03-05T14:07:09Z');

const FULL_TREE = [
  'Tapline test console',
  '├──<textutils|tu: some useful text utils>',
  '│  ├──<metrics|metr|mt: calculate various string metrics>',
  '│  │  ├──"countchars|cc" - count characters in a word',
  '│  │  └──"countwords|cw" - count words',
  '│  ├──"displaysampletext|dst" - display sample text',
  '│  ├──"removechar|rc" - remove character in a word',
  '│  ├──"countwords|cw" - count words',
  '│  ├──"repeatword|repw" - repeat word X number of times',
  '│  └──"repeatphrase|repp" - repeat phrase X number of times',
  '├──<fr: frequently used commands>',
  '│  ├──"displaysampletext|dst" - display sample text',
  '│  └──"countchars|cc" - count characters in a word',
  '├──<calc: do some calculus>',
  '│  ├──"add" - add arbitrary number of values',
  '│  └──"divide|div" - divide two integer values',
  '├──"showdatetime|sdt" - show current date and time',
  '└──"help|h" - show help',
].join('\n');

const COMMAND_PATHS = [
  'tu mt cc',
  'tu mt cw',
  'tu dst',
  'tu rc',
  'tu cw',
  'tu repw',
  'tu repp',
  'fr dst',
  'fr cc',
  'calc add',
  'calc div',
  'sdt',
  'help',
];

const LITERALS = new Map([
  ['word', 'hello'],
  ['char', 'l'],
  ['text', 'the bird'],
  ['times', '2'],
  ['phrase', 'to be'],
  ['values', '1 2'],
  ['dvd', '10'],
  ['dvs', '2'],
  ['format', 'd'],
  ['path', 'calc'],
]);

function literalFor(token: string): string {
  const name = token.replace(/^\[(.*)\]$/, '$1');
  const literal = LITERALS.get(name);
  if (literal === undefined) {
    throw new Error(`No literal for argument "${name}"`);
  }
  return literal;
}

/**
 * Lines built from the Usage line of the article at `path`, one per alias
 */
function linesFromUsage(processor: CommandProcessor, path: string): string[] {
  const help = processor.getHelp(path);
  if (!help.found) {
    throw new Error(`No help for "${path}"`);
  }
  const usage = help.article.split('\n').find((line) => line.startsWith('Usage: '));
  if (usage === undefined) {
    throw new Error(`No usage line for "${path}"`);
  }

  const [names = '', ...tokens] = usage.slice('Usage: '.length).split(' ');
  const groupPath = path.split(' ').slice(0, -1);
  const values = tokens.map(literalFor);
  return names.split('|').map((alias) => [...groupPath, alias, ...values].join(' '));
}

describe('createCommandSet', () => {
  let processor: CommandProcessor;

  beforeEach(() => {
    processor = createCommandSet({ name: 'Tapline test console', timezone: 'UTC', now: () => FIXED_NOW });
  });

  describe('text utils', () => {
    it('should count words in the text utils group', () => {
      expect(processor.processLine('tu cw the bird is the word')).toBe('5');
    });

    it('should reach the same command through the metrics group', () => {
      expect(processor.processLine('textutils metr countwords a  b')).toBe('2');
    });

    it('should count characters from both groups', () => {
      expect(processor.processLine('tu mt cc hello')).toBe('5');
      expect(processor.processLine('fr cc hello')).toBe('5');
    });

    it('should display the sample text', () => {
      expect(processor.processLine('tu dst')).toBe(SAMPLE_TEXT);
      expect(processor.processLine('fr displaysampletext')).toBe(SAMPLE_TEXT);
    });

    it('should keep the word when the character is omitted', () => {
      expect(processor.processLine('tu rc abracadabra')).toBe('abracadabra');
    });

    it('should remove every occurrence of the character', () => {
      expect(processor.processLine('tu rc abracadabra a')).toBe('brcdbr');
    });

    it('should reject more than one character', () => {
      expect(processor.processLine('tu rc abracadabra ab')).toBe('Error parsing argument "char". Character expected.');
    });

    it('should repeat a word', () => {
      expect(processor.processLine('tu repw hi 3')).toBe('hi hi hi ');
    });

    it('should report the unparsable default when times is omitted', () => {
      expect(processor.processLine('tu repw hi')).toBe('Error parsing argument "times". Integer value expected.');
    });

    it('should reject a negative repetition count', () => {
      expect(processor.processLine('tu repw hi -1')).toBe(
        'Error validating argument "times". Non-negative value expected.'
      );
    });

    it('should repeat a phrase with spaces', () => {
      expect(processor.processLine('tu repp 2 to be')).toBe('to be to be ');
    });
  });

  describe('calc', () => {
    it('should add any number of values', () => {
      expect(processor.processLine('calc add 1 2 3')).toBe('6');
      expect(processor.processLine('calc add -5 2')).toBe('-3');
    });

    it('should add nothing to zero', () => {
      expect(processor.processLine('calc add')).toBe('0');
    });

    it('should report an overflowing sum', () => {
      expect(processor.processLine('calc add 2147483647 1')).toBe(SUM_TOO_BIG);
      expect(processor.processLine('calc add -2147483648 -1')).toBe(SUM_TOO_BIG);
    });

    it('should name the element that is not an integer', () => {
      expect(processor.processLine('calc add 1 x 3')).toBe(
        'Error parsing element #2 of "values" argument. Integer value expected.'
      );
    });

    it('should divide', () => {
      expect(processor.processLine('calc div 10 4')).toBe('2.5');
      expect(processor.processLine('calc divide -9 3')).toBe('-3');
    });

    it('should divide in single precision', () => {
      expect(processor.processLine('calc div 10 3')).toBe('3.3333333');
      expect(processor.processLine('calc div 1 3')).toBe('0.33333334');
      expect(processor.processLine('calc div -2 3')).toBe('-0.6666667');
    });

    it('should refuse to divide by zero', () => {
      expect(processor.processLine('calc div 10 0')).toBe('Divisor can not be zero!');
    });

    it('should ask for a command inside the group', () => {
      expect(processor.processLine('calc')).toBe('Please specify a command within a "calc" group!');
    });
  });

  describe('showdatetime', () => {
    it('should show date and time by default', () => {
      expect(processor.processLine('sdt')).toBe('2024-03-05 14:07:09 UTC');
    });

    it('should accept each format synonym', () => {
      expect(processor.processLine('sdt d')).toBe('2024-03-05');
      expect(processor.processLine('showdatetime TIME')).toBe('14:07');
      expect(processor.processLine('sdt f')).toBe('2024-03-05 14:07:09 UTC');
    });

    it('should reject an unknown format', () => {
      expect(processor.processLine('sdt week')).toBe(
        'Error parsing argument "format". Only date/time/full or d/t/f values are expected.'
      );
    });

    it('should use the configured time zone', () => {
      const berlin = createCommandSet({ name: 'Berlin', timezone: 'Europe/Berlin', now: () => FIXED_NOW });

      expect(berlin.processLine('sdt t')).toBe('15:07');
    });
  });

  describe('help', () => {
    it('should print the full tree with a hint when no path is given', () => {
      expect(processor.processLine('help')).toBe(`${FULL_TREE}\n${HELP_HINT}`);
    });

    it('should print a group without the hint', () => {
      expect(processor.processLine('h calc')).toBe(
        [
          '<calc: do some calculus>',
          '├──"add" - add arbitrary number of values',
          '└──"divide|div" - divide two integer values',
        ].join('\n')
      );
    });

    it('should print a command article', () => {
      expect(processor.processLine('help tu repw')).toBe(
        [
          'Command: repeatword|repw',
          'Description: repeat word X number of times',
          'Usage: repeatword|repw word [times]',
          '   Arguments:',
          '      word: word to repeat',
          '      times: number of times to repeat (optional, default: "one")',
        ].join('\n')
      );
    });

    it('should show an empty default', () => {
      expect(processor.processLine('help calc add')).toBe(
        [
          'Command: add',
          'Description: add arbitrary number of values',
          'Usage: add [values]',
          '   Arguments:',
          '      values: array of values, split by spaces (optional, default: "")',
        ].join('\n')
      );
    });

    it('should print an article for a command without arguments', () => {
      expect(processor.processLine('help fr dst')).toBe(
        ['Command: displaysampletext|dst', 'Description: display sample text', 'Usage: displaysampletext|dst'].join('\n')
      );
    });

    it('should accept every usage line filled with valid values', async () => {
      const { stream, text } = collectOutput();
      const logger = createLogger({ level: 'debug', json: true, console: false, stream });
      const logged = createCommandSet({ name: 'Usage', timezone: 'UTC', now: () => FIXED_NOW, logger });
      const lines = COMMAND_PATHS.flatMap((path) => linesFromUsage(logged, path));

      expect(lines).toContain('tu repeatphrase 2 to be');
      expect(lines).toContain('calc div 10 2');
      lines.forEach((line) => logged.processLine(line));

      const results = (): unknown[] =>
        text()
          .split('\n')
          .filter((entry) => entry.includes('"Line processed"'))
          .map((entry): unknown => JSON.parse(entry))
          .map((entry) => (typeof entry === 'object' && entry !== null ? Reflect.get(entry, 'result') : undefined));
      await vi.waitFor(() => expect(results()).toHaveLength(lines.length));
      expect(results()).toEqual(lines.map(() => 'executed'));
    });

    it('should report paths that lead nowhere', () => {
      expect(processor.processLine('help nope')).toBe(HELP_NOT_FOUND);
      expect(processor.processLine('help calc add 1')).toBe(HELP_NOT_FOUND);
    });
  });

  it('should answer unknown input', () => {
    expect(processor.processLine('xyz')).toBe('Command not found!');
    expect(processor.processLine('   ')).toBe('Please enter a command!');
  });
});
