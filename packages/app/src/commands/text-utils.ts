/**
 * Text utilities of the sample command set
 */

import {
  CharArgument,
  NonNegativeIntArgument,
  StringArgument,
  optional,
  required,
  type CommandDefinition,
} from '@tapline/core';

export const SAMPLE_TEXT =
  'Lorem ipsum dolor sit amet, consectetur adipiscing elit, sed do eiusmod tempor incididunt ut ...';

function countWordsIn(text: string): number {
  return text.split(/\s+/u).filter((word) => word.length > 0).length;
}

export const displaySampleText: CommandDefinition = {
  names: 'displaysampletext|dst',
  description: 'display sample text',
  execute: () => SAMPLE_TEXT,
};

const countedWord = required(0, StringArgument, { name: 'word', description: 'word to count characters in' });

export const countChars: CommandDefinition = {
  names: 'countchars|cc',
  description: 'count characters in a word',
  arguments: [countedWord],
  execute: (args) => String([...args.value(countedWord)].length),
};

const text = required(0, StringArgument, {
  name: 'text',
  description: 'text to count words in',
  multisegmented: true,
});

export const countWords: CommandDefinition = {
  names: 'countwords|cw',
  description: 'count words',
  arguments: [text],
  execute: (args) => String(countWordsIn(args.value(text))),
};

const source = required(0, StringArgument, { name: 'word', description: 'word to remove character from' });
const removed = optional(1, CharArgument, { name: 'char', description: 'character to be removed' });

export const removeChar: CommandDefinition = {
  names: 'removechar|rc',
  description: 'remove character in a word',
  arguments: [source, removed],
  execute(args) {
    const char = args.value(removed);
    if (char === undefined) {
      return args.value(source);
    }
    return args.value(source).split(char).join('');
  },
};

const repeatedWord = required(0, StringArgument, { name: 'word', description: 'word to repeat' });
// "one" is not an integer: omitting "times" reports a parse error at run time
const wordTimes = optional(1, NonNegativeIntArgument, {
  name: 'times',
  description: 'number of times to repeat',
  defaultValue: 'one',
});

export const repeatWord: CommandDefinition = {
  names: 'repeatword|repw',
  description: 'repeat word X number of times',
  arguments: [repeatedWord, wordTimes],
  execute: (args) => `${args.value(repeatedWord)} `.repeat(args.value(wordTimes)),
};

const phraseTimes = required(0, NonNegativeIntArgument, { name: 'times', description: 'number of times to repeat' });
const phrase = required(1, StringArgument, { name: 'phrase', description: 'phrase to repeat', multisegmented: true });

export const repeatPhrase: CommandDefinition = {
  names: 'repeatphrase|repp',
  description: 'repeat phrase X number of times',
  arguments: [phraseTimes, phrase],
  execute: (args) => `${args.value(phrase)} `.repeat(args.value(phraseTimes)),
};
