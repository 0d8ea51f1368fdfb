/**
 * Help command
 */

import { StringArgument, optional, type CommandDefinition, type CommandProcessor } from '@tapline/core';

export const HELP_HINT =
  'In order to get help on a particular command please type "help pathToCommand commandName" or "h pathToCommand commandName".';

export const HELP_NOT_FOUND = 'Nothing found. Please type "help" or "h" with no arguments.';

export function createHelpCommand(processor: CommandProcessor): CommandDefinition {
  const path = optional(0, StringArgument, {
    name: 'path',
    description: 'path to a command or a command group',
    multisegmented: true,
    defaultValue: '',
  });

  return {
    names: 'help|h',
    description: 'show help',
    arguments: [path],
    execute(args) {
      const help = processor.getHelp(args.value(path));
      if (!help.found) {
        return HELP_NOT_FOUND;
      }
      return args.omitted(path) ? `${help.article}\n${HELP_HINT}` : help.article;
    },
  };
}
