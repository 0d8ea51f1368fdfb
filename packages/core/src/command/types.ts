import type { Logger } from '@tapline/logger';
import type { AnyArgumentDeclaration } from '../arguments/types.js';
import type { ArgumentValues } from '../arguments/values.js';
import type { NameList } from '../names.js';

/**
 * A user-invocable operation as written by the command set author
 *
 * @example
 * ```typescript
 * const word = required(0, StringArgument, { name: 'word', description: 'word to count' });
 *
 * const countChars: CommandDefinition = {
 *   names: 'countchars|cc',
 *   description: 'count characters in a word',
 *   arguments: [word],
 *   execute: (args) => String([...args.value(word)].length),
 * };
 * ```
 */
export interface CommandDefinition {
  /** One or more lowercase aliases, as a list or joined by "|" */
  readonly names: NameList;
  readonly description: string;
  /** Any order; sorted by position when bound */
  readonly arguments?: readonly AnyArgumentDeclaration[];
  /**
   * Runs once every argument converted and validated.
   *
   * @returns Text shown to the user
   */
  execute(args: ArgumentValues): string;
}

export interface BindOptions {
  /** Receives callback faults; silent when omitted */
  logger?: Logger;
}

/**
 * - 'executed': the callback ran and returned its text
 * - 'rejected': parsing or validation failed; text is the user message
 * - 'failed': the callback threw; text is the internal error message
 */
export interface InvocationResult {
  readonly status: 'executed' | 'rejected' | 'failed';
  readonly text: string;
}
