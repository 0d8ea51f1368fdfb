/**
 * Command processor
 *
 * One command set: a tree of groups and commands under a root description.
 * Registration happens once at start-up; afterwards `processLine` and
 * `getHelp` only read the tree.
 */

import { createChildLogger, startTimer, type Logger } from '@tapline/logger';
import { skipWhitespace } from './arguments/pipeline.js';
import { BoundCommand } from './command/bound-command.js';
import type { CommandDefinition } from './command/types.js';
import { specifyCommandWithin, USER_MESSAGES } from './messages.js';
import { joinNames, type NameList } from './names.js';
import { CommandTree, type GroupHandle } from './tree/command-tree.js';
import { silentLogger } from './utils/silent-logger.js';

export interface CommandProcessorOptions {
  /** Root group description, shown on the first line of the full tree */
  description: string;
  logger?: Logger;
}

export type HelpResult = { readonly found: true; readonly article: string } | { readonly found: false };

/**
 * Where to register: a group handle, or a path of group aliases ("" is the root)
 */
export type GroupTarget = GroupHandle | string;

/**
 * @example
 * ```typescript
 * const processor = new CommandProcessor({ description: 'Demo console' });
 * const calc = processor.addGroup('', 'calc', 'do some calculus');
 * processor.addCommand(calc, addCommand);
 *
 * processor.processLine('calc add 2 3'); // '5'
 * ```
 */
export class CommandProcessor {
  private readonly tree: CommandTree;
  private readonly logger: Logger;

  /**
   * @throws ConfigurationError when the description is empty
   */
  constructor(options: CommandProcessorOptions) {
    const baseLogger = options.logger ?? silentLogger();
    this.logger = createChildLogger(baseLogger, { component: 'command-processor' });
    this.tree = new CommandTree(options.description, { logger: baseLogger });
  }

  get description(): string {
    return this.tree.group(this.tree.root).description;
  }

  get root(): GroupHandle {
    return this.tree.root;
  }

  /**
   * Answer one line of user input. Never throws for user input.
   *
   * @returns The command's result or a user-facing error message
   */
  processLine(line: string): string {
    const timer = startTimer();

    if (skipWhitespace(line).length === 0) {
      this.logger.debug('Line processed', { result: 'empty', duration_ms: timer.stop() });
      return USER_MESSAGES.EMPTY_LINE;
    }

    const outcome = this.tree.search(line);
    switch (outcome.kind) {
      case 'command': {
        const { status, text } = outcome.command.run(outcome.remainder);
        this.logger.debug('Line processed', {
          result: status,
          command: outcome.command.joinedNames,
          duration_ms: timer.stop(),
        });
        return text;
      }
      case 'group': {
        const names = joinNames(this.tree.group(outcome.group).names);
        this.logger.debug('Line processed', { result: 'group', path: names, duration_ms: timer.stop() });
        return specifyCommandWithin(names);
      }
      case 'nothing':
        this.logger.debug('Line processed', { result: 'not_found', duration_ms: timer.stop() });
        return USER_MESSAGES.NOT_FOUND;
    }
  }

  /**
   * Help for the element at `path`: the tree of a group, or the article of a
   * command when the path ends exactly at it. An empty path is the root.
   */
  getHelp(path = ''): HelpResult {
    const outcome = this.tree.search(path);

    if (outcome.kind === 'group') {
      return { found: true, article: this.tree.renderTree(outcome.group).join('\n') };
    }

    if (outcome.kind === 'command' && skipWhitespace(outcome.remainder).length === 0) {
      return { found: true, article: outcome.command.helpArticle };
    }

    return { found: false };
  }

  /**
   * Create a group under `target`.
   *
   * @throws ConfigurationError on malformed names, collisions or a path that
   *   does not lead to a group
   */
  addGroup(target: GroupTarget, names: NameList, description: string): GroupHandle {
    const parent = this.tree.resolveGroup(target, `group "${describeNames(names)}"`);
    return this.tree.addGroup(parent, names, description);
  }

  /**
   * Bind (when needed) and attach a command under `target`.
   *
   * @returns The bound command, so it can be attached elsewhere as well
   * @throws ConfigurationError on a malformed command, collisions or a path
   *   that does not lead to a group
   */
  addCommand(target: GroupTarget, command: CommandDefinition | BoundCommand): BoundCommand {
    const bound = command instanceof BoundCommand ? command : this.bind(command);
    const parent = this.tree.resolveGroup(target, `command "${bound.joinedNames}"`);
    this.tree.addCommand(parent, bound);
    return bound;
  }

  /**
   * Validate a definition without attaching it
   */
  bind(definition: CommandDefinition): BoundCommand {
    return new BoundCommand(definition, { logger: this.logger });
  }

  /**
   * Resolve a path of group aliases to its handle
   */
  group(path: string): GroupHandle {
    return this.tree.resolveGroup(path, 'element');
  }

  renderTree(target: GroupTarget = this.root): readonly string[] {
    return this.tree.renderTree(this.tree.resolveGroup(target));
  }
}

function describeNames(names: NameList): string {
  return typeof names === 'string' ? names : joinNames(names);
}
