/**
 * Tree registry
 *
 * Groups and commands are stored in arenas and addressed by frozen handles.
 * A group maps every alias of every child to that child's handle, so one
 * child is reachable through several keys; the `order` list keeps each
 * child once, in insertion order, for rendering.
 */

import { createChildLogger, type Logger } from '@tapline/logger';
import { splitToken } from '../arguments/pipeline.js';
import type { BoundCommand } from '../command/bound-command.js';
import { ConfigErrorCode, ConfigurationError } from '../errors.js';
import { renderGroupTree, type TreeView } from '../help/render.js';
import { joinNames, parseNames, validateDescription, type NameList } from '../names.js';
import { silentLogger } from '../utils/silent-logger.js';

export interface GroupHandle {
  readonly kind: 'group';
  readonly id: number;
}

export interface CommandHandle {
  readonly kind: 'command';
  readonly id: number;
}

type ChildHandle = GroupHandle | CommandHandle;

export type SearchOutcome =
  | { readonly kind: 'group'; readonly group: GroupHandle }
  | {
      readonly kind: 'command';
      readonly command: BoundCommand;
      readonly handle: CommandHandle;
      /** Text after the command alias, to be parsed as arguments */
      readonly remainder: string;
    }
  | { readonly kind: 'nothing' };

interface GroupNode {
  readonly handle: GroupHandle;
  /** Empty for the root */
  readonly names: readonly string[];
  readonly description: string;
  readonly children: Map<string, ChildHandle>;
  readonly order: ChildHandle[];
}

export interface CommandTreeOptions {
  logger?: Logger;
}

export class CommandTree implements TreeView<GroupHandle, BoundCommand> {
  readonly root: GroupHandle;

  private readonly groups: GroupNode[] = [];
  private readonly commands: BoundCommand[] = [];
  private readonly commandHandles = new Map<BoundCommand, CommandHandle>();
  private readonly renderCache = new Map<number, readonly string[]>();
  private readonly logger: Logger;

  constructor(description: string, options: CommandTreeOptions = {}) {
    validateDescription(description, 'Root command group');
    this.logger = createChildLogger(options.logger ?? silentLogger(), { component: 'command-tree' });
    this.root = this.createGroup([], description);
  }

  /**
   * Create a group under `parent`.
   *
   * @throws ConfigurationError on malformed names or description, or when an
   *   alias is already used by a child of `parent`
   */
  addGroup(parent: GroupHandle, names: NameList, description: string): GroupHandle {
    const node = this.node(parent);
    const aliases = parseNames(names, 'command group');
    validateDescription(description, `"${joinNames(aliases)}" command group`);

    for (const alias of aliases) {
      if (node.children.has(alias)) {
        throw new ConfigurationError(
          ConfigErrorCode.NAME_COLLISION,
          `Can not add group. Child element named "${alias}" already exists in "${this.displayName(node)}" group.`,
          { name: alias, group: this.displayName(node) }
        );
      }
    }

    const handle = this.createGroup(aliases, description);
    this.attach(node, aliases, handle);

    this.logger.info('Command group registered', {
      group: joinNames(aliases),
      parent: this.displayName(node),
    });
    return handle;
  }

  /**
   * Attach a bound command under all of its aliases. The same command may be
   * attached to several groups and keeps one handle.
   *
   * @throws ConfigurationError when an alias is already used by a child of `parent`
   */
  addCommand(parent: GroupHandle, command: BoundCommand): CommandHandle {
    const node = this.node(parent);

    for (const alias of command.names) {
      if (node.children.has(alias)) {
        throw new ConfigurationError(
          ConfigErrorCode.NAME_COLLISION,
          `Can not add command. One of child element names "${alias}" already exists in "${this.displayName(node)}" group.`,
          { name: alias, group: this.displayName(node), command: command.joinedNames }
        );
      }
    }

    const handle = this.commandHandles.get(command) ?? this.createCommand(command);
    this.attach(node, command.names, handle);

    this.logger.info('Command registered', {
      command: command.joinedNames,
      parent: this.displayName(node),
    });
    return handle;
  }

  /**
   * Resolve a path or handle to a group, for registration.
   *
   * @param subject - What is being added, for the error message (e.g. 'group "calc"')
   * @throws ConfigurationError when the path leads to a command or nowhere
   */
  resolveGroup(target: GroupHandle | string, subject = 'element'): GroupHandle {
    if (typeof target !== 'string') {
      return this.node(target).handle;
    }

    const outcome = this.search(target);
    switch (outcome.kind) {
      case 'group':
        return outcome.group;
      case 'command':
        throw new ConfigurationError(
          ConfigErrorCode.INVALID_PATH,
          `Can not add ${subject} at a given path "${target}". Path points to an existing command, but should point to an existing group.`,
          { path: target }
        );
      case 'nothing':
        throw new ConfigurationError(
          ConfigErrorCode.INVALID_PATH,
          `Can not add ${subject} at a given path "${target}". Path is invalid.`,
          { path: target }
        );
    }
  }

  /**
   * Walk `line` token by token, case-insensitively, starting at `from`.
   */
  search(line: string, from: GroupHandle = this.root): SearchOutcome {
    let node = this.node(from);
    let rest = line;

    for (;;) {
      const split = splitToken(rest);
      if (!split) {
        return { kind: 'group', group: node.handle };
      }

      const child = node.children.get(split.token.toLowerCase());
      if (!child) {
        return { kind: 'nothing' };
      }

      if (child.kind === 'command') {
        return { kind: 'command', command: this.command(child), handle: child, remainder: split.rest };
      }

      node = this.node(child);
      rest = split.rest;
    }
  }

  /**
   * Pseudo-graphic tree of `group`, memoised until the next insertion
   */
  renderTree(group: GroupHandle = this.root): readonly string[] {
    const node = this.node(group);
    let lines = this.renderCache.get(node.handle.id);
    if (!lines) {
      lines = Object.freeze(renderGroupTree(this, node.handle));
      this.renderCache.set(node.handle.id, lines);
    }
    return lines;
  }

  isRoot(group: GroupHandle): boolean {
    return group.id === this.root.id;
  }

  group(group: GroupHandle): { readonly names: readonly string[]; readonly description: string } {
    const { names, description } = this.node(group);
    return { names, description };
  }

  children(group: GroupHandle): { readonly groups: readonly GroupHandle[]; readonly commands: readonly BoundCommand[] } {
    const groups: GroupHandle[] = [];
    const commands: BoundCommand[] = [];
    for (const child of this.node(group).order) {
      if (child.kind === 'group') {
        groups.push(child);
      } else {
        commands.push(this.command(child));
      }
    }
    return { groups, commands };
  }

  /**
   * Command behind a handle
   *
   * @throws ConfigurationError for a handle from another tree
   */
  command(handle: CommandHandle): BoundCommand {
    const command = this.commands[handle.id];
    if (!command || this.commandHandles.get(command) !== handle) {
      throw new ConfigurationError(ConfigErrorCode.INVALID_HANDLE, 'Command handle does not belong to this tree.', {
        id: handle.id,
      });
    }
    return command;
  }

  private createGroup(names: readonly string[], description: string): GroupHandle {
    const handle: GroupHandle = Object.freeze({ kind: 'group', id: this.groups.length });
    this.groups.push({ handle, names, description, children: new Map(), order: [] });
    return handle;
  }

  private createCommand(command: BoundCommand): CommandHandle {
    const handle: CommandHandle = Object.freeze({ kind: 'command', id: this.commands.length });
    this.commands.push(command);
    this.commandHandles.set(command, handle);
    return handle;
  }

  private attach(node: GroupNode, aliases: readonly string[], child: ChildHandle): void {
    for (const alias of aliases) {
      node.children.set(alias, child);
    }
    node.order.push(child);
    this.renderCache.clear();
  }

  private node(handle: GroupHandle): GroupNode {
    const node = this.groups[handle.id];
    if (!node || node.handle !== handle) {
      throw new ConfigurationError(ConfigErrorCode.INVALID_HANDLE, 'Group handle does not belong to this tree.', {
        id: handle.id,
      });
    }
    return node;
  }

  private displayName(node: GroupNode): string {
    return node.names.length > 0 ? joinNames(node.names) : 'root';
  }
}
