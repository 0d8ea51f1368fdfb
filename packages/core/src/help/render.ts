/**
 * Help rendering: command articles and pseudo-graphic group trees
 */

import type { ArgumentSpec } from '../arguments/types.js';
import { joinNames } from '../names.js';

const INDENTATION = '   ';

const BRANCH = '├──';
const ELBOW = '└──';
const PIPE = '│  ';
const BLANK = '   ';

export interface CommandMetadata {
  readonly names: readonly string[];
  readonly description: string;
  readonly specs: readonly ArgumentSpec[];
}

/**
 * Read access to a tree, as needed for rendering
 */
export interface TreeView<G, C extends CommandMetadata> {
  isRoot(group: G): boolean;
  group(group: G): { readonly names: readonly string[]; readonly description: string };
  /** Distinct child groups and commands, each in insertion order */
  children(group: G): { readonly groups: readonly G[]; readonly commands: readonly C[] };
}

function usageToken(spec: ArgumentSpec): string {
  return spec.optional ? `[${spec.name}]` : spec.name;
}

function argumentLine(spec: ArgumentSpec): string {
  let line = `${INDENTATION}${INDENTATION}${spec.name}: ${spec.description}`;
  if (spec.optional) {
    line += spec.defaultValue === undefined ? ' (optional)' : ` (optional, default: "${spec.defaultValue}")`;
  }
  return line;
}

/**
 * Render the help article of a command.
 *
 * @example
 * ```
 * Command: repeatword|repw
 * Description: repeat word X number of times
 * Usage: repeatword|repw word [times]
 *    Arguments:
 *       word: word to be repeated
 *       times: number of repetitions (optional, default: "2")
 * ```
 */
export function renderCommandArticle(command: CommandMetadata): string {
  const names = joinNames(command.names);
  const lines = [
    `Command: ${names}`,
    `Description: ${command.description}`,
    ['Usage:', names, ...command.specs.map(usageToken)].join(' '),
  ];

  if (command.specs.length > 0) {
    lines.push(`${INDENTATION}Arguments:`);
    lines.push(...command.specs.map(argumentLine));
  }

  return lines.join('\n');
}

function commandLine(command: CommandMetadata): string {
  return `"${joinNames(command.names)}" - ${command.description}`;
}

/**
 * Render the subtree rooted at `group`, one string per line.
 * Groups come before commands.
 */
export function renderGroupTree<G, C extends CommandMetadata>(view: TreeView<G, C>, group: G): string[] {
  const info = view.group(group);
  const lines = [view.isRoot(group) ? info.description : `<${joinNames(info.names)}: ${info.description}>`];
  const { groups, commands } = view.children(group);

  groups.forEach((child, index) => {
    const last = index === groups.length - 1 && commands.length === 0;
    renderGroupTree(view, child).forEach((line, lineIndex) => {
      const prefix = lineIndex === 0 ? (last ? ELBOW : BRANCH) : last ? BLANK : PIPE;
      lines.push(prefix + line);
    });
  });

  commands.forEach((command, index) => {
    lines.push((index === commands.length - 1 ? ELBOW : BRANCH) + commandLine(command));
  });

  return lines;
}
