/**
 * Command binding
 *
 * Checks a command definition once, at registration time, so that parsing
 * can rely on a well-formed argument list.
 */

import { createChildLogger, type Logger } from '@tapline/logger';
import { parseArguments, type ParseOutcome } from '../arguments/pipeline.js';
import type { AnyArgumentDeclaration, ArgumentSpec } from '../arguments/types.js';
import { ConfigErrorCode, ConfigurationError } from '../errors.js';
import { renderCommandArticle } from '../help/render.js';
import { USER_MESSAGES } from '../messages.js';
import { joinNames, parseNames, validateDescription } from '../names.js';
import { sanitizeError } from '../utils/error-sanitizer.js';
import { silentLogger } from '../utils/silent-logger.js';
import type { BindOptions, CommandDefinition, InvocationResult } from './types.js';

function isSpecial(spec: ArgumentSpec): boolean {
  return spec.optional || spec.multisegmented;
}

function checkArguments(
  declarations: readonly AnyArgumentDeclaration[],
  commandNames: string
): AnyArgumentDeclaration[] {
  const seen = new Set<AnyArgumentDeclaration>();
  const byName = new Map<string, AnyArgumentDeclaration>();
  const byPosition = new Map<number, AnyArgumentDeclaration>();
  let special: AnyArgumentDeclaration | undefined;

  for (const declaration of declarations) {
    const { name, position } = declaration.spec;

    if (seen.has(declaration)) {
      throw new ConfigurationError(
        ConfigErrorCode.INVALID_ARGUMENT,
        `Argument "${name}" in command "${commandNames}" is declared more than once.`,
        { command: commandNames, argument: name }
      );
    }
    seen.add(declaration);

    const sameName = byName.get(name);
    if (sameName) {
      throw new ConfigurationError(
        ConfigErrorCode.ARGUMENT_NAME_COLLISION,
        `Command "${commandNames}" has two arguments named "${name}".`,
        { command: commandNames, argument: name }
      );
    }
    byName.set(name, declaration);

    const samePosition = byPosition.get(position);
    if (samePosition) {
      throw new ConfigurationError(
        ConfigErrorCode.POSITION_COLLISION,
        `Argument "${name}" in command "${commandNames}" has the same position as "${samePosition.spec.name}" argument.`,
        { command: commandNames, argument: name, position }
      );
    }
    byPosition.set(position, declaration);

    if (isSpecial(declaration.spec)) {
      if (special) {
        throw new ConfigurationError(
          ConfigErrorCode.SPECIAL_ARGUMENT,
          `Command "${commandNames}" has two special arguments: "${special.spec.name}" and "${name}".`,
          { command: commandNames, argument: name }
        );
      }
      special = declaration;
    }
  }

  const sorted = [...declarations].sort((a, b) => a.spec.position - b.spec.position);

  if (special && sorted[sorted.length - 1] !== special) {
    throw new ConfigurationError(
      ConfigErrorCode.SPECIAL_ARGUMENT,
      `Argument "${special.spec.name}" in command "${commandNames}" is optional or multisegmented and should be the last!`,
      { command: commandNames, argument: special.spec.name }
    );
  }

  return sorted;
}

const articles = new WeakMap<BoundCommand, string>();

/**
 * A validated, immutable command ready to be attached to a tree.
 * The same instance may be attached under several groups.
 */
export class BoundCommand {
  readonly names: readonly string[];
  readonly description: string;
  readonly arguments: readonly AnyArgumentDeclaration[];

  private readonly definition: CommandDefinition;
  private readonly logger: Logger;

  /**
   * @throws ConfigurationError when the definition is malformed
   */
  constructor(definition: CommandDefinition, options: BindOptions = {}) {
    this.names = parseNames(definition.names, 'command');
    const joined = joinNames(this.names);
    this.description = validateDescription(definition.description, `"${joined}" command`);
    this.arguments = Object.freeze(checkArguments(definition.arguments ?? [], joined));
    this.definition = definition;
    this.logger = createChildLogger(options.logger ?? silentLogger(), { component: 'command', command: joined });
    Object.freeze(this);
  }

  /** Aliases joined by "|" */
  get joinedNames(): string {
    return joinNames(this.names);
  }

  get specs(): readonly ArgumentSpec[] {
    return this.arguments.map((declaration) => declaration.spec);
  }

  /**
   * Help article, rendered on first request
   */
  get helpArticle(): string {
    let article = articles.get(this);
    if (article === undefined) {
      article = renderCommandArticle(this);
      articles.set(this, article);
    }
    return article;
  }

  /**
   * Parse the text that followed the alias without running the callback
   */
  parse(remainder: string): ParseOutcome {
    return parseArguments(remainder, this.arguments);
  }

  /**
   * Parse `remainder` and run the callback.
   */
  run(remainder: string): InvocationResult {
    const outcome = this.parse(remainder);
    if (!outcome.ok) {
      return { status: 'rejected', text: outcome.message };
    }

    try {
      return { status: 'executed', text: this.definition.execute(outcome.values) };
    } catch (error) {
      this.logger.error('Command callback failed', {
        error: sanitizeError(error),
        arguments: outcome.values.toJSON(),
      });
      return { status: 'failed', text: USER_MESSAGES.INTERNAL_ERROR };
    }
  }

  /**
   * @returns Callback result, or the first user-facing error message
   */
  invoke(remainder: string): string {
    return this.run(remainder).text;
  }
}

/**
 * Validate a definition and produce its bound command
 */
export function bindCommand(definition: CommandDefinition, options?: BindOptions): BoundCommand {
  return new BoundCommand(definition, options);
}

