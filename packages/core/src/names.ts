/**
 * Alias and description checks shared by groups, commands and arguments
 */

import { ConfigErrorCode, ConfigurationError } from './errors.js';

export const NAMES_SEPARATOR = '|';

const ALIAS_PATTERN = /^[a-z0-9]+$/;

/**
 * Aliases as declared: a list, or the serialized `name|alias` form
 */
export type NameList = string | readonly string[];

export function isValidAlias(alias: string): boolean {
  return ALIAS_PATTERN.test(alias);
}

/**
 * Parse and validate a declaration of aliases.
 *
 * @param owner - What the aliases belong to, for error messages (e.g. 'command group')
 * @returns Frozen, non-empty list of lowercase alphanumeric aliases
 * @throws ConfigurationError on empty input, malformed or repeated aliases
 */
export function parseNames(input: NameList, owner: string): readonly string[] {
  const raw = typeof input === 'string' ? input.split(NAMES_SEPARATOR) : input;
  const names = raw.map((name) => name.trim()).filter((name) => name.length > 0);

  if (names.length === 0) {
    const shown = typeof input === 'string' ? input : input.join(NAMES_SEPARATOR);
    throw new ConfigurationError(
      ConfigErrorCode.INVALID_NAME,
      `Invalid ${owner} names${shown.length === 0 ? ' (empty)' : `: "${shown}"`}.`,
      { names: shown }
    );
  }

  const seen = new Set<string>();
  for (const name of names) {
    if (!isValidAlias(name)) {
      throw new ConfigurationError(ConfigErrorCode.INVALID_NAME, `Invalid ${owner} name: "${name}".`, {
        name,
      });
    }
    if (seen.has(name)) {
      throw new ConfigurationError(
        ConfigErrorCode.NAME_COLLISION,
        `Name "${name}" is declared twice in "${joinNames(names)}".`,
        { name }
      );
    }
    seen.add(name);
  }

  return Object.freeze(names);
}

/**
 * Reject empty or whitespace-only descriptions
 *
 * @param owner - Quoted in the message, e.g. '"textutils|tu" command group'
 */
export function validateDescription(description: string, owner: string): string {
  if (description.trim().length === 0) {
    throw new ConfigurationError(
      ConfigErrorCode.INVALID_DESCRIPTION,
      `${owner} description is invalid (empty).`,
      { owner }
    );
  }
  return description;
}

export function joinNames(names: readonly string[]): string {
  return names.join(NAMES_SEPARATOR);
}
