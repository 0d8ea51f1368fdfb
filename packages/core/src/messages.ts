/**
 * Texts returned to the user instead of a command result
 */

export const USER_MESSAGES = {
  EMPTY_LINE: 'Please enter a command!',
  NOT_FOUND: 'Command not found!',
  TOO_MANY_ARGUMENTS: 'Too many arguments!',
  INTERNAL_ERROR: 'Internal error!',
} as const;

export function specifyCommandWithin(groupNames: string): string {
  return `Please specify a command within a "${groupNames}" group!`;
}

export function argumentMissing(name: string): string {
  return `Argument "${name}" is missing!`;
}

export function parseFailure(name: string, detail: string): string {
  return `Error parsing argument "${name}". ${detail}`;
}

export function validationFailure(name: string, detail: string): string {
  return `Error validating argument "${name}". ${detail}`;
}
