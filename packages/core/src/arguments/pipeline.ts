/**
 * Argument pipeline
 *
 * Consumes the text that follows a command alias against the command's
 * declarations, in position order. For each argument: skip leading white
 * space, take one token (or the whole rest for a multisegmented argument),
 * convert, validate. The first failure ends the pass.
 */

import { argumentMissing, USER_MESSAGES } from '../messages.js';
import type { AnyArgumentDeclaration, ArgumentEntry } from './types.js';
import { ArgumentValues } from './values.js';

export type ParseOutcome = { readonly ok: true; readonly values: ArgumentValues } | { readonly ok: false; readonly message: string };

const LEADING_WHITESPACE = /^\s+/u;
const FIRST_TOKEN = /^(\S+)([\s\S]*)$/u;

type StepResult =
  | { readonly ok: true; readonly entry: ArgumentEntry; readonly rest: string }
  | { readonly ok: false; readonly message: string };

export function skipWhitespace(text: string): string {
  return text.replace(LEADING_WHITESPACE, '');
}

/**
 * Split off the first whitespace-delimited token.
 *
 * @returns Token and the untouched rest, or undefined for blank input
 */
export function splitToken(text: string): { token: string; rest: string } | undefined {
  const match = FIRST_TOKEN.exec(skipWhitespace(text));
  if (!match) {
    return undefined;
  }
  const [, token = '', rest = ''] = match;
  return { token, rest };
}

function convertAndValidate(declaration: AnyArgumentDeclaration, text: string) {
  const { type, spec } = declaration;
  const converted = type.convert(text, spec.name);
  if (!converted.ok) {
    return converted;
  }
  const problem = type.validate(converted.value, spec.name);
  return problem === undefined ? converted : { ok: false as const, message: problem };
}

function parseOne(declaration: AnyArgumentDeclaration, remainder: string): StepResult {
  const { spec } = declaration;
  const text = skipWhitespace(remainder);

  if (text.length === 0) {
    if (!spec.optional) {
      return { ok: false, message: argumentMissing(spec.name) };
    }
    if (spec.defaultValue === undefined) {
      return { ok: true, entry: { name: spec.name, omitted: true, value: undefined }, rest: '' };
    }
    // The default goes through the same conversion as user input
    const result = convertAndValidate(declaration, spec.defaultValue);
    if (!result.ok) {
      return result;
    }
    return { ok: true, entry: { name: spec.name, omitted: true, value: result.value }, rest: '' };
  }

  let token = text;
  let rest = '';
  if (!spec.multisegmented) {
    const split = splitToken(text);
    token = split?.token ?? text;
    rest = split?.rest ?? '';
  }

  const result = convertAndValidate(declaration, token);
  if (!result.ok) {
    return result;
  }
  return { ok: true, entry: { name: spec.name, omitted: false, value: result.value }, rest };
}

/**
 * Parse `remainder` against declarations sorted by position.
 *
 * Pure: nothing is stored between calls, so one command can be invoked
 * concurrently.
 */
export function parseArguments(remainder: string, declarations: readonly AnyArgumentDeclaration[]): ParseOutcome {
  const entries: Array<readonly [AnyArgumentDeclaration, ArgumentEntry]> = [];
  let rest = remainder;

  for (const declaration of declarations) {
    const step = parseOne(declaration, rest);
    if (!step.ok) {
      return { ok: false, message: step.message };
    }
    entries.push([declaration, step.entry]);
    rest = step.rest;
  }

  if (skipWhitespace(rest).length > 0) {
    return { ok: false, message: USER_MESSAGES.TOO_MANY_ARGUMENTS };
  }

  return { ok: true, values: new ArgumentValues(entries) };
}
