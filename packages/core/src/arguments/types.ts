/**
 * Argument contracts
 */

/**
 * Result of converting one token
 */
export type Conversion<T> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly message: string };

/**
 * A kind of value an argument can hold: how to recognise it, convert it from
 * text and check it afterwards.
 */
export interface ArgumentType<T> {
  /** Short type name used in configuration errors (e.g. 'integer') */
  readonly label: string;

  /** Only usable on multisegmented arguments */
  readonly multisegmentedOnly?: boolean;

  /** Runtime guard for values produced by {@link ArgumentType.convert} */
  is(value: unknown): value is T;

  /**
   * Convert raw text. On failure the message is shown to the user as is.
   *
   * @param name - Argument name, for the message
   */
  convert(token: string, name: string): Conversion<T>;

  /**
   * Check an already converted value.
   *
   * @returns Message shown to the user, or undefined when the value is acceptable
   */
  validate(value: T, name: string): string | undefined;
}

/**
 * Declarative metadata of one argument
 */
export interface ArgumentSpec {
  /** Order in the argument sequence; unique within a command */
  readonly position: number;
  /** Lowercase alphanumeric name shown in help */
  readonly name: string;
  readonly description: string;
  readonly optional: boolean;
  /** Consumes the rest of the line, spaces included */
  readonly multisegmented: boolean;
  /** Text converted in place of an omitted value */
  readonly defaultValue?: string;
}

/**
 * - 'required': always supplied by the user
 * - 'optional': may be omitted; no value then
 * - 'defaulted': may be omitted; the default text is converted instead
 */
export type Presence = 'required' | 'optional' | 'defaulted';

export interface ArgumentDeclaration<T, P extends Presence = Presence> {
  readonly spec: ArgumentSpec;
  readonly type: ArgumentType<T>;
  readonly presence: P;
}

export type AnyArgumentDeclaration = ArgumentDeclaration<unknown>;

/**
 * Parsed state of one argument for one invocation
 */
export interface ArgumentEntry {
  readonly name: string;
  readonly omitted: boolean;
  /** Undefined only for an omitted argument without default */
  readonly value: unknown;
}
