/**
 * Configuration errors for command sets
 *
 * Raised while groups and commands are registered. They signal a mistake in
 * the command set itself, never bad user input, and are always thrown.
 */

/**
 * Configuration error codes
 */
export enum ConfigErrorCode {
  /** Alias or argument name is empty or not lowercase alphanumeric */
  INVALID_NAME = 'INVALID_NAME',
  /** Description is empty */
  INVALID_DESCRIPTION = 'INVALID_DESCRIPTION',
  /** Alias already used by a sibling group or command */
  NAME_COLLISION = 'NAME_COLLISION',
  /** Argument declaration is malformed or reused */
  INVALID_ARGUMENT = 'INVALID_ARGUMENT',
  /** Two arguments share a position */
  POSITION_COLLISION = 'POSITION_COLLISION',
  /** Two arguments share a name */
  ARGUMENT_NAME_COLLISION = 'ARGUMENT_NAME_COLLISION',
  /** More than one optional/multisegmented argument, or one that is not last */
  SPECIAL_ARGUMENT = 'SPECIAL_ARGUMENT',
  /** Path points at a command or at nothing */
  INVALID_PATH = 'INVALID_PATH',
  /** Group handle does not belong to this tree */
  INVALID_HANDLE = 'INVALID_HANDLE',
}

export type ConfigErrorContext = Record<string, string | number | boolean | readonly string[]>;

/**
 * Error thrown when a command set is registered with an invalid shape.
 */
export class ConfigurationError extends Error {
  readonly code: ConfigErrorCode;
  readonly context: ConfigErrorContext;

  constructor(code: ConfigErrorCode, message: string, context: ConfigErrorContext = {}) {
    super(message);

    this.name = 'ConfigurationError';
    this.code = code;
    this.context = context;

    Error.captureStackTrace(this, ConfigurationError);
  }

  /**
   * Format error for display
   */
  format(verbose: boolean = false): string {
    const lines: string[] = [];

    lines.push(`Error: ${this.message}`);
    lines.push(`Code: ${this.code}`);

    if (Object.keys(this.context).length > 0) {
      lines.push('Context:');
      for (const [key, value] of Object.entries(this.context)) {
        lines.push(`  ${key}: ${JSON.stringify(value)}`);
      }
    }

    if (verbose && this.stack) {
      lines.push('Stack trace:');
      lines.push(this.stack);
    }

    return lines.join('\n');
  }

  /**
   * Convert error to JSON for structured logging
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      context: this.context,
    };
  }
}

export function isConfigurationError(error: unknown): error is ConfigurationError {
  return error instanceof ConfigurationError;
}
