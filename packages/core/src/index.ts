/**
 * @fileoverview Public API exports for @tapline/core
 * Tree-structured command dispatch: typed arguments, binding, search and help
 */

// Processor facade
export { CommandProcessor } from './processor.js';
export type { CommandProcessorOptions, GroupTarget, HelpResult } from './processor.js';

// Tree registry
export { CommandTree } from './tree/command-tree.js';
export type { CommandHandle, CommandTreeOptions, GroupHandle, SearchOutcome } from './tree/command-tree.js';

// Commands
export { BoundCommand, bindCommand } from './command/bound-command.js';
export type { BindOptions, CommandDefinition, InvocationResult } from './command/types.js';

// Arguments
export { required, optional } from './arguments/declaration.js';
export type { ArgumentInfo, OptionalArgumentInfo } from './arguments/declaration.js';
export { typedArgument, withValidation } from './arguments/typed-argument.js';
export type { TypedArgumentOptions, ValidationRule } from './arguments/typed-argument.js';
export {
  AllowedForbiddenArgument,
  CharArgument,
  choiceArgument,
  DATE_TIME_FORMATS,
  DateTimeArgument,
  DecimalArgument,
  DoubleArgument,
  FloatArgument,
  IntArgument,
  IntArrayArgument,
  LongArgument,
  NonNegativeIntArgument,
  StringArgument,
  TrueFalseArgument,
  YesNoArgument,
} from './arguments/builtin.js';
export type { Choice } from './arguments/builtin.js';
export { parseArguments, splitToken, skipWhitespace } from './arguments/pipeline.js';
export type { ParseOutcome } from './arguments/pipeline.js';
export { ArgumentValues } from './arguments/values.js';
export type {
  AnyArgumentDeclaration,
  ArgumentDeclaration,
  ArgumentEntry,
  ArgumentSpec,
  ArgumentType,
  Conversion,
  Presence,
} from './arguments/types.js';

// Help
export { renderCommandArticle, renderGroupTree } from './help/render.js';
export type { CommandMetadata, TreeView } from './help/render.js';

// Names and messages
export { isValidAlias, joinNames, NAMES_SEPARATOR, parseNames, validateDescription } from './names.js';
export type { NameList } from './names.js';
export {
  argumentMissing,
  parseFailure,
  specifyCommandWithin,
  USER_MESSAGES,
  validationFailure,
} from './messages.js';

// Errors
export { ConfigErrorCode, ConfigurationError, isConfigurationError } from './errors.js';
export type { ConfigErrorContext } from './errors.js';
export { sanitizeError } from './utils/error-sanitizer.js';
export type { SanitizedError } from './utils/error-sanitizer.js';
