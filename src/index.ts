export { VERSION } from './version.js';

export { ArgParser, type ArgParserOptions, type ParseResult } from './parser/registry.js';
export { ParseOutcome, type OutcomeEntry } from './parser/outcome.js';
export { resolve, type ResolveOptions } from './parser/engine.js';
export { Kind, KIND_LABELS, TRUE_LITERAL } from './parser/types.js';
export type { DeclareOptions, OptionKind, OptionKindType, OptionSpec, ResolvedOption } from './parser/types.js';
export {
  applyConverter,
  dictOf,
  isScalarName,
  listOf,
  scalars,
  type Converter,
  type ConverterFn,
  type ConverterObject,
  type ScalarName,
  type ScalarType,
} from './parser/convert.js';
export {
  ArgParseError,
  EmptyRegistryError,
  InvalidDeclarationError,
  MalformedPairError,
  MissingRequiredError,
  MissingValueError,
  UnknownOptionError,
  isArgParseError,
  type ArgParseErrorCode,
} from './parser/errors.js';
export { isFlag, isLongFlag, isShortFlag, separateFlags } from './parser/flags.js';
export { slide, type Window } from './parser/window.js';
export { renderHelp, usageLine, wrapText, DEFAULT_HELP_WIDTH, type HelpOptions } from './help/renderer.js';
export {
  Logger,
  ChildLogger,
  createLogger,
  getLogger,
  logger,
  type LogLevel,
  type LogTarget,
  type LoggerOptions,
} from './observability/logger.js';
