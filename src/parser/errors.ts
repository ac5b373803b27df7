export type ArgParseErrorCode =
  | 'EMPTY_REGISTRY'
  | 'MISSING_VALUE'
  | 'MISSING_REQUIRED'
  | 'UNKNOWN_OPTION'
  | 'INVALID_DECLARATION'
  | 'MALFORMED_PAIR';

/**
 * Base class for everything the parser throws on bad declarations or input.
 * Callers switch on `code` rather than on the subclass.
 */
export abstract class ArgParseError extends Error {
  abstract readonly code: ArgParseErrorCode;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

export class EmptyRegistryError extends ArgParseError {
  readonly code = 'EMPTY_REGISTRY';

  constructor() {
    super('No options declared to parse');
  }
}

export class MissingValueError extends ArgParseError {
  readonly code = 'MISSING_VALUE';

  constructor(readonly option: string) {
    super(`Option \`${option}\` requires a value you have not provided`);
  }
}

export class MissingRequiredError extends ArgParseError {
  readonly code = 'MISSING_REQUIRED';

  constructor(readonly missing: readonly string[]) {
    super(`Missing required arguments: ${missing.join(', ')}`);
  }
}

export class UnknownOptionError extends ArgParseError {
  readonly code = 'UNKNOWN_OPTION';

  constructor(readonly option: string) {
    super(`No such option: ${option}`);
  }
}

export class InvalidDeclarationError extends ArgParseError {
  readonly code = 'INVALID_DECLARATION';

  constructor(readonly option: string, reason: string) {
    super(`Invalid declaration for \`${option}\`: ${reason}`);
  }
}

export class MalformedPairError extends ArgParseError {
  readonly code = 'MALFORMED_PAIR';

  constructor(readonly chunk: string) {
    super(`No \`:\` separator found in key-value chunk '${chunk}'`);
  }
}

export function isArgParseError(error: unknown): error is ArgParseError {
  return error instanceof ArgParseError;
}
