/**
 * Error types raised while loading rule resources or building encoders.
 *
 * Encoding itself never throws: every error below surfaces at configuration
 * time, before an engine exists.
 */

export type PhoneticErrorCode =
  | 'BAD_RULE'
  | 'NOT_A_BOOLEAN'
  | 'BAD_CONTEXT_REGEX'
  | 'WRONG_PHONEME'
  | 'INCLUDE_CYCLE'
  | 'UNKNOWN_NAME_TYPE'
  | 'WRONG_FILENAME'
  | 'IO'
  | 'INVALID_OPTIONS';

export class PhoneticError extends Error {
  readonly code: PhoneticErrorCode;

  constructor(message: string, code: PhoneticErrorCode, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'PhoneticError';
    this.code = code;
  }
}

export type RuleParseErrorCode = Extract<
  PhoneticErrorCode,
  'BAD_RULE' | 'NOT_A_BOOLEAN' | 'BAD_CONTEXT_REGEX' | 'WRONG_PHONEME' | 'INCLUDE_CYCLE'
>;

/**
 * Malformed rule text. Carries where it happened so the offending resource
 * can be fixed without re-running the loader under a debugger.
 */
export class RuleParseError extends PhoneticError {
  readonly location: string;
  readonly lineNumber: number;
  readonly line: string;

  constructor(
    code: RuleParseErrorCode,
    location: string,
    lineNumber: number,
    line: string,
    reason: string,
    options?: { cause?: unknown }
  ) {
    super(`${location}:${lineNumber}: ${reason} in line "${line}"`, code, options);
    this.name = 'RuleParseError';
    this.location = location;
    this.lineNumber = lineNumber;
    this.line = line;
  }
}

export class UnknownNameTypeError extends PhoneticError {
  readonly value: string;

  constructor(value: string) {
    super(`Unknown name type "${value}" (expected ash, gen or sep)`, 'UNKNOWN_NAME_TYPE');
    this.name = 'UnknownNameTypeError';
    this.value = value;
  }
}

export class MissingResourceError extends PhoneticError {
  readonly resource: string;

  constructor(resource: string, options?: { cause?: unknown }) {
    super(`Rule resource "${resource}" not found`, 'WRONG_FILENAME', options);
    this.name = 'MissingResourceError';
    this.resource = resource;
  }
}

export class ResourceReadError extends PhoneticError {
  readonly resource: string;

  constructor(resource: string, cause: unknown) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    super(`Failed to read rule resource "${resource}": ${detail}`, 'IO', { cause });
    this.name = 'ResourceReadError';
    this.resource = resource;
  }
}

export class InvalidOptionsError extends PhoneticError {
  constructor(message: string) {
    super(message, 'INVALID_OPTIONS');
    this.name = 'InvalidOptionsError';
  }
}
