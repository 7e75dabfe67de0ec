/**
 * Errors raised while setting up a logger.
 *
 * Everything thrown from construction or configuration extends LoggerSetupError,
 * so callers can catch the whole family and switch on `code`.
 */

export type LoggerSetupErrorCode = 'INVALID_NAME' | 'INVALID_TYPE' | 'INVALID_CONFIG';

export class LoggerSetupError extends Error {
  constructor(
    public readonly code: LoggerSetupErrorCode,
    message: string
  ) {
    super(message);
    this.name = new.target.name;
  }
}

/** The requested log file name is empty or not allowed on this platform. */
export class InvalidNameError extends LoggerSetupError {
  constructor(
    message: string,
    public readonly fileName: string
  ) {
    super('INVALID_NAME', message);
  }
}

/** The requested log file name is neither absent, a string nor a file URL. */
export class InvalidTypeError extends LoggerSetupError {
  constructor(public readonly received: string) {
    super('INVALID_TYPE', `'fileName' should be a string, a file URL, or undefined (received ${received}).`);
  }
}

export class ConfigError extends LoggerSetupError {
  constructor(
    message: string,
    public readonly option: string
  ) {
    super('INVALID_CONFIG', message);
  }
}

/** Short description of a value's runtime type, for error messages. */
export function describeType(value: unknown): string {
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'array';
  if (value instanceof Object && value.constructor !== Object) return value.constructor.name;
  return typeof value;
}
