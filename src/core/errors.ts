export type ScaffoldStage = 'config' | 'validate' | 'plan' | 'materialize';

export class ScaffoldError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly stage?: ScaffoldStage,
    public readonly cause?: Error,
  ) {
    super(message);
    this.name = 'ScaffoldError';
  }
}

export class ConfigError extends ScaffoldError {
  constructor(message: string, cause?: Error) {
    super(message, 'CONFIG_ERROR', 'config', cause);
    this.name = 'ConfigError';
  }
}

export type ValidationErrorCode =
  | 'EMPTY_NAME'
  | 'TOO_LONG'
  | 'TOO_SHORT'
  | 'EMPTY_AFTER_SANITIZE'
  | 'INVALID_START'
  | 'RESERVED_NAME';

export class ValidationError extends ScaffoldError {
  constructor(message: string, public readonly reason: ValidationErrorCode) {
    super(message, reason, 'validate');
    this.name = 'ValidationError';
  }
}

export class UnsafePathError extends ScaffoldError {
  constructor(public readonly path: string) {
    super(`Refusing to write outside the project root: "${path}"`, 'UNSAFE_PATH', 'plan');
    this.name = 'UnsafePathError';
  }
}

export class DestinationExistsError extends ScaffoldError {
  constructor(public readonly path: string) {
    super(`Destination already exists: ${path}`, 'DESTINATION_EXISTS', 'materialize');
    this.name = 'DestinationExistsError';
  }
}

export class RootCreateError extends ScaffoldError {
  constructor(public readonly path: string, cause?: Error) {
    super(
      `Cannot create project directory ${path}${cause ? `: ${cause.message}` : ''}`,
      'ROOT_CREATE_ERROR',
      'materialize',
      cause,
    );
    this.name = 'RootCreateError';
  }
}

export class DirectoryCreateError extends ScaffoldError {
  constructor(public readonly path: string, cause?: Error) {
    super(
      `Cannot create directory ${path}${cause ? `: ${cause.message}` : ''}`,
      'DIRECTORY_CREATE_ERROR',
      'materialize',
      cause,
    );
    this.name = 'DirectoryCreateError';
  }
}

/**
 * Normalize anything thrown into an Error so it can be chained as a cause.
 */
export function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}
