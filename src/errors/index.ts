export class AnnobatchError extends Error {
  constructor(message: string, public readonly code: string) {
    super(message);
    this.name = 'AnnobatchError';
  }
}

export class ConfigError extends AnnobatchError {
  constructor(message: string, public readonly file?: string) {
    super(message, 'CONFIG_ERROR');
    this.name = 'ConfigError';
  }
}

/**
 * Batch size or other user input out of range.
 * The prompt loop recovers from this one by asking again.
 */
export class InvalidInputError extends AnnobatchError {
  constructor(message: string) {
    super(message, 'INVALID_INPUT');
    this.name = 'InvalidInputError';
  }
}

export class DatasetNotFoundError extends AnnobatchError {
  constructor(public readonly path: string) {
    super(`Dataset file not found: ${path}`, 'FILE_NOT_FOUND');
    this.name = 'DatasetNotFoundError';
  }
}

export class ParseError extends AnnobatchError {
  constructor(
    message: string,
    public readonly file?: string,
    public readonly line?: number
  ) {
    super(message, 'PARSE_ERROR');
    this.name = 'ParseError';
  }
}

export class ExportError extends AnnobatchError {
  constructor(message: string, public readonly path?: string) {
    super(message, 'EXPORT_ERROR');
    this.name = 'ExportError';
  }
}

export class UserCancelledError extends AnnobatchError {
  constructor(message = 'Allocation cancelled.') {
    super(message, 'USER_CANCELLED');
    this.name = 'UserCancelledError';
  }
}

// Cancellation is a normal way out, everything else fails the run
const EXIT_CODES: Record<string, number> = {
  UserCancelledError: 0,
  ConfigError: 1,
  InvalidInputError: 1,
  DatasetNotFoundError: 1,
  ParseError: 1,
  ExportError: 1,
  AnnobatchError: 1,
};

export function exitCodeFor(err: Error): number {
  return EXIT_CODES[err.name] ?? 1;
}

export function formatError(err: Error, format: 'json' | 'text' = 'text'): string {
  const exitCode = exitCodeFor(err);

  if (format === 'json') {
    return JSON.stringify({
      error: err.name,
      message: err.message,
      exitCode,
      ...((err instanceof ParseError || err instanceof ConfigError) && err.file ? { file: err.file } : {}),
      ...(err instanceof ParseError && err.line !== undefined ? { line: err.line } : {}),
      ...(err instanceof DatasetNotFoundError ? { path: err.path } : {}),
      ...(err instanceof ExportError && err.path ? { path: err.path } : {}),
    }, null, 2);
  }

  return `Error [${err.name}]: ${err.message}`;
}
