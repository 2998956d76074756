import { describe, it, expect } from 'vitest';
import {
  ConfigError, InvalidInputError, DatasetNotFoundError, ParseError, ExportError, UserCancelledError,
  exitCodeFor, formatError
} from '../src/errors/index.js';

describe('Error Classes', () => {
  it('UserCancelledError exits cleanly', () => {
    expect(exitCodeFor(new UserCancelledError())).toBe(0);
  });

  it('fatal errors exit with 1', () => {
    expect(exitCodeFor(new DatasetNotFoundError('data.jsonl'))).toBe(1);
    expect(exitCodeFor(new ParseError('Line 2: invalid JSON', 'data.jsonl', 2))).toBe(1);
    expect(exitCodeFor(new ConfigError('Bad config'))).toBe(1);
    expect(exitCodeFor(new InvalidInputError('Batch size must be greater than 0'))).toBe(1);
    expect(exitCodeFor(new ExportError('disk full', 'out.csv'))).toBe(1);
  });

  it('unknown errors exit with 1', () => {
    expect(exitCodeFor(new TypeError('boom'))).toBe(1);
  });

  it('carries error codes', () => {
    expect(new DatasetNotFoundError('x').code).toBe('FILE_NOT_FOUND');
    expect(new ParseError('x').code).toBe('PARSE_ERROR');
    expect(new UserCancelledError().code).toBe('USER_CANCELLED');
  });

  it('formats errors for JSON output', () => {
    const err = new ParseError('Line 3: id: Required', 'data.jsonl', 3);
    const formatted = formatError(err, 'json');
    expect(JSON.parse(formatted)).toEqual({
      error: 'ParseError',
      message: 'Line 3: id: Required',
      exitCode: 1,
      file: 'data.jsonl',
      line: 3,
    });
  });

  it('includes the missing path in JSON output', () => {
    const formatted = formatError(new DatasetNotFoundError('missing.jsonl'), 'json');
    expect(JSON.parse(formatted)).toMatchObject({
      error: 'DatasetNotFoundError',
      message: 'Dataset file not found: missing.jsonl',
      path: 'missing.jsonl',
    });
  });

  it('formats errors for text output', () => {
    const err = new DatasetNotFoundError('missing.jsonl');
    expect(formatError(err, 'text')).toBe('Error [DatasetNotFoundError]: Dataset file not found: missing.jsonl');
  });
});
