/**
 * Tests for error types and logging helpers
 */

import { describe, it, expect, vi } from 'vitest';
import {
  ConfigurationError,
  IOFailure,
  NetworkError,
  OutputError,
  S3ServiceError,
  UploadFailure,
  codeForStatus,
  describeError,
  isOutputError,
  isRetryable,
} from '../error';
import { formatLogLine, logSuppressed, type Logger } from '../observability/logging';

describe('error types', () => {
  it('should keep the class chain for instanceof checks', () => {
    const error = new ConfigurationError('bad');

    expect(error).toBeInstanceOf(ConfigurationError);
    expect(error).toBeInstanceOf(OutputError);
    expect(error).toBeInstanceOf(Error);
    expect(error.name).toBe('ConfigurationError');
    expect(error.code).toBe('Configuration');
  });

  it('should mark upload and network failures retryable', () => {
    expect(isRetryable(new UploadFailure('failed', 'a.csv'))).toBe(true);
    expect(isRetryable(new NetworkError('down', 'Timeout'))).toBe(true);
    expect(isRetryable(new ConfigurationError('bad'))).toBe(false);
    expect(isRetryable(new Error('plain'))).toBe(false);
  });

  it('should treat server errors and throttling as retryable service errors', () => {
    expect(new S3ServiceError(500, { code: 'InternalError', message: 'x' }).retryable).toBe(true);
    expect(new S3ServiceError(503, { code: 'SlowDown', message: 'x' }).retryable).toBe(true);
    expect(new S3ServiceError(403, { code: 'AccessDenied', message: 'x' }).retryable).toBe(false);
    expect(new S3ServiceError(403, { code: 'AccessDenied', message: 'x' }).code).toBe('S3.AccessDenied');
  });

  it('should carry the operation and path of IO failures', () => {
    const cause = new Error('disk full');
    const error = new IOFailure('Failed to write', 'Write', { path: '/tmp/a.tmp', cause });

    expect(error.code).toBe('IO.Write');
    expect(error.path).toBe('/tmp/a.tmp');
    expect(error.cause).toBe(cause);
  });

  it('should map bodiless statuses to error codes', () => {
    expect(codeForStatus(403)).toBe('AccessDenied');
    expect(codeForStatus(404)).toBe('NoSuchBucket');
    expect(codeForStatus(418)).toBe('Http418');
  });

  it('should describe thrown values', () => {
    expect(describeError(new ConfigurationError('bad'))).toBe('ConfigurationError: bad');
    expect(describeError('text')).toBe('text');
    expect(isOutputError(new Error('x'))).toBe(false);
  });
});

describe('logging helpers', () => {
  it('should format a log line with context', () => {
    const line = formatLogLine(
      new Date('2024-01-02T03:04:05.000Z'),
      'info',
      's3-file-output',
      'Uploaded S3 file',
      { key: 'logs/a.csv', bytes: 3 }
    );

    expect(line).toBe(
      '[2024-01-02T03:04:05.000Z] [INFO] s3-file-output: Uploaded S3 file {"key":"logs/a.csv","bytes":3}'
    );
  });

  it('should log suppressed failures as warnings', () => {
    const warn = vi.fn();
    const logger: Logger = { error: vi.fn(), warn, info: vi.fn(), debug: vi.fn(), trace: vi.fn() };

    logSuppressed(logger, 'discard temp file', new IOFailure('Failed to delete', 'Delete'));

    expect(warn).toHaveBeenCalledWith('Cleanup failed while handling an earlier error', {
      operation: 'discard temp file',
      errorName: 'IOFailure',
      errorMessage: 'Failed to delete',
    });
  });
});
