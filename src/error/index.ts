/**
 * Output Error Types
 *
 * Error hierarchy for the chunked S3 file output. Callers decide between
 * resume and abort from the class (or `retryable`), never from the message.
 */

/**
 * Base output error class.
 */
export class OutputError extends Error {
  public readonly code: string;
  public readonly retryable: boolean;

  constructor(
    message: string,
    code: string,
    options?: { retryable?: boolean; cause?: unknown }
  ) {
    super(message, options?.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = "OutputError";
    this.code = code;
    this.retryable = options?.retryable ?? false;
    Object.setPrototypeOf(this, OutputError.prototype);
  }
}

/**
 * Invalid configuration. Raised before any task starts.
 */
export class ConfigurationError extends OutputError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, "Configuration", { cause: options?.cause });
    this.name = "ConfigurationError";
    Object.setPrototypeOf(this, ConfigurationError.prototype);
  }
}

/**
 * Credentials or bucket access rejected while building the uploader.
 */
export class AuthenticationError extends OutputError {
  public readonly bucket?: string;

  constructor(message: string, options?: { bucket?: string; cause?: unknown }) {
    super(message, "Authentication", { cause: options?.cause });
    this.name = "AuthenticationError";
    this.bucket = options?.bucket;
    Object.setPrototypeOf(this, AuthenticationError.prototype);
  }
}

/**
 * Local temp-file operation that failed.
 */
export type IoOperation = "Create" | "Write" | "Stat" | "Close" | "Delete" | "Read";

/**
 * Local temp-file failure.
 */
export class IOFailure extends OutputError {
  public readonly path?: string;

  constructor(
    message: string,
    operation: IoOperation,
    options?: { path?: string; cause?: unknown }
  ) {
    super(message, `IO.${operation}`, { cause: options?.cause });
    this.name = "IOFailure";
    this.path = options?.path;
    Object.setPrototypeOf(this, IOFailure.prototype);
  }
}

/**
 * Remote write failed. Safe to retry through resume: keys are deterministic.
 */
export class UploadFailure extends OutputError {
  public readonly key: string;
  public readonly s3Code?: string;
  public readonly requestId?: string;

  constructor(
    message: string,
    key: string,
    options?: { s3Code?: string; requestId?: string; cause?: unknown }
  ) {
    super(message, "Upload", { retryable: true, cause: options?.cause });
    this.name = "UploadFailure";
    this.key = key;
    this.s3Code = options?.s3Code;
    this.requestId = options?.requestId;
    Object.setPrototypeOf(this, UploadFailure.prototype);
  }
}

/**
 * Lifecycle misuse, e.g. add() before nextFile().
 */
export class InvalidStateError extends OutputError {
  constructor(message: string) {
    super(message, "InvalidState");
    this.name = "InvalidStateError";
    Object.setPrototypeOf(this, InvalidStateError.prototype);
  }
}

/**
 * Credentials error.
 */
export class CredentialsError extends OutputError {
  constructor(
    message: string,
    kind: "NotFound" | "Expired" | "Invalid" | "InstanceMetadata" = "NotFound",
    options?: { cause?: unknown }
  ) {
    super(message, `Credentials.${kind}`, { cause: options?.cause });
    this.name = "CredentialsError";
    Object.setPrototypeOf(this, CredentialsError.prototype);
  }
}

/**
 * Network/transport error.
 */
export class NetworkError extends OutputError {
  constructor(
    message: string,
    kind: "ConnectionFailed" | "Timeout" | "DnsResolutionFailed",
    options?: { cause?: unknown }
  ) {
    super(message, `Network.${kind}`, { retryable: true, cause: options?.cause });
    this.name = "NetworkError";
    Object.setPrototypeOf(this, NetworkError.prototype);
  }
}

/**
 * S3 error response from XML.
 */
export interface S3ErrorResponse {
  code: string;
  message: string;
  bucket?: string;
  key?: string;
  requestId?: string;
}

/**
 * Error reported by the object store itself (non-2xx response).
 */
export class S3ServiceError extends OutputError {
  public readonly status: number;
  public readonly s3Code: string;
  public readonly requestId?: string;

  constructor(status: number, response: S3ErrorResponse) {
    super(response.message, `S3.${response.code}`, {
      retryable: status >= 500 || response.code === "SlowDown",
    });
    this.name = "S3ServiceError";
    this.status = status;
    this.s3Code = response.code;
    this.requestId = response.requestId;
    Object.setPrototypeOf(this, S3ServiceError.prototype);
  }
}

/**
 * Fallback codes for responses that carry no XML body (HEAD requests).
 */
export function codeForStatus(status: number): string {
  switch (status) {
    case 301:
      return "PermanentRedirect";
    case 400:
      return "BadRequest";
    case 403:
      return "AccessDenied";
    case 404:
      return "NoSuchBucket";
    case 500:
      return "InternalError";
    case 503:
      return "ServiceUnavailable";
    default:
      return `Http${status}`;
  }
}

/**
 * Check if a value is an output error.
 */
export function isOutputError(error: unknown): error is OutputError {
  return error instanceof OutputError;
}

/**
 * Whether resuming the task may succeed without a configuration change.
 */
export function isRetryable(error: unknown): boolean {
  return isOutputError(error) && error.retryable;
}

/**
 * Human-readable description of an unknown thrown value.
 */
export function describeError(error: unknown): string {
  return error instanceof Error ? `${error.name}: ${error.message}` : String(error);
}
