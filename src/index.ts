/**
 * S3 File Output
 *
 * Buffers a pipeline's output in local temp files and uploads each finished
 * chunk to an S3-compatible bucket under a deterministic key, so a resumed
 * task overwrites exactly what an earlier attempt wrote.
 *
 * ## Quick Start
 *
 * ```typescript
 * import { TransactionCoordinator, runOutputTask } from 's3-file-output';
 *
 * const coordinator = new TransactionCoordinator();
 *
 * await coordinator.transaction(
 *   {
 *     bucket: 'my-bucket',
 *     endpoint: 's3-us-west-2.amazonaws.com',
 *     path_prefix: 'logs/out',
 *     file_ext: '.csv',
 *     file_buffer_chunk_limit: 64 * 1024 * 1024,
 *   },
 *   4,
 *   async (taskSource, taskIndex) => {
 *     const output = await coordinator.open(taskSource, taskIndex);
 *     return runOutputTask(output, async (out) => {
 *       await out.nextFile();
 *       await out.add(Buffer.from('id,name\n'));
 *     });
 *   }
 * );
 * ```
 *
 * @module s3-file-output
 */

// Transaction
export {
  TransactionCoordinator,
  splitChunkLimit,
  type ConfigDiff,
  type TaskControl,
  type TransactionCoordinatorOptions,
} from "./transaction";

// Per-task output
export {
  ChunkWriter,
  runOutputTask,
  type ChunkWriterOptions,
  type PooledBuffer,
  type TaskReport,
  type WriterState,
} from "./output";

// Local staging
export { ChunkBuffer, type ChunkBufferOptions } from "./buffer";

// Keys
export {
  DEFAULT_SEQUENCE_FORMAT,
  FormatError,
  KeyNamer,
  formatSequence,
  hasDotSegment,
  validateKeyLayout,
  validateSequenceFormat,
} from "./format";

// Upload
export { Uploader, parseErrorResponse, type UploaderOptions, type UploadResult } from "./upload";

// Configuration
export {
  DEFAULT_REGION,
  DEFAULT_REQUEST_TIMEOUT_MS,
  DEFAULT_TMP_PATH_PREFIX,
  OutputConfigSchema,
  PluginTaskSchema,
  dumpTask,
  inferRegion,
  loadConfig,
  loadTask,
  normalizeEndpoint,
  objectUrl,
  type OutputConfig,
  type PluginTask,
  type TaskSource,
} from "./config";

// Credentials
export {
  EnvCredentialsProvider,
  InstanceRoleCredentialsProvider,
  StaticCredentialsProvider,
  createCredentialsProvider,
  resolveCredentialSource,
  type AwsCredentials,
  type CredentialSource,
  type CredentialsProvider,
  type Environment,
  type InstanceRoleConfig,
} from "./credentials";

// Signing and transport
export { AwsSignerV4, type SignedRequest } from "./signing";
export {
  FetchTransport,
  getHeader,
  getRequestId,
  isSuccess,
  type HttpMethod,
  type HttpRequest,
  type HttpResponse,
  type HttpTransport,
} from "./transport";

// Errors
export {
  AuthenticationError,
  ConfigurationError,
  CredentialsError,
  IOFailure,
  InvalidStateError,
  NetworkError,
  OutputError,
  S3ServiceError,
  UploadFailure,
  isOutputError,
  isRetryable,
  type S3ErrorResponse,
} from "./error";

// Logging
export {
  ConsoleLogger,
  NoopLogger,
  type LogContext,
  type LogLevel,
  type Logger,
} from "./observability/logging";
