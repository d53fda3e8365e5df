/**
 * Output Configuration
 *
 * Schema for the user-facing configuration (snake_case keys), the validated
 * task it loads into, and the serialisable task source handed to every task.
 */

import { z } from "zod";
import { ConfigurationError } from "../error";
import { DEFAULT_SEQUENCE_FORMAT, hasDotSegment, validateKeyLayout } from "../format";

/**
 * Default prefix of local temp files.
 */
export const DEFAULT_TMP_PATH_PREFIX = "embulk-output-s3-";

/**
 * Region used when none is configured and the endpoint does not name one.
 */
export const DEFAULT_REGION = "us-east-1";

/**
 * Default request timeout in milliseconds.
 */
export const DEFAULT_REQUEST_TIMEOUT_MS = 30000;

/**
 * User configuration, as written in the job definition.
 */
export const OutputConfigSchema = z
  .object({
    path_prefix: z.string({ required_error: "path_prefix is required" }),
    file_ext: z.string({ required_error: "file_ext is required" }),
    sequence_format: z.string().default(DEFAULT_SEQUENCE_FORMAT),
    bucket: z.string({ required_error: "bucket is required" }).min(1, "bucket cannot be empty"),
    endpoint: z
      .string({ required_error: "endpoint is required" })
      .min(1, "endpoint cannot be empty"),
    region: z.string().min(1).optional(),
    access_key_id: z.string().min(1).optional(),
    secret_access_key: z.string().min(1).optional(),
    tmp_path_prefix: z.string().default(DEFAULT_TMP_PATH_PREFIX),
    tmp_dir: z.string().min(1).optional(),
    file_buffer_chunk_limit: z.number().int().nonnegative().default(0),
    request_timeout_ms: z.number().int().positive().default(DEFAULT_REQUEST_TIMEOUT_MS),
  })
  .refine(
    (config) => (config.access_key_id === undefined) === (config.secret_access_key === undefined),
    {
      message: "access_key_id and secret_access_key must be set together",
      path: ["access_key_id"],
    }
  );

export type OutputConfig = z.input<typeof OutputConfigSchema>;

/**
 * Validated task, shared by every task of one transaction.
 */
export const PluginTaskSchema = z.object({
  pathPrefix: z.string(),
  fileExt: z.string(),
  sequenceFormat: z.string(),
  bucket: z.string().min(1),
  endpoint: z.string().url(),
  region: z.string().min(1),
  accessKeyId: z.string().optional(),
  secretAccessKey: z.string().optional(),
  tmpPathPrefix: z.string(),
  tmpDir: z.string().optional(),
  totalFileBufferChunkLimit: z.number().int().nonnegative(),
  /** Per-task limit in bytes; 0 means unlimited. */
  fileBufferChunkLimit: z.number().int().nonnegative(),
  requestTimeoutMs: z.number().int().positive(),
});

export type PluginTask = z.infer<typeof PluginTaskSchema>;

/**
 * Serialised task, as passed from transaction to resume and to each task.
 */
export type TaskSource = Readonly<Record<string, unknown>>;

function toConfigurationError(error: z.ZodError, what: string): ConfigurationError {
  const issues = error.issues.map((issue) => {
    const path = issue.path.join(".");
    return path ? `${path}: ${issue.message}` : issue.message;
  });
  return new ConfigurationError(`Invalid ${what}: ${issues.join("; ")}`, { cause: error });
}

/**
 * Add a scheme to endpoints written as bare host names.
 */
export function normalizeEndpoint(endpoint: string): string {
  const trimmed = endpoint.trim().replace(/\/+$/, "");
  return /^[a-z][a-z0-9+.-]*:\/\//i.test(trimmed) ? trimmed : `https://${trimmed}`;
}

/**
 * Infer the signing region from an AWS endpoint host name.
 *
 * `s3-ap-northeast-1.amazonaws.com` and `s3.eu-west-1.amazonaws.com` both
 * name their region; `s3.amazonaws.com` and third-party endpoints do not.
 */
export function inferRegion(endpoint: string): string | undefined {
  let host: string;
  try {
    host = new URL(normalizeEndpoint(endpoint)).hostname;
  } catch {
    return undefined;
  }
  const match = /^(?:.+\.)?s3[.-]([a-z]{2}(?:-[a-z]+)+-\d+)\.amazonaws\.com(?:\.cn)?$/.exec(host);
  return match ? match[1] : undefined;
}

/**
 * Validate user configuration and load it into a task.
 *
 * The per-task chunk limit starts at 0; the coordinator sets it once the
 * task count is known.
 */
export function loadConfig(raw: unknown): PluginTask {
  const parsed = OutputConfigSchema.safeParse(raw);
  if (!parsed.success) {
    throw toConfigurationError(parsed.error, "output configuration");
  }
  const config = parsed.data;
  validateKeyLayout(config.path_prefix, config.sequence_format, config.file_ext);

  let endpoint: string;
  try {
    endpoint = new URL(normalizeEndpoint(config.endpoint)).toString().replace(/\/+$/, "");
  } catch (error) {
    throw new ConfigurationError(`Invalid endpoint: ${config.endpoint}`, { cause: error });
  }

  return {
    pathPrefix: config.path_prefix,
    fileExt: config.file_ext,
    sequenceFormat: config.sequence_format,
    bucket: config.bucket,
    endpoint,
    region: config.region ?? inferRegion(endpoint) ?? DEFAULT_REGION,
    accessKeyId: config.access_key_id,
    secretAccessKey: config.secret_access_key,
    tmpPathPrefix: config.tmp_path_prefix,
    tmpDir: config.tmp_dir,
    totalFileBufferChunkLimit: config.file_buffer_chunk_limit,
    fileBufferChunkLimit: 0,
    requestTimeoutMs: config.request_timeout_ms,
  };
}

/**
 * Serialise a task for resume.
 */
export function dumpTask(task: PluginTask): TaskSource {
  const source: TaskSource = { ...task };
  return source;
}

/**
 * Load a task back from its serialised form.
 */
export function loadTask(source: TaskSource): PluginTask {
  const parsed = PluginTaskSchema.safeParse(source);
  if (!parsed.success) {
    throw toConfigurationError(parsed.error, "task source");
  }
  return parsed.data;
}

/**
 * URI-encode one path segment the way S3 canonicalises it.
 */
export function encodePathSegment(segment: string): string {
  return encodeURIComponent(segment).replace(
    /[!'()*]/g,
    (c) => `%${c.charCodeAt(0).toString(16).toUpperCase()}`
  );
}

/**
 * Build the path-style request URL for a bucket or object.
 *
 * The path is encoded once here; the signer uses it verbatim.
 *
 * @throws ConfigurationError for keys with `.` or `..` segments
 */
export function objectUrl(task: Pick<PluginTask, "endpoint">, bucket: string, key?: string): URL {
  if (key !== undefined && hasDotSegment(key)) {
    throw new ConfigurationError(`Object key must not contain '.' or '..' path segments: '${key}'`);
  }
  const base = new URL(task.endpoint);
  const basePath = base.pathname.replace(/\/+$/, "");
  const segments = [bucket, ...(key !== undefined ? key.split("/") : [])];
  return new URL(`${base.origin}${basePath}/${segments.map(encodePathSegment).join("/")}`);
}
