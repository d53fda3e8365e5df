/**
 * Uploader
 *
 * Puts finished chunk files into the bucket. One instance per task; it holds
 * the signer and transport and nothing else.
 */

import { readFile } from "fs/promises";
import { objectUrl, type PluginTask } from "../config";
import {
  createCredentialsProvider,
  resolveCredentialSource,
  type CredentialSource,
  type CredentialsProvider,
  type Environment,
} from "../credentials";
import {
  AuthenticationError,
  IOFailure,
  S3ServiceError,
  UploadFailure,
  codeForStatus,
  describeError,
  type S3ErrorResponse,
} from "../error";
import { ConsoleLogger, type Logger } from "../observability/logging";
import { AwsSignerV4, type SignedRequest } from "../signing";
import {
  FetchTransport,
  getHeader,
  getRequestId,
  isSuccess,
  type HttpMethod,
  type HttpResponse,
  type HttpTransport,
} from "../transport";

/**
 * Uploader construction options.
 */
export interface UploaderOptions {
  transport?: HttpTransport;
  logger?: Logger;
  /** Environment consulted for credentials; defaults to `process.env`. */
  env?: Environment;
  /** Overrides the provider picked from the credential source. */
  credentialsProvider?: CredentialsProvider;
}

/**
 * Result of one upload.
 */
export interface UploadResult {
  key: string;
  bytes: number;
  eTag?: string;
  requestId?: string;
}

function extractElement(xml: string, tag: string): string | undefined {
  const match = new RegExp(`<${tag}>([^<]*)</${tag}>`).exec(xml);
  return match ? match[1].trim() : undefined;
}

/**
 * Parse an S3 error response, falling back to the status code for
 * bodiless responses.
 */
export function parseErrorResponse(response: HttpResponse): S3ErrorResponse {
  const xml = response.body.toString("utf-8");
  return {
    code: extractElement(xml, "Code") ?? codeForStatus(response.status),
    message: extractElement(xml, "Message") ?? `HTTP ${response.status} ${response.statusText}`.trim(),
    bucket: extractElement(xml, "BucketName"),
    key: extractElement(xml, "Key"),
    requestId: extractElement(xml, "RequestId") ?? getRequestId(response),
  };
}

export class Uploader {
  readonly bucket: string;
  readonly credentialSource: CredentialSource;
  private task: PluginTask;
  private transport: HttpTransport;
  private credentials: CredentialsProvider;
  protected logger: Logger;

  private constructor(
    task: PluginTask,
    credentialSource: CredentialSource,
    credentials: CredentialsProvider,
    transport: HttpTransport,
    logger: Logger
  ) {
    this.task = task;
    this.bucket = task.bucket;
    this.credentialSource = credentialSource;
    this.credentials = credentials;
    this.transport = transport;
    this.logger = logger;
  }

  /**
   * Resolve credentials and check bucket access once.
   *
   * @throws AuthenticationError when credentials cannot be obtained or the
   *   bucket rejects them
   */
  static async create(task: PluginTask, options: UploaderOptions = {}): Promise<Uploader> {
    const logger = options.logger ?? new ConsoleLogger();
    const transport = options.transport ?? new FetchTransport(task.requestTimeoutMs);
    const source = resolveCredentialSource(task, options.env);

    const provider = options.credentialsProvider ?? createCredentialsProvider(source, options.env);
    const uploader = new Uploader(task, source, provider, transport, logger);
    try {
      await uploader.checkAccess();
    } catch (error) {
      throw new AuthenticationError(
        `Can't call S3 API (${describeError(error)}). Please check your access_key_id / ` +
          `secret_access_key, endpoint and bucket configuration.`,
        { bucket: task.bucket, cause: error }
      );
    }

    logger.debug("S3 client ready", {
      bucket: task.bucket,
      endpoint: task.endpoint,
      region: task.region,
      credentials: source.kind,
    });
    return uploader;
  }

  /**
   * Sign with the provider's current credentials. Providers cache them and
   * refresh temporary ones before they expire.
   */
  private async sign(
    method: HttpMethod,
    url: URL,
    headers: Record<string, string>,
    body?: Uint8Array
  ): Promise<SignedRequest> {
    const credentials = await this.credentials.getCredentials();
    return new AwsSignerV4(credentials, this.task.region, "s3").sign(method, url, headers, body);
  }

  private async checkAccess(): Promise<void> {
    const signed = await this.sign("HEAD", objectUrl(this.task, this.bucket), {});
    const response = await this.transport.send({
      method: "HEAD",
      url: signed.url.toString(),
      headers: signed.headers,
    });
    if (!isSuccess(response)) {
      throw new S3ServiceError(response.status, parseErrorResponse(response));
    }
  }

  /**
   * Upload a local file to `bucket/key`, replacing any existing object.
   *
   * Not retried here; a resumed task recomputes the same key.
   */
  async upload(localPath: string, key: string): Promise<UploadResult> {
    let body: Buffer;
    try {
      body = await readFile(localPath);
    } catch (error) {
      throw new IOFailure(`Failed to read ${localPath} for upload`, "Read", {
        path: localPath,
        cause: error,
      });
    }

    const url = objectUrl(this.task, this.bucket, key);

    let response: HttpResponse;
    try {
      const signed = await this.sign("PUT", url, { "content-length": String(body.length) }, body);
      response = await this.transport.send({
        method: "PUT",
        url: signed.url.toString(),
        headers: signed.headers,
        body,
      });
    } catch (error) {
      throw new UploadFailure(`Failed to upload s3://${this.bucket}/${key}: ${describeError(error)}`, key, {
        cause: error,
      });
    }

    if (!isSuccess(response)) {
      const detail = parseErrorResponse(response);
      throw new UploadFailure(
        `Failed to upload s3://${this.bucket}/${key}: ${detail.code}: ${detail.message}`,
        key,
        {
          s3Code: detail.code,
          requestId: detail.requestId,
          cause: new S3ServiceError(response.status, detail),
        }
      );
    }

    return {
      key,
      bytes: body.length,
      eTag: getHeader(response, "etag"),
      requestId: getRequestId(response),
    };
  }
}
