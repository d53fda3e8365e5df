/**
 * Shared test fixtures: an in-process S3 stand-in and temp directories.
 */

import { mkdtempSync, readdirSync, rmSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import type { PluginTask } from '../config';
import type { HttpRequest, HttpResponse, HttpTransport } from '../transport';

export const TEST_ENDPOINT = 'http://s3.test.local';
export const TEST_BUCKET = 'test-bucket';

export function makeTmpDir(): string {
  return mkdtempSync(join(tmpdir(), 's3-file-output-test-'));
}

export function removeTmpDir(dir: string): void {
  rmSync(dir, { recursive: true, force: true });
}

export function listFiles(dir: string): string[] {
  return readdirSync(dir).sort();
}

export function makeTask(overrides: Partial<PluginTask> = {}): PluginTask {
  return {
    pathPrefix: 'logs/out',
    fileExt: '.csv',
    sequenceFormat: '.%03d.%02d',
    bucket: TEST_BUCKET,
    endpoint: TEST_ENDPOINT,
    region: 'us-east-1',
    accessKeyId: 'test-access-key',
    secretAccessKey: 'test-secret',
    tmpPathPrefix: 'chunk-',
    totalFileBufferChunkLimit: 0,
    fileBufferChunkLimit: 0,
    requestTimeoutMs: 1000,
    ...overrides,
  };
}

function response(status: number, body = '', headers: Record<string, string> = {}): HttpResponse {
  return {
    status,
    statusText: status === 200 ? 'OK' : 'Error',
    headers,
    body: Buffer.from(body),
  };
}

export function s3ErrorXml(code: string, message: string, requestId = 'req-1'): string {
  return (
    '<?xml version="1.0" encoding="UTF-8"?>' +
    `<Error><Code>${code}</Code><Message>${message}</Message><RequestId>${requestId}</RequestId></Error>`
  );
}

/**
 * Bucket held in memory. PUT stores, HEAD on the bucket answers
 * `headStatus`; queued failures are returned to the next PUTs.
 */
export class FakeS3Transport implements HttpTransport {
  readonly requests: HttpRequest[] = [];
  readonly objects = new Map<string, Buffer>();
  headStatus = 200;
  private putFailures: Array<HttpResponse | Error> = [];

  failNextPut(failure: { status: number; code: string; message: string } | Error): void {
    this.putFailures.push(
      failure instanceof Error ? failure : response(failure.status, s3ErrorXml(failure.code, failure.message))
    );
  }

  get puts(): HttpRequest[] {
    return this.requests.filter((r) => r.method === 'PUT');
  }

  /** Object keys in upload order. */
  get putKeys(): string[] {
    return this.puts.map((r) => this.keyOf(r.url));
  }

  async send(request: HttpRequest): Promise<HttpResponse> {
    this.requests.push(request);
    const url = new URL(request.url);
    const [bucket] = url.pathname.slice(1).split('/');

    if (decodeURIComponent(bucket) !== TEST_BUCKET) {
      return response(404, request.method === 'HEAD' ? '' : s3ErrorXml('NoSuchBucket', 'The specified bucket does not exist'));
    }

    if (request.method === 'HEAD') {
      return response(this.headStatus);
    }

    if (request.method === 'PUT') {
      const failure = this.putFailures.shift();
      if (failure instanceof Error) {
        throw failure;
      }
      if (failure) {
        return failure;
      }
      this.objects.set(this.keyOf(request.url), Buffer.from(request.body ?? new Uint8Array()));
      return response(200, '', { etag: '"etag-1"', 'x-amz-request-id': 'req-put' });
    }

    return response(405, s3ErrorXml('MethodNotAllowed', 'Not supported'));
  }

  private keyOf(rawUrl: string): string {
    const segments = new URL(rawUrl).pathname.slice(1).split('/');
    return segments.slice(1).map(decodeURIComponent).join('/');
  }
}
