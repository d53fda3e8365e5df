/**
 * HTTP Transport
 *
 * The uploader only ever sends two requests: HEAD on the bucket and PUT of
 * a whole object. Tests swap in an in-process transport through the same
 * interface.
 */

import { NetworkError } from "../error";

export type HttpMethod = "HEAD" | "PUT";

/**
 * A signed request, ready to send.
 */
export interface HttpRequest {
  method: HttpMethod;
  /** Fully encoded URL; transports must not re-encode it. */
  url: string;
  headers: Record<string, string>;
  body?: Uint8Array;
  /** Overrides the transport's timeout, in milliseconds. */
  timeout?: number;
}

/**
 * Response with lower-case header names and the whole body read.
 */
export interface HttpResponse {
  status: number;
  statusText: string;
  headers: Record<string, string>;
  body: Buffer;
}

export interface HttpTransport {
  send(request: HttpRequest): Promise<HttpResponse>;
}

export function isSuccess(response: HttpResponse): boolean {
  return response.status >= 200 && response.status < 300;
}

export function getHeader(response: HttpResponse, name: string): string | undefined {
  return response.headers[name.toLowerCase()];
}

export function getRequestId(response: HttpResponse): string | undefined {
  return getHeader(response, "x-amz-request-id");
}

/**
 * Transport over the global `fetch`.
 *
 * Failures to reach the endpoint surface as `NetworkError`; HTTP error
 * statuses are returned as responses.
 */
export class FetchTransport implements HttpTransport {
  private readonly timeout: number;

  constructor(timeout: number = 30000) {
    this.timeout = timeout;
  }

  async send(request: HttpRequest): Promise<HttpResponse> {
    const timeout = request.timeout ?? this.timeout;

    let response: Response;
    let body: Buffer;
    try {
      response = await fetch(request.url, {
        method: request.method,
        headers: request.headers,
        body: request.body,
        signal: AbortSignal.timeout(timeout),
      });
      body = Buffer.from(await response.arrayBuffer());
    } catch (error) {
      throw toNetworkError(error, request, timeout);
    }

    const headers: Record<string, string> = {};
    response.headers.forEach((value, name) => {
      headers[name.toLowerCase()] = value;
    });

    return { status: response.status, statusText: response.statusText, headers, body };
  }
}

function toNetworkError(error: unknown, request: HttpRequest, timeout: number): NetworkError {
  const target = `${request.method} ${request.url}`;
  if (!(error instanceof Error)) {
    return new NetworkError(`${target} failed: ${String(error)}`, "ConnectionFailed");
  }
  if (error.name === "AbortError" || error.name === "TimeoutError") {
    return new NetworkError(`${target} timed out after ${timeout}ms`, "Timeout", { cause: error });
  }
  const detail = error.cause instanceof Error ? `${error.message}: ${error.cause.message}` : error.message;
  if (detail.includes("ENOTFOUND") || detail.includes("EAI_AGAIN")) {
    return new NetworkError(`${target}: DNS resolution failed: ${detail}`, "DnsResolutionFailed", {
      cause: error,
    });
  }
  return new NetworkError(`${target}: connection failed: ${detail}`, "ConnectionFailed", { cause: error });
}
