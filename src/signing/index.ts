/**
 * AWS Signature V4
 *
 * Header-based request signing for the S3 requests this output sends
 * (HEAD bucket, PUT object).
 */

import * as crypto from "crypto";
import { AwsCredentials } from "../credentials";

const ALGORITHM = "AWS4-HMAC-SHA256";

/**
 * Signed request headers.
 */
export interface SignedRequest {
  url: URL;
  headers: Record<string, string>;
  timestamp: Date;
}

/**
 * AWS Signature V4 signer bound to one set of credentials and a region.
 */
export class AwsSignerV4 {
  private credentials: AwsCredentials;
  private region: string;
  private service: string;

  constructor(credentials: AwsCredentials, region: string, service: string = "s3") {
    this.credentials = credentials;
    this.region = region;
    this.service = service;
  }

  /**
   * Sign a request. The URL path must already be URI-encoded.
   */
  sign(
    method: string,
    url: URL,
    headers: Record<string, string>,
    body?: Uint8Array | string,
    timestamp: Date = new Date()
  ): SignedRequest {
    const date = formatDate(timestamp);
    const dateTime = formatDateTime(timestamp);
    const scope = `${date}/${this.region}/${this.service}/aws4_request`;

    const signedHeaders: Record<string, string> = {};
    for (const [name, value] of Object.entries(headers)) {
      signedHeaders[name.toLowerCase()] = value;
    }
    signedHeaders["host"] = url.host;
    signedHeaders["x-amz-date"] = dateTime;
    signedHeaders["x-amz-content-sha256"] = sha256Hex(body ?? "");
    if (this.credentials.sessionToken) {
      signedHeaders["x-amz-security-token"] = this.credentials.sessionToken;
    }

    const names = Object.keys(signedHeaders).sort();
    const canonicalRequest = [
      method.toUpperCase(),
      url.pathname || "/",
      canonicalQuery(url.searchParams),
      names.map((name) => `${name}:${signedHeaders[name].trim()}`).join("\n") + "\n",
      names.join(";"),
      signedHeaders["x-amz-content-sha256"],
    ].join("\n");

    const stringToSign = [ALGORITHM, dateTime, scope, sha256Hex(canonicalRequest)].join("\n");

    const signingKey = [date, this.region, this.service, "aws4_request"].reduce<Buffer | string>(
      (key, part) => hmac(key, part),
      `AWS4${this.credentials.secretAccessKey}`
    );
    const signature = hmac(signingKey, stringToSign).toString("hex");

    signedHeaders["authorization"] =
      `${ALGORITHM} Credential=${this.credentials.accessKeyId}/${scope}, ` +
      `SignedHeaders=${names.join(";")}, Signature=${signature}`;

    return { url, headers: signedHeaders, timestamp };
  }
}

function canonicalQuery(params: URLSearchParams): string {
  return Array.from(params.entries())
    .map(([k, v]) => [encodeRfc3986(k), encodeRfc3986(v)])
    .sort((a, b) => (a[0] === b[0] ? (a[1] < b[1] ? -1 : 1) : a[0] < b[0] ? -1 : 1))
    .map(([k, v]) => `${k}=${v}`)
    .join("&");
}

function encodeRfc3986(str: string): string {
  return encodeURIComponent(str).replace(
    /[!'()*]/g,
    (c) => `%${c.charCodeAt(0).toString(16).toUpperCase()}`
  );
}

function sha256Hex(data: Uint8Array | string): string {
  return crypto.createHash("sha256").update(data).digest("hex");
}

function hmac(key: Buffer | string, data: string): Buffer {
  return crypto.createHmac("sha256", key).update(data).digest();
}

/**
 * YYYYMMDD
 */
function formatDate(date: Date): string {
  return date.toISOString().slice(0, 10).replace(/-/g, "");
}

/**
 * YYYYMMDDTHHMMSSZ
 */
function formatDateTime(date: Date): string {
  return date.toISOString().replace(/[:-]/g, "").split(".")[0] + "Z";
}
