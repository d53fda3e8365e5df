/**
 * AWS Credentials Management
 *
 * The credential strategy is picked once per uploader: explicit keys from the
 * configuration, then environment variables, then the role attached to the
 * host (container credentials endpoint or EC2 instance metadata).
 */

import { z } from "zod";
import { CredentialsError } from "../error";
import type { PluginTask } from "../config";

/**
 * AWS credentials.
 */
export interface AwsCredentials {
  accessKeyId: string;
  secretAccessKey: string;
  sessionToken?: string;
  expiration?: Date;
}

/**
 * Where credentials come from.
 */
export type CredentialSource =
  | { readonly kind: "explicit"; readonly accessKeyId: string; readonly secretAccessKey: string }
  | { readonly kind: "environment" }
  | { readonly kind: "ambient-role" };

export type Environment = Readonly<Record<string, string | undefined>>;

/**
 * Select the credential strategy for a task.
 */
export function resolveCredentialSource(
  task: Pick<PluginTask, "accessKeyId" | "secretAccessKey">,
  env: Environment = process.env
): CredentialSource {
  if (task.accessKeyId !== undefined && task.secretAccessKey !== undefined) {
    return {
      kind: "explicit",
      accessKeyId: task.accessKeyId,
      secretAccessKey: task.secretAccessKey,
    };
  }
  if (env.AWS_ACCESS_KEY_ID && env.AWS_SECRET_ACCESS_KEY) {
    return { kind: "environment" };
  }
  return { kind: "ambient-role" };
}

/**
 * Check if credentials are expired.
 */
export function isExpired(credentials: AwsCredentials): boolean {
  if (!credentials.expiration) {
    return false;
  }
  return new Date() >= credentials.expiration;
}

/**
 * Check if credentials will expire within the given milliseconds.
 */
export function willExpireWithin(credentials: AwsCredentials, ms: number): boolean {
  if (!credentials.expiration) {
    return false;
  }
  return new Date(Date.now() + ms) >= credentials.expiration;
}

/**
 * Credentials provider interface.
 */
export interface CredentialsProvider {
  getCredentials(): Promise<AwsCredentials>;

  /**
   * Provider name for log lines and error messages.
   */
  readonly name: string;
}

/**
 * Static credentials provider for explicit configuration.
 */
export class StaticCredentialsProvider implements CredentialsProvider {
  readonly name = "static";
  private credentials: AwsCredentials;

  constructor(credentials: AwsCredentials) {
    this.credentials = credentials;
  }

  async getCredentials(): Promise<AwsCredentials> {
    if (isExpired(this.credentials)) {
      throw new CredentialsError(
        `Credentials expired at ${this.credentials.expiration?.toISOString()}`,
        "Expired"
      );
    }
    return this.credentials;
  }
}

/**
 * Environment variables credentials provider.
 */
export class EnvCredentialsProvider implements CredentialsProvider {
  readonly name = "environment";
  private env: Environment;

  constructor(env: Environment = process.env) {
    this.env = env;
  }

  async getCredentials(): Promise<AwsCredentials> {
    const accessKeyId = this.env.AWS_ACCESS_KEY_ID;
    const secretAccessKey = this.env.AWS_SECRET_ACCESS_KEY;

    if (!accessKeyId || !secretAccessKey) {
      throw new CredentialsError(
        "AWS_ACCESS_KEY_ID and AWS_SECRET_ACCESS_KEY must be set",
        "NotFound"
      );
    }

    return {
      accessKeyId,
      secretAccessKey,
      sessionToken: this.env.AWS_SESSION_TOKEN || undefined,
    };
  }
}

/**
 * Instance role configuration.
 */
export interface InstanceRoleConfig {
  imdsEndpoint?: string;
  containerEndpoint?: string;
  timeout?: number;
  retries?: number;
  tokenTtlSeconds?: number;
}

const RoleCredentialsSchema = z.object({
  AccessKeyId: z.string().min(1),
  SecretAccessKey: z.string().min(1),
  Token: z.string().optional(),
  Expiration: z.string().optional(),
});

/**
 * Role credentials of the execution host: the container credentials
 * endpoint when the container variables are set, the EC2 instance metadata
 * service otherwise (IMDSv2 token, falling back to v1).
 */
export class InstanceRoleCredentialsProvider implements CredentialsProvider {
  readonly name = "ambient-role";
  private config: Required<InstanceRoleConfig>;
  private env: Environment;
  private cachedCredentials?: AwsCredentials;

  constructor(config?: InstanceRoleConfig, env: Environment = process.env) {
    this.config = {
      imdsEndpoint: config?.imdsEndpoint ?? "http://169.254.169.254",
      containerEndpoint: config?.containerEndpoint ?? "http://169.254.170.2",
      timeout: config?.timeout ?? 1000,
      retries: config?.retries ?? 3,
      tokenTtlSeconds: config?.tokenTtlSeconds ?? 21600,
    };
    this.env = env;
  }

  async getCredentials(): Promise<AwsCredentials> {
    if (this.cachedCredentials && !willExpireWithin(this.cachedCredentials, 5 * 60 * 1000)) {
      return this.cachedCredentials;
    }

    const credentials = this.containerCredentialsUrl() !== undefined
      ? await this.fetchContainerCredentials()
      : await this.fetchInstanceCredentials();
    this.cachedCredentials = credentials;
    return credentials;
  }

  private containerCredentialsUrl(): string | undefined {
    const relative = this.env.AWS_CONTAINER_CREDENTIALS_RELATIVE_URI;
    if (relative) {
      return `${this.config.containerEndpoint}${relative}`;
    }
    return this.env.AWS_CONTAINER_CREDENTIALS_FULL_URI || undefined;
  }

  private async fetchContainerCredentials(): Promise<AwsCredentials> {
    const url = this.containerCredentialsUrl();
    if (url === undefined) {
      throw new CredentialsError("Container credentials URI not found", "InstanceMetadata");
    }
    const token = this.env.AWS_CONTAINER_AUTHORIZATION_TOKEN;
    const body = await this.fetchWithRetry(url, token ? { Authorization: token } : undefined);
    return parseCredentialsResponse(body);
  }

  private async fetchInstanceCredentials(): Promise<AwsCredentials> {
    let token: string | undefined;
    try {
      token = await this.getImdsToken();
    } catch {
      // IMDSv1 hosts reject the token request; continue without a token.
      token = undefined;
    }
    const headers = token ? { "X-aws-ec2-metadata-token": token } : undefined;

    const roleUrl = `${this.config.imdsEndpoint}/latest/meta-data/iam/security-credentials/`;
    const roleName = (await this.fetchWithRetry(roleUrl, headers)).trim().split("\n")[0];
    if (!roleName) {
      throw new CredentialsError("No IAM role attached to this host", "InstanceMetadata");
    }

    const body = await this.fetchWithRetry(`${roleUrl}${roleName}`, headers);
    return parseCredentialsResponse(body);
  }

  private async getImdsToken(): Promise<string> {
    const response = await fetch(`${this.config.imdsEndpoint}/latest/api/token`, {
      method: "PUT",
      headers: {
        "X-aws-ec2-metadata-token-ttl-seconds": String(this.config.tokenTtlSeconds),
      },
      signal: AbortSignal.timeout(this.config.timeout),
    });

    if (!response.ok) {
      throw new CredentialsError(
        `Failed to get instance metadata token: ${response.status}`,
        "InstanceMetadata"
      );
    }
    return response.text();
  }

  private async fetchWithRetry(url: string, headers?: Record<string, string>): Promise<string> {
    let lastError: unknown;

    for (let attempt = 0; attempt <= this.config.retries; attempt++) {
      try {
        const response = await fetch(url, {
          headers,
          signal: AbortSignal.timeout(this.config.timeout),
        });
        if (!response.ok) {
          throw new CredentialsError(
            `Instance metadata request failed: ${response.status}`,
            "InstanceMetadata"
          );
        }
        return await response.text();
      } catch (error) {
        lastError = error;
        if (attempt < this.config.retries) {
          await new Promise((resolve) => setTimeout(resolve, 100 * Math.pow(2, attempt)));
        }
      }
    }

    throw new CredentialsError(
      `Instance metadata request failed after ${this.config.retries + 1} attempts`,
      "InstanceMetadata",
      { cause: lastError }
    );
  }
}

function parseCredentialsResponse(body: string): AwsCredentials {
  let raw: unknown;
  try {
    raw = JSON.parse(body);
  } catch (error) {
    throw new CredentialsError("Role credentials response is not JSON", "Invalid", { cause: error });
  }
  const parsed = RoleCredentialsSchema.safeParse(raw);
  if (!parsed.success) {
    throw new CredentialsError("Role credentials response is incomplete", "Invalid", {
      cause: parsed.error,
    });
  }
  const json = parsed.data;
  return {
    accessKeyId: json.AccessKeyId,
    secretAccessKey: json.SecretAccessKey,
    sessionToken: json.Token,
    expiration: json.Expiration ? new Date(json.Expiration) : undefined,
  };
}

/**
 * Provider for a resolved credential source.
 */
export function createCredentialsProvider(
  source: CredentialSource,
  env: Environment = process.env
): CredentialsProvider {
  switch (source.kind) {
    case "explicit":
      return new StaticCredentialsProvider({
        accessKeyId: source.accessKeyId,
        secretAccessKey: source.secretAccessKey,
      });
    case "environment":
      return new EnvCredentialsProvider(env);
    case "ambient-role":
      return new InstanceRoleCredentialsProvider(undefined, env);
  }
}
