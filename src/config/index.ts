/**
 * Transfer client configuration and builder.
 *
 * Credentials are always passed in explicitly (or read from the environment
 * through {@link TransferConfigBuilder.fromEnv}); there is no process-wide
 * fallback.
 */

import { z } from 'zod';
import { ConfigurationError, NoCredentialsError } from '../errors/index.js';

// ============================================================================
// Retry Configuration
// ============================================================================

/**
 * Retry configuration.
 */
export interface RetryConfig {
  /** Maximum retry attempts after the first one. Default: 10 */
  maxRetries: number;
  /** Stop retrying once this much time has passed since the first attempt (ms). Default: 900000 */
  maxElapsedMs: number;
  /** Initial backoff delay (ms). Default: 500 */
  initialBackoffMs: number;
  /** Maximum backoff delay (ms). Default: 60000 */
  maxBackoffMs: number;
  /** Backoff multiplier. Default: 1.5 */
  backoffMultiplier: number;
  /** Jitter factor (0-1). Default: 0.5 */
  jitterFactor: number;
}

// ============================================================================
// Credentials
// ============================================================================

/**
 * SecretString wrapper to prevent accidental logging of sensitive values.
 * The value is only accessible via the expose() method.
 */
export class SecretString {
  private readonly value: string;

  constructor(value: string) {
    this.value = value;
  }

  /**
   * Exposes the secret value. Use with caution.
   */
  expose(): string {
    return this.value;
  }

  toString(): string {
    return '[REDACTED]';
  }

  toJSON(): string {
    return '[REDACTED]';
  }
}

/**
 * Basic authentication credentials.
 */
export interface Credentials {
  /** Account name */
  username: string;
  /** API token */
  token: SecretString;
}

// ============================================================================
// Main Configuration Interface
// ============================================================================

/**
 * Transfer client configuration.
 */
export interface TransferConfig {
  /** Service base URL, without trailing slash */
  baseUrl: string;
  /** Basic authentication credentials */
  credentials: Credentials;
  /** Per-attempt request timeout in milliseconds. Default: 30000 */
  requestTimeoutMs: number;
  /** Maximum chunks in flight at once. Default: 8 */
  concurrency: number;
  /** Fixed chunk size in bytes; when unset the planner picks one from the file size */
  chunkSize?: number;
  /** Retry configuration */
  retryConfig: RetryConfig;
  /** User agent string */
  userAgent: string;
}

// ============================================================================
// Defaults
// ============================================================================

/**
 * Default retry configuration.
 */
export const DEFAULT_RETRY_CONFIG: RetryConfig = {
  maxRetries: 10,
  maxElapsedMs: 15 * 60 * 1000,
  initialBackoffMs: 500,
  maxBackoffMs: 60000,
  backoffMultiplier: 1.5,
  jitterFactor: 0.5,
};

export const DEFAULT_BASE_URL = 'https://transfer.atlassian.com';

export const DEFAULT_REQUEST_TIMEOUT_MS = 30000;

export const DEFAULT_CONCURRENCY = 8;

export const DEFAULT_USER_AGENT = 'chunked-transfer/0.1.0';

// ============================================================================
// Validation
// ============================================================================

const RetryConfigSchema = z
  .object({
    maxRetries: z.number().int().min(0),
    maxElapsedMs: z.number().int().min(0),
    initialBackoffMs: z.number().min(0),
    maxBackoffMs: z.number().min(0),
    backoffMultiplier: z.number().min(1),
    jitterFactor: z.number().min(0).max(1),
  })
  .refine((config) => config.maxBackoffMs >= config.initialBackoffMs, {
    message: 'maxBackoffMs must be greater than or equal to initialBackoffMs',
  });

const TransferConfigSchema = z.object({
  baseUrl: z
    .string()
    .url()
    .refine((url) => /^https?:\/\//.test(url), { message: 'baseUrl must use HTTP or HTTPS' }),
  username: z.string().min(1),
  token: z.string().min(1),
  requestTimeoutMs: z.number().int().positive(),
  concurrency: z.number().int().min(1).max(64),
  chunkSize: z.number().int().positive().optional(),
  retryConfig: RetryConfigSchema,
  userAgent: z.string().min(1),
});

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}

/**
 * Validates a configuration object.
 * @throws NoCredentialsError if the user or token is empty
 * @throws ConfigurationError for any other invalid field
 */
export function validateConfig(config: TransferConfig): void {
  if (!config.credentials.username || !config.credentials.token.expose()) {
    throw new NoCredentialsError();
  }

  const result = TransferConfigSchema.safeParse({
    baseUrl: config.baseUrl,
    username: config.credentials.username,
    token: config.credentials.token.expose(),
    requestTimeoutMs: config.requestTimeoutMs,
    concurrency: config.concurrency,
    chunkSize: config.chunkSize,
    retryConfig: config.retryConfig,
    userAgent: config.userAgent,
  });

  if (!result.success) {
    throw new ConfigurationError(describeIssues(result.error), {
      issues: result.error.issues,
    });
  }
}

// ============================================================================
// Configuration Builder
// ============================================================================

/**
 * Builder for transfer client configuration.
 */
export class TransferConfigBuilder {
  private baseUrl: string = DEFAULT_BASE_URL;
  private username?: string;
  private token?: string;
  private requestTimeoutMs: number = DEFAULT_REQUEST_TIMEOUT_MS;
  private concurrency: number = DEFAULT_CONCURRENCY;
  private chunkSize?: number;
  private retryConfig: RetryConfig = { ...DEFAULT_RETRY_CONFIG };
  private userAgent: string = DEFAULT_USER_AGENT;

  /**
   * Sets the service base URL (e.g. "https://api.example.com").
   */
  withBaseUrl(url: string): this {
    if (!url || url.trim().length === 0) {
      throw new ConfigurationError('Base URL cannot be empty');
    }
    this.baseUrl = url.trim().replace(/\/+$/, '');
    return this;
  }

  /**
   * Sets the basic authentication credentials.
   */
  withCredentials(username: string, token: string): this {
    this.username = username.trim();
    this.token = token.trim();
    return this;
  }

  /**
   * Sets the per-attempt request timeout.
   */
  withRequestTimeout(timeoutMs: number): this {
    if (timeoutMs <= 0) {
      throw new ConfigurationError('Request timeout must be positive');
    }
    this.requestTimeoutMs = timeoutMs;
    return this;
  }

  /**
   * Sets the number of chunks processed concurrently.
   */
  withConcurrency(concurrency: number): this {
    this.concurrency = concurrency;
    return this;
  }

  /**
   * Forces a chunk size instead of the size-based tiers.
   */
  withChunkSize(chunkSize: number): this {
    this.chunkSize = chunkSize;
    return this;
  }

  /**
   * Sets the retry configuration.
   */
  withRetryConfig(config: Partial<RetryConfig>): this {
    this.retryConfig = { ...this.retryConfig, ...config };
    return this;
  }

  /**
   * Sets the user agent string.
   */
  withUserAgent(userAgent: string): this {
    this.userAgent = userAgent;
    return this;
  }

  /**
   * Creates a builder from environment variables.
   *
   * Environment variables:
   * - TRANSFER_BASE_URL: Service base URL
   * - TRANSFER_USER: Account name
   * - TRANSFER_TOKEN: API token
   * - TRANSFER_TIMEOUT_SECONDS: Request timeout in seconds
   * - TRANSFER_CONCURRENCY: Chunks in flight at once
   * - TRANSFER_CHUNK_SIZE_BYTES: Fixed chunk size
   * - TRANSFER_MAX_RETRIES: Maximum retry attempts
   */
  static fromEnv(env: NodeJS.ProcessEnv = process.env): TransferConfigBuilder {
    const builder = new TransferConfigBuilder();

    const baseUrl = env.TRANSFER_BASE_URL;
    if (baseUrl) {
      builder.withBaseUrl(baseUrl);
    }

    const user = env.TRANSFER_USER;
    const token = env.TRANSFER_TOKEN;
    if (user && token) {
      builder.withCredentials(user, token);
    }

    const timeout = env.TRANSFER_TIMEOUT_SECONDS;
    if (timeout) {
      builder.withRequestTimeout(parseInt(timeout, 10) * 1000);
    }

    const concurrency = env.TRANSFER_CONCURRENCY;
    if (concurrency) {
      builder.withConcurrency(parseInt(concurrency, 10));
    }

    const chunkSize = env.TRANSFER_CHUNK_SIZE_BYTES;
    if (chunkSize) {
      builder.withChunkSize(parseInt(chunkSize, 10));
    }

    const maxRetries = env.TRANSFER_MAX_RETRIES;
    if (maxRetries) {
      builder.withRetryConfig({ maxRetries: parseInt(maxRetries, 10) });
    }

    return builder;
  }

  /**
   * Builds the transfer configuration.
   * @throws NoCredentialsError if credentials are missing
   * @throws ConfigurationError if any field is invalid
   */
  build(): TransferConfig {
    if (!this.username || !this.token) {
      throw new NoCredentialsError();
    }

    const config: TransferConfig = {
      baseUrl: this.baseUrl,
      credentials: {
        username: this.username,
        token: new SecretString(this.token),
      },
      requestTimeoutMs: this.requestTimeoutMs,
      concurrency: this.concurrency,
      chunkSize: this.chunkSize,
      retryConfig: { ...this.retryConfig },
      userAgent: this.userAgent,
    };

    validateConfig(config);
    return config;
  }
}
