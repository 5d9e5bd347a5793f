/**
 * Client configuration.
 * @module config
 */

import { z } from 'zod';
import { ClientCredentialsAuth, StaticTokenAuth, type Authorization } from '../auth/authorization.js';
import { ConfigurationError } from '../errors/categories.js';
import type { Logger } from '../observability/logging.js';
import { DEFAULT_TIME_BETWEEN_CALLS_MS } from '../resilience/rate-limiter.js';
import { SERVICE_CATEGORIES, type TimeBetweenCalls } from '../resilience/types.js';

/**
 * Default request timeout in milliseconds.
 */
export const DEFAULT_TIMEOUT = 60000;

/**
 * Default User-Agent header.
 */
export const DEFAULT_USER_AGENT = 'firecrest-ts/0.1.0';

export interface FirecrestConfig {
  /** Base URL of the FirecREST API, e.g. `https://firecrest.example.org` */
  readonly baseUrl: string;
  readonly authorization: Authorization;
  /** Request timeout in milliseconds */
  readonly timeout: number;
  /** Interval for every category without its own entry in `timeBetweenCalls` */
  readonly defaultTimeBetweenCalls: number;
  readonly timeBetweenCalls: Partial<TimeBetweenCalls>;
  readonly headers: Readonly<Record<string, string>>;
  readonly userAgent: string;
  readonly fetch?: typeof fetch;
  readonly logger?: Logger;
}

const intervalSchema = z.number().finite().nonnegative();

const timeBetweenCallsShape = Object.fromEntries(
  SERVICE_CATEGORIES.map(category => [category, intervalSchema.optional()])
);

/**
 * Zod schema for the plain-data part of the configuration.
 */
const configSchema = z.object({
  baseUrl: z.string().url(),
  timeout: z.number().int().positive(),
  defaultTimeBetweenCalls: intervalSchema,
  timeBetweenCalls: z.object(timeBetweenCallsShape).strict(),
  headers: z.record(z.string()),
  userAgent: z.string().min(1),
});

export type PartialFirecrestConfig = Partial<Omit<FirecrestConfig, 'timeBetweenCalls'>> & {
  timeBetweenCalls?: Partial<TimeBetweenCalls>;
};

/**
 * Validates a configuration.
 */
export function validateConfig(config: PartialFirecrestConfig): void {
  const result = configSchema.safeParse({
    baseUrl: config.baseUrl,
    timeout: config.timeout ?? DEFAULT_TIMEOUT,
    defaultTimeBetweenCalls: config.defaultTimeBetweenCalls ?? DEFAULT_TIME_BETWEEN_CALLS_MS,
    timeBetweenCalls: config.timeBetweenCalls ?? {},
    headers: config.headers ?? {},
    userAgent: config.userAgent ?? DEFAULT_USER_AGENT,
  });
  if (!result.success) {
    const issues = result.error.issues.map(i => `${i.path.join('.')}: ${i.message}`);
    throw new ConfigurationError(`Invalid configuration: ${issues.join(', ')}`, { issues });
  }
  if (!config.authorization) {
    throw new ConfigurationError('Invalid configuration: authorization is required');
  }
}

/**
 * Fills in defaults and validates.
 */
export function resolveConfig(config: PartialFirecrestConfig): FirecrestConfig {
  validateConfig(config);
  const { baseUrl, authorization } = config;
  if (baseUrl === undefined || authorization === undefined) {
    throw new ConfigurationError('Invalid configuration: baseUrl and authorization are required');
  }
  return {
    baseUrl: baseUrl.replace(/\/+$/, ''),
    authorization,
    timeout: config.timeout ?? DEFAULT_TIMEOUT,
    defaultTimeBetweenCalls: config.defaultTimeBetweenCalls ?? DEFAULT_TIME_BETWEEN_CALLS_MS,
    timeBetweenCalls: { ...config.timeBetweenCalls },
    headers: { ...config.headers },
    userAgent: config.userAgent ?? DEFAULT_USER_AGENT,
    fetch: config.fetch,
    logger: config.logger,
  };
}

/**
 * Configuration builder.
 */
export class FirecrestConfigBuilder {
  private config: PartialFirecrestConfig = {};

  baseUrl(value: string): this {
    this.config = { ...this.config, baseUrl: value };
    return this;
  }

  authorization(value: Authorization): this {
    this.config = { ...this.config, authorization: value };
    return this;
  }

  /**
   * Uses a fixed bearer token.
   */
  token(value: string): this {
    return this.authorization(new StaticTokenAuth(value));
  }

  /**
   * Uses the OAuth2 client credentials grant against `tokenUri`.
   */
  clientCredentials(clientId: string, clientSecret: string, tokenUri: string): this {
    return this.authorization(
      new ClientCredentialsAuth({ clientId, clientSecret, tokenUri, fetch: this.config.fetch })
    );
  }

  timeout(value: number): this {
    this.config = { ...this.config, timeout: value };
    return this;
  }

  /**
   * Sets the interval of every category at once.
   */
  defaultTimeBetweenCalls(value: number): this {
    this.config = { ...this.config, defaultTimeBetweenCalls: value };
    return this;
  }

  timeBetweenCalls(value: Partial<TimeBetweenCalls>): this {
    this.config = {
      ...this.config,
      timeBetweenCalls: { ...this.config.timeBetweenCalls, ...value },
    };
    return this;
  }

  header(name: string, value: string): this {
    this.config = { ...this.config, headers: { ...this.config.headers, [name]: value } };
    return this;
  }

  userAgent(value: string): this {
    this.config = { ...this.config, userAgent: value };
    return this;
  }

  /**
   * Replaces the global fetch, for the API, the token endpoint and the staging area.
   * Set it before `clientCredentials` for the token requests to use it.
   */
  fetch(value: typeof fetch): this {
    this.config = { ...this.config, fetch: value };
    return this;
  }

  logger(value: Logger): this {
    this.config = { ...this.config, logger: value };
    return this;
  }

  /**
   * Builds and validates the configuration.
   */
  build(): FirecrestConfig {
    return resolveConfig(this.config);
  }
}

/**
 * Reads `FIRECREST_URL`, `FIRECREST_CLIENT_ID`, `FIRECREST_CLIENT_SECRET` and
 * `AUTH_TOKEN_URL`, plus the optional `FIRECREST_TIMEOUT_SECS`.
 * `fetchImpl` is used for the token requests as well as the API.
 */
export function configFromEnv(
  env: NodeJS.ProcessEnv = process.env,
  fetchImpl?: typeof fetch
): FirecrestConfigBuilder {
  const builder = new FirecrestConfigBuilder();
  if (fetchImpl) {
    builder.fetch(fetchImpl);
  }

  const url = env['FIRECREST_URL'];
  const clientId = env['FIRECREST_CLIENT_ID'];
  const clientSecret = env['FIRECREST_CLIENT_SECRET'];
  const tokenUri = env['AUTH_TOKEN_URL'];

  const missing = Object.entries({
    FIRECREST_URL: url,
    FIRECREST_CLIENT_ID: clientId,
    FIRECREST_CLIENT_SECRET: clientSecret,
    AUTH_TOKEN_URL: tokenUri,
  })
    .filter(([, value]) => !value)
    .map(([name]) => name);
  if (url === undefined || clientId === undefined || clientSecret === undefined || tokenUri === undefined || missing.length > 0) {
    throw new ConfigurationError(`Missing environment variables: ${missing.join(', ')}`, { missing });
  }

  builder.baseUrl(url).clientCredentials(clientId, clientSecret, tokenUri);

  if (env['FIRECREST_TIMEOUT_SECS']) {
    builder.timeout(parseInt(env['FIRECREST_TIMEOUT_SECS'], 10) * 1000);
  }

  return builder;
}
