import { z } from 'zod';
import { ConfigurationError, RequestFailureError, UnauthorizedError } from '../errors/categories.js';

/**
 * Anything that can produce a currently valid bearer token.
 * The transport asks for a token once per outgoing request.
 */
export interface Authorization {
  getAccessToken(): Promise<string>;
}

/**
 * Authorization with a fixed token, for tokens obtained elsewhere
 */
export class StaticTokenAuth implements Authorization {
  constructor(private readonly token: string) {
    if (token.trim().length === 0) {
      throw new ConfigurationError('Access token cannot be empty or whitespace');
    }
  }

  async getAccessToken(): Promise<string> {
    return this.token;
  }
}

const tokenResponseSchema = z.object({
  access_token: z.string().min(1),
  expires_in: z.number().nonnegative(),
  token_type: z.string().optional(),
});

export interface ClientCredentialsOptions {
  clientId: string;
  clientSecret: string;
  /** Token endpoint of the authorization server */
  tokenUri: string;
  /** A cached token is refreshed once it has less than this many seconds left */
  refreshThresholdSeconds?: number;
  fetch?: typeof fetch;
}

/**
 * OAuth2 client credentials grant with an in-memory token cache
 */
export class ClientCredentialsAuth implements Authorization {
  private readonly fetchImpl: typeof fetch;
  private readonly refreshThresholdMs: number;
  private accessToken?: string;
  private expiresAt?: number;
  private pending?: Promise<string>;

  constructor(private readonly options: ClientCredentialsOptions) {
    if (!options.clientId || !options.clientSecret) {
      throw new ConfigurationError('Client credentials flow requires client_id and client_secret');
    }
    this.fetchImpl = options.fetch ?? globalThis.fetch;
    this.refreshThresholdMs = (options.refreshThresholdSeconds ?? 10) * 1000;
  }

  async getAccessToken(): Promise<string> {
    if (this.accessToken && this.expiresAt !== undefined && Date.now() <= this.expiresAt - this.refreshThresholdMs) {
      return this.accessToken;
    }

    // concurrent callers share one token request
    if (!this.pending) {
      this.pending = this.requestToken().finally(() => {
        this.pending = undefined;
      });
    }
    return this.pending;
  }

  clearCache(): void {
    this.accessToken = undefined;
    this.expiresAt = undefined;
  }

  private async requestToken(): Promise<string> {
    const body = new URLSearchParams();
    body.set('grant_type', 'client_credentials');
    body.set('client_id', this.options.clientId);
    body.set('client_secret', this.options.clientSecret);

    let response: Response;
    try {
      response = await this.fetchImpl(this.options.tokenUri, {
        method: 'POST',
        headers: { 'content-type': 'application/x-www-form-urlencoded' },
        body: body.toString(),
      });
    } catch (error) {
      throw new RequestFailureError(`Token request to ${this.options.tokenUri} failed`, { cause: error });
    }

    const text = await response.text();
    if (response.status === 401) {
      throw new UnauthorizedError(`Token request to ${this.options.tokenUri} was rejected`, text);
    }
    if (!response.ok) {
      throw new RequestFailureError(
        `Request to ${this.options.tokenUri} failed with status code ${response.status}`,
        { status: response.status, responseBody: text }
      );
    }

    let json: unknown;
    try {
      json = JSON.parse(text);
    } catch (error) {
      throw new RequestFailureError('Token response is not valid JSON', {
        status: response.status,
        responseBody: text,
        cause: error,
      });
    }

    const parsed = tokenResponseSchema.safeParse(json);
    if (!parsed.success) {
      throw new RequestFailureError('Token response is missing access_token or expires_in', {
        status: response.status,
        responseBody: json,
      });
    }

    this.accessToken = parsed.data.access_token;
    this.expiresAt = Date.now() + parsed.data.expires_in * 1000;
    return this.accessToken;
  }
}
