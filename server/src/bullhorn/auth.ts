import { z } from 'zod';
import type { Logger } from 'pino';
import type { BullhornCredentials } from '../lib/config.js';
import { HttpError } from '../lib/errors.js';
import { withRetry } from '../lib/retry.js';

const TokenResponseSchema = z.object({
  access_token: z.string().min(1),
  refresh_token: z.string().optional(),
  expires_in: z.number().optional(),
});

const LoginResponseSchema = z.object({
  BhRestToken: z.string().min(1),
  restUrl: z.string().url(),
});

export interface BullhornSession {
  restToken: string;
  /** REST root for entity calls; always ends with a slash. */
  restUrl: string;
}

export interface BullhornAuthOptions {
  fetch?: typeof fetch;
  log?: Logger;
  now?: () => Date;
  retry?: { maxAttempts?: number; baseDelay?: number };
}

function withQuery(base: string, path: string, params: Record<string, string>): string {
  const url = new URL(`${base.replace(/\/+$/, '')}/${path}`);
  for (const [key, value] of Object.entries(params)) {
    url.searchParams.set(key, value);
  }
  return url.toString();
}

function ensureTrailingSlash(url: string): string {
  return url.endsWith('/') ? url : `${url}/`;
}

async function readJson(response: Response): Promise<unknown> {
  if (!response.ok) {
    throw new HttpError(response, await response.text());
  }
  return response.json();
}

/**
 * OAuth login against the candidate store: authorization code, then access
 * token, then a REST session token.
 */
export class BullhornAuthClient {
  private readonly credentials: BullhornCredentials;
  private readonly fetchImpl: typeof fetch;
  private readonly log?: Logger;
  private readonly now: () => Date;
  private readonly retry: { maxAttempts?: number; baseDelay?: number };

  refreshToken: string | null = null;
  refreshTokenExpiresAt: Date | null = null;

  constructor(credentials: BullhornCredentials, options: BullhornAuthOptions = {}) {
    this.credentials = credentials;
    this.fetchImpl = options.fetch ?? fetch;
    this.log = options.log;
    this.now = options.now ?? (() => new Date());
    this.retry = options.retry ?? {};
  }

  async requestAuthorizationCode(): Promise<string> {
    const url = withQuery(this.credentials.authUrl, 'authorize', {
      client_id: this.credentials.clientId,
      response_type: 'code',
      username: this.credentials.username,
      password: this.credentials.password,
      action: 'Login',
    });

    const response = await this.fetchImpl(url, { method: 'GET', redirect: 'manual' });
    if (response.status >= 400) {
      throw new HttpError(response, await response.text());
    }

    const target = response.headers.get('location') ?? response.url;
    const code = target ? new URL(target, this.credentials.authUrl).searchParams.get('code') : null;
    if (!code) {
      this.log?.error({ status: response.status }, 'Authorization code not found in redirect');
      throw new Error('Authorization code not found in redirect');
    }
    this.log?.info('Retrieved authorization code');
    return code;
  }

  /**
   * Exchanges an authorization code, or the stored refresh token when no code
   * is given, for an access token.
   */
  async requestAccessToken(authCode?: string): Promise<string> {
    const params: Record<string, string> = {
      client_id: this.credentials.clientId,
      client_secret: this.credentials.clientSecret,
    };
    if (authCode) {
      params.code = authCode;
      params.grant_type = 'authorization_code';
    } else if (this.refreshToken) {
      params.refresh_token = this.refreshToken;
      params.grant_type = 'refresh_token';
    } else {
      throw new Error('Either an authorization code or a refresh token is required');
    }

    const response = await this.fetchImpl(withQuery(this.credentials.authUrl, 'token', params), {
      method: 'POST',
    });
    const token = TokenResponseSchema.parse(await readJson(response));

    this.refreshToken = token.refresh_token ?? null;
    this.refreshTokenExpiresAt = token.expires_in !== undefined
      ? new Date(this.now().getTime() + token.expires_in * 1000)
      : null;
    this.log?.info('Retrieved access token');
    return token.access_token;
  }

  async login(accessToken: string): Promise<BullhornSession> {
    const url = withQuery(this.credentials.restUrl, 'login', {
      version: '*',
      access_token: accessToken,
    });

    const body = await withRetry(
      async () => readJson(await this.fetchImpl(url, { method: 'POST' })),
      {
        ...this.retry,
        onRetry: (attempt, error) => this.log?.warn({ attempt, error: error.message }, 'Retrying REST login'),
      },
    );
    const session = LoginResponseSchema.parse(body);
    this.log?.info('Logged into REST API');
    return { restToken: session.BhRestToken, restUrl: ensureTrailingSlash(session.restUrl) };
  }

  async authenticate(): Promise<BullhornSession> {
    const code = await this.requestAuthorizationCode();
    const accessToken = await this.requestAccessToken(code);
    return this.login(accessToken);
  }
}
