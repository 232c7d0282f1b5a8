import { request } from './internal/http.js';
import { decode, TokenResponseSchema, type TokenResponse } from './schemas.js';
import { TOKEN_PATH } from './constants.js';
import type { LogFn } from './types.js';

export class AuthToken {
  readonly accessToken: string;
  readonly tokenType: string;
  /** epoch millis */
  readonly expiresAt: number;

  constructor(accessToken: string, tokenType: string, expiresAt: number) {
    this.accessToken = accessToken;
    this.tokenType = tokenType;
    this.expiresAt = expiresAt;
  }

  static fromResponse(response: TokenResponse, issuedAt: number = Date.now()): AuthToken {
    return new AuthToken(
      response.access_token,
      response.token_type,
      issuedAt + response.expires_in * 1000
    );
  }

  /** True once `now` is within `skew` ms of expiry. */
  isExpired(now: number = Date.now(), skew = 0): boolean {
    return now >= this.expiresAt - skew;
  }
}

export interface TokenManagerOptions {
  baseUrl: string;
  clientId: string;
  clientSecret: string;
  timeout: number;
  expirySkew: number;
  logger: LogFn;
}

/**
 * Client-credentials token cache.
 * Concurrent callers share a single in-flight exchange.
 */
export class TokenManager {
  private readonly options: TokenManagerOptions;
  private token?: AuthToken;
  private pending?: Promise<AuthToken>;
  /** Bumped by clear(); exchanges started under an older value are not cached. */
  private generation = 0;

  constructor(options: TokenManagerOptions) {
    this.options = options;
  }

  async getAccessToken(): Promise<string> {
    if (this.token && !this.token.isExpired(Date.now(), this.options.expirySkew)) {
      return this.token.accessToken;
    }
    const token = await this.refresh();
    return token.accessToken;
  }

  clear(): void {
    this.token = undefined;
    this.pending = undefined;
    this.generation++;
  }

  private refresh(): Promise<AuthToken> {
    if (!this.pending) {
      const pending = this.exchange(this.generation).finally(() => {
        if (this.pending === pending) this.pending = undefined;
      });
      this.pending = pending;
    }
    return this.pending;
  }

  private async exchange(generation: number): Promise<AuthToken> {
    this.options.logger(this.token ? '[auth] access token expired, refreshing' : '[auth] requesting access token');

    const issuedAt = Date.now();
    const body = await request(this.options.baseUrl, {
      method: 'POST',
      path: TOKEN_PATH,
      form: { grant_type: 'client_credentials' },
      auth: { type: 'basic', username: this.options.clientId, password: this.options.clientSecret },
      timeout: this.options.timeout,
    });

    const token = AuthToken.fromResponse(decode(TokenResponseSchema, body, 'token response'), issuedAt);
    if (generation === this.generation) {
      this.token = token;
    }
    return token;
  }
}
