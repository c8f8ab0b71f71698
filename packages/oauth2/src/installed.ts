/**
 * Installed application flow: authorization code with PKCE and CSRF state.
 *
 * The operator opens the authorization URL, consents, and the provider hands
 * back a code (typed in, or delivered to our redirect endpoint). The code is
 * exchanged for tokens with the googleapis OAuth2 client.
 */

import { randomBytes } from 'node:crypto';
import { google, Auth } from 'googleapis';
import {
  AuthError,
  DEFAULT_SCOPES,
  createLogger,
  formatDuration,
  systemClock,
  type ClientCredential,
  type Clock,
  type TokenResponse,
} from '@forecast-relay/shared';
import type { ConsentRedirect } from './consent.js';
import type { AuthenticationFlow } from './flow.js';
import { clientRequestError, refreshAccessToken, type FetchLike } from './http.js';
import { authenticateWithTokenCache } from './orchestrator.js';
import { TokenCache } from './token-cache.js';

const log = createLogger('installed-flow');

/**
 * The slice of `Auth.OAuth2Client` the flow uses. Tests substitute a fake.
 */
export interface AuthorizationCodeClient {
  generateAuthUrl(opts: Auth.GenerateAuthUrlOpts): string;
  generateCodeVerifierAsync(): Promise<Auth.CodeVerifierResults>;
  getToken(options: Auth.GetTokenOptions): Promise<{ tokens: Auth.Credentials }>;
}

export function createOAuth2Client(credential: ClientCredential): AuthorizationCodeClient {
  return new google.auth.OAuth2({
    clientId: credential.clientId,
    clientSecret: credential.clientSecret,
    endpoints: {
      oauth2AuthBaseUrl: credential.authUri,
      oauth2TokenUrl: credential.tokenUri,
    },
  });
}

/**
 * Convert the library's credentials (absolute `expiry_date`) back into a
 * provider token response (relative `expires_in`).
 */
export function credentialsToTokenResponse(credentials: Auth.Credentials, now: Date): TokenResponse {
  if (!credentials.access_token) {
    throw new AuthError('Deserialize', 'Token response did not contain an access token');
  }
  const response: TokenResponse = { access_token: credentials.access_token };
  if (credentials.token_type) response.token_type = credentials.token_type;
  if (credentials.refresh_token) response.refresh_token = credentials.refresh_token;
  if (credentials.scope) response.scope = credentials.scope;
  if (credentials.id_token) response.id_token = credentials.id_token;
  if (typeof credentials.expiry_date === 'number') {
    response.expires_in = Math.max(0, Math.round((credentials.expiry_date - now.getTime()) / 1000));
  }
  return response;
}

export interface InstalledFlowOptions {
  /** Default scopes for `authenticate()` */
  scopes?: string[];
  client?: AuthorizationCodeClient;
  /** Used for the refresh grant */
  fetch?: FetchLike;
  clock?: Clock;
  signal?: AbortSignal;
}

export class InstalledFlow implements AuthenticationFlow {
  private readonly cache: TokenCache;
  private readonly client: AuthorizationCodeClient;
  private readonly scopes: string[];
  private readonly clock: Clock;
  private readonly fetchFn: FetchLike;
  private readonly signal?: AbortSignal;

  constructor(
    private readonly credential: ClientCredential,
    private readonly consent: ConsentRedirect,
    tokenCachePath: string,
    options: InstalledFlowOptions = {},
  ) {
    this.cache = new TokenCache(tokenCachePath);
    this.client = options.client ?? createOAuth2Client(credential);
    this.scopes = options.scopes ?? DEFAULT_SCOPES;
    this.clock = options.clock ?? systemClock;
    this.fetchFn = options.fetch ?? ((input, init) => fetch(input, init));
    this.signal = options.signal;
  }

  authenticate(scopes: string[] = this.scopes): Promise<string> {
    return this.cache.withLock((guard) =>
      authenticateWithTokenCache(
        scopes,
        guard,
        (requested) => this.obtainNewToken(requested),
        (refreshToken, requested) => this.refreshToken(refreshToken, requested),
        { clock: this.clock, logger: log },
      ),
    );
  }

  async obtainNewToken(scopes: string[]): Promise<TokenResponse> {
    // Build auth URL
    const { codeVerifier, codeChallenge } = await this.client.generateCodeVerifierAsync();
    if (!codeChallenge) {
      throw new AuthError('Configuration', 'OAuth2 client did not produce a PKCE code challenge');
    }
    const state = randomBytes(32).toString('hex');
    const redirectUri = this.consent.redirectUri;
    const authUrl = this.client.generateAuthUrl({
      access_type: 'offline',
      scope: scopes,
      state,
      code_challenge: codeChallenge,
      code_challenge_method: Auth.CodeChallengeMethod.S256,
      redirect_uri: redirectUri,
    });

    // Await consent
    const code = await this.consent.awaitCode(authUrl, state);

    // Exchange code
    let tokens: Auth.Credentials;
    try {
      ({ tokens } = await this.client.getToken({ code, codeVerifier, redirect_uri: redirectUri }));
    } catch (err: unknown) {
      throw clientRequestError('exchange authorization code', err);
    }

    const response = credentialsToTokenResponse(tokens, this.clock());
    if (response.refresh_token === undefined) {
      const lifetime =
        response.expires_in === undefined
          ? 'never expires'
          : `expires in ${formatDuration(response.expires_in * 1000)}`;
      log.warn(
        `Response did not contain a refresh token; the access token ${lifetime} and a new consent will be needed after that`,
      );
    }
    return response;
  }

  /**
   * Standard refresh grant with the requested scopes, which the googleapis
   * client's own refresh would not send.
   */
  async refreshToken(refreshToken: string, scopes: string[]): Promise<TokenResponse> {
    return refreshAccessToken(
      this.fetchFn,
      {
        tokenUrl: this.credential.tokenUri,
        clientId: this.credential.clientId,
        clientSecret: this.credential.clientSecret,
        refreshToken,
        scopes,
      },
      this.signal,
    );
  }
}
