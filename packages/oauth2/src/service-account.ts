/**
 * Service account flow: a self-signed RS256 JWT exchanged for an access token
 * (RFC 7523 JWT bearer grant). No operator interaction; there is no refresh
 * token, so an expired token is simply obtained again.
 */

import jwt, { type SignOptions } from 'jsonwebtoken';
import {
  AuthError,
  DEFAULT_SCOPES,
  createLogger,
  errorMessage,
  systemClock,
  type Clock,
  type ServiceAccountKey,
  type TokenResponse,
} from '@forecast-relay/shared';
import type { AuthenticationFlow } from './flow.js';
import { requestToken, type FetchLike } from './http.js';
import { authenticateWithTokenCache } from './orchestrator.js';
import { TokenCache } from './token-cache.js';

const log = createLogger('service-account-flow');

export const JWT_BEARER_GRANT = 'urn:ietf:params:oauth:grant-type:jwt-bearer';

/** Lifetime of the signed assertion, not of the resulting access token */
const ASSERTION_LIFETIME_SECONDS = 30 * 60;

export interface JwtClaims {
  iss: string;
  scope: string;
  aud: string;
  iat: number;
  exp: number;
}

export function createClaims(key: ServiceAccountKey, scopes: string[], issuedAt: Date): JwtClaims {
  if (scopes.length !== 1) {
    throw new AuthError(
      'Configuration',
      `Service account flow takes exactly one scope, got ${scopes.length}: ${scopes.join(' ')}`,
    );
  }
  const iat = Math.floor(issuedAt.getTime() / 1000);
  return {
    iss: key.clientEmail,
    scope: scopes[0],
    aud: key.tokenUri,
    iat,
    exp: iat + ASSERTION_LIFETIME_SECONDS,
  };
}

/**
 * Sign `claims` with the service account's private key. The header carries
 * the key id when the key file names one; `iat` comes from the claims, so the
 * same claims always give the same assertion.
 */
export function encodeJwt(key: ServiceAccountKey, claims: JwtClaims): string {
  // jsonwebtoken rejects an explicit `keyid: undefined`
  const options: SignOptions = { algorithm: 'RS256' };
  if (key.privateKeyId) options.keyid = key.privateKeyId;
  try {
    return jwt.sign(claims, key.privateKey, options);
  } catch (err: unknown) {
    throw new AuthError('Configuration', `JWT signing failed: ${errorMessage(err)}`, { cause: err });
  }
}

export interface ServiceAccountFlowOptions {
  /** Default scope for `authenticate()`; exactly one is allowed */
  scopes?: string[];
  fetch?: FetchLike;
  clock?: Clock;
  signal?: AbortSignal;
}

export class ServiceAccountFlow implements AuthenticationFlow {
  private readonly cache: TokenCache;
  private readonly scopes: string[];
  private readonly fetchFn: FetchLike;
  private readonly clock: Clock;
  private readonly signal?: AbortSignal;

  constructor(
    private readonly key: ServiceAccountKey,
    tokenCachePath: string,
    options: ServiceAccountFlowOptions = {},
  ) {
    this.cache = new TokenCache(tokenCachePath);
    this.scopes = options.scopes ?? DEFAULT_SCOPES;
    this.fetchFn = options.fetch ?? ((input, init) => fetch(input, init));
    this.clock = options.clock ?? systemClock;
    this.signal = options.signal;
  }

  authenticate(scopes: string[] = this.scopes): Promise<string> {
    return this.cache.withLock((guard) =>
      authenticateWithTokenCache(
        scopes,
        guard,
        (requested) => this.obtainNewToken(requested),
        (_refreshToken, requested) => this.obtainNewToken(requested),
        { clock: this.clock, logger: log },
      ),
    );
  }

  async obtainNewToken(scopes: string[]): Promise<TokenResponse> {
    const assertion = encodeJwt(this.key, createClaims(this.key, scopes, this.clock()));
    log.debug({ iss: this.key.clientEmail, scope: scopes[0] }, 'Requesting token with signed JWT assertion');
    return requestToken(
      this.fetchFn,
      this.key.tokenUri,
      { grant_type: JWT_BEARER_GRANT, assertion },
      this.signal,
    );
  }
}
