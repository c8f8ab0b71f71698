/**
 * Token cache orchestration shared by every flow.
 *
 * Decides whether the cached token can be reused, must be refreshed, or has to
 * be obtained from scratch. The caller passes a held guard, so the decision and
 * the write that follows it are atomic with respect to other callers.
 */

import {
  createLogger,
  formatDuration,
  systemClock,
  wrapError,
  type Clock,
  type Logger,
  type TokenCacheData,
  type TokenResponse,
} from '@forecast-relay/shared';
import { createTokenCacheData, expiresInNow, isExpired, type TokenCacheGuard } from './token-cache.js';

const defaultLog = createLogger('oauth2');

export type ObtainNewToken = (scopes: string[]) => Promise<TokenResponse>;
export type RefreshToken = (refreshToken: string, scopes: string[]) => Promise<TokenResponse>;

export interface OrchestratorOptions {
  clock?: Clock;
  logger?: Logger;
}

async function step<T>(name: string, fn: () => Promise<T>): Promise<T> {
  try {
    return await fn();
  } catch (err: unknown) {
    throw wrapError(name, err);
  }
}

/**
 * Keep the previous refresh token when the provider omits a new one.
 */
function carryRefreshToken(next: TokenResponse, previous: TokenResponse, log: Logger): TokenResponse {
  if (next.refresh_token !== undefined || previous.refresh_token === undefined) {
    return next;
  }
  log.debug('No new refresh token in the response, re-using current refresh token');
  return { ...next, refresh_token: previous.refresh_token };
}

function logTokenLifetime(data: TokenCacheData, now: Date, log: Logger): void {
  const remaining = expiresInNow(data, now);
  if (remaining === null) {
    log.warn('Token has no expiration time');
    return;
  }
  const refreshable = data.response.refresh_token !== undefined;
  log.debug(
    `Token expires in: ${formatDuration(remaining)}. It ${refreshable ? 'can' : 'cannot'} be refreshed using the cached refresh token.`,
  );
}

/**
 * Return a valid access token, performing at most one token exchange.
 */
export async function authenticateWithTokenCache(
  scopes: string[],
  cache: TokenCacheGuard,
  obtainNewToken: ObtainNewToken,
  refreshToken: RefreshToken,
  options: OrchestratorOptions = {},
): Promise<string> {
  const clock = options.clock ?? systemClock;
  const log = options.logger ?? defaultLog;

  let data: TokenCacheData;

  if (!(await step('read token cache', () => cache.exists()))) {
    log.debug({ path: cache.path }, 'No token cache, obtaining new token');
    const response = await step('obtain new token', () => obtainNewToken(scopes));
    data = createTokenCacheData(response, clock());
    await step('write token cache', () => cache.write(data));
  } else {
    const cached = await step('read token cache', () => cache.read());

    if (!isExpired(cached, clock())) {
      data = cached;
    } else if (cached.response.refresh_token !== undefined) {
      const currentRefreshToken = cached.response.refresh_token;
      log.debug('Cached token has expired, refreshing');
      const response = await step('refresh token', () => refreshToken(currentRefreshToken, scopes));
      data = createTokenCacheData(carryRefreshToken(response, cached.response, log), clock());
      await step('write token cache', () => cache.write(data));
    } else {
      log.debug('Cached token has expired and cannot be refreshed, obtaining new token');
      const response = await step('obtain new token', () => obtainNewToken(scopes));
      data = createTokenCacheData(response, clock());
      await step('write token cache', () => cache.write(data));
    }
  }

  logTokenLifetime(data, clock(), log);
  return data.response.access_token;
}
