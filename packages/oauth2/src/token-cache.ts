/**
 * File-backed token cache.
 *
 * Holds the most recent provider token response together with its absolute
 * expiry. One TokenCache instance owns one cache file; callers must hold the
 * cache lock (a TokenCacheGuard) for the whole read-decide-write sequence so
 * that concurrent `authenticate()` calls see each other's writes.
 *
 * File format:
 *   { "response": { "access_token": "...", ... }, "expires_time": "<RFC3339>" | null }
 */

import { randomBytes } from 'node:crypto';
import { readFile, rename, rm, stat, writeFile } from 'node:fs/promises';
import { basename, dirname, join } from 'node:path';
import {
  AuthError,
  TokenCacheFileSchema,
  createLogger,
  errorMessage,
  isNotFound,
  parseJsonDocument,
  type TokenCacheData,
  type TokenResponse,
} from '@forecast-relay/shared';

const log = createLogger('token-cache');

const PRIVATE_CREDENTIAL_FILE_MODE = 0o600;

// ─── Cache Data ───────────────────────────────────────────────

/**
 * Wrap a fresh provider response, turning its relative `expires_in` into an
 * absolute instant.
 */
export function createTokenCacheData(response: TokenResponse, now: Date): TokenCacheData {
  const expiresTime =
    response.expires_in === undefined ? null : new Date(now.getTime() + response.expires_in * 1000);
  return { response, expiresTime };
}

/** Milliseconds until expiry, clamped at zero. `null` when the token never expires. */
export function expiresInNow(data: TokenCacheData, now: Date): number | null {
  if (!data.expiresTime) return null;
  return Math.max(0, data.expiresTime.getTime() - now.getTime());
}

/** A token without an expiry is never considered expired. */
export function isExpired(data: TokenCacheData, now: Date): boolean {
  return data.expiresTime !== null && data.expiresTime.getTime() < now.getTime();
}

export function serializeTokenCache(data: TokenCacheData): string {
  try {
    return JSON.stringify(
      {
        response: data.response,
        expires_time: data.expiresTime ? data.expiresTime.toISOString() : null,
      },
      null,
      2,
    );
  } catch (err: unknown) {
    throw new AuthError('Serialize', `Error serializing token cache: ${errorMessage(err)}`, { cause: err });
  }
}

/**
 * Parse a cache document. The relative `expires_in` is dropped: it was
 * relative to when the token was issued, and only `expires_time` is trusted.
 */
export function deserializeTokenCache(raw: string, source: string): TokenCacheData {
  const file = parseJsonDocument(raw, TokenCacheFileSchema, source);
  const response: TokenResponse = { ...file.response };
  delete response.expires_in;
  return {
    response,
    expiresTime: file.expires_time ? new Date(file.expires_time) : null,
  };
}

// ─── Guard ────────────────────────────────────────────────────

/**
 * Exclusive access to a token cache file, obtained with `TokenCache.lock()`.
 */
export class TokenCacheGuard {
  private released = false;

  constructor(
    readonly path: string,
    private readonly unlock: () => void,
  ) {}

  async exists(): Promise<boolean> {
    this.assertHeld();
    try {
      await stat(this.path);
      return true;
    } catch (err: unknown) {
      if (isNotFound(err)) return false;
      throw new AuthError('Io', `Unable to stat token cache ${this.path}: ${errorMessage(err)}`, { cause: err });
    }
  }

  async read(): Promise<TokenCacheData> {
    this.assertHeld();
    let raw: string;
    try {
      raw = await readFile(this.path, 'utf-8');
    } catch (err: unknown) {
      throw new AuthError('Io', `Error reading token cache ${this.path}: ${errorMessage(err)}`, { cause: err });
    }
    return deserializeTokenCache(raw, `token cache ${this.path}`);
  }

  /**
   * Replace the cache file. The document goes to a private temp file first and
   * is renamed into place, so readers never observe a partial write.
   */
  async write(data: TokenCacheData): Promise<void> {
    this.assertHeld();
    const json = serializeTokenCache(data);
    const overwritten = await this.exists();
    const tmpFile = join(
      dirname(this.path),
      `.${basename(this.path)}.tmp-${randomBytes(4).toString('hex')}`,
    );

    try {
      await writeFile(tmpFile, json, { encoding: 'utf-8', mode: PRIVATE_CREDENTIAL_FILE_MODE });
      await rename(tmpFile, this.path);
    } catch (err: unknown) {
      await rm(tmpFile, { force: true });
      throw new AuthError('Io', `Error writing token cache to ${this.path}: ${errorMessage(err)}`, {
        cause: err,
      });
    }

    if (overwritten) {
      log.debug({ path: this.path }, 'Overwrote token cache');
    } else {
      log.debug({ path: this.path }, 'Wrote new token cache');
    }
  }

  release(): void {
    if (this.released) return;
    this.released = true;
    this.unlock();
  }

  private assertHeld(): void {
    if (this.released) {
      throw new Error(`Token cache guard for ${this.path} used after release`);
    }
  }
}

// ─── Cache ────────────────────────────────────────────────────

export class TokenCache {
  /** Settles when the current holder releases; callers queue behind it. */
  private tail: Promise<void> = Promise.resolve();

  constructor(readonly path: string) {}

  /**
   * Wait for exclusive access. Waiters are served in arrival order.
   */
  async lock(): Promise<TokenCacheGuard> {
    const previous = this.tail;
    let unlock: () => void = () => undefined;
    this.tail = new Promise<void>((resolve) => {
      unlock = resolve;
    });
    await previous;
    return new TokenCacheGuard(this.path, unlock);
  }

  async withLock<T>(fn: (guard: TokenCacheGuard) => Promise<T>): Promise<T> {
    const guard = await this.lock();
    try {
      return await fn(guard);
    } finally {
      guard.release();
    }
  }
}
