/**
 * Forecast Relay — Secrets & OAuth2 Configuration
 *
 * Loads the credentials the OAuth2 core needs from a secrets directory, with
 * environment variable overrides for container deployments:
 *
 * + CLIENT_SECRET: client secret JSON, else `client_secret.json` in the secrets dir.
 * + SERVICE_ACCOUNT_KEY: key JSON, else `service_account_key.json` in the secrets dir.
 * + TOKEN_CACHE: token cache JSON written to `token_cache.json` when that file
 *   does not exist yet, or when OVERWRITE_TOKEN_CACHE=true.
 * + DELETE_TOKEN_CACHE: when set, the existing token cache file is removed first.
 *
 * The secrets directory must exist and be writable; the token cache file is
 * rewritten whenever tokens are refreshed.
 */

import { readFile, rm, stat, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { z } from 'zod';
import { parseClientCredential, parseJsonDocument, parseServiceAccountKey } from './credentials.js';
import { AuthError, errorMessage, isNotFound, wrapError } from './errors.js';
import { createLogger } from './logger.js';
import { TokenCacheFileSchema } from './schemas.js';
import type { ClientCredential, FlowKind, ServiceAccountKey } from './types.js';

const log = createLogger('config');

const PRIVATE_CREDENTIAL_FILE_MODE = 0o600;

/** https://developers.google.com/gmail/imap/xoauth2-protocol */
export const DEFAULT_SCOPES = ['https://mail.google.com/'];

export const DEFAULT_DEVICE_AUTHORIZATION_URL = 'https://oauth2.googleapis.com/device/code';

/** Longest delay `setTimeout` honours */
export const MAX_TIMER_DELAY_MS = 2_147_483_647;

export interface Secrets {
  /** Token cache file, updated by the core whenever tokens change */
  tokenCachePath: string;
  clientSecret: ClientCredential | null;
  serviceAccountKey: ServiceAccountKey | null;
}

export interface OAuthConfig {
  flow: FlowKind;
  scopes: string[];
  /** Redirect URI for the Installed flow. Out-of-band consent when absent. */
  redirectUrl?: string;
  deviceAuthorizationUrl: string;
  /** Upper bound on waiting for the consent redirect. Unbounded when absent. */
  redirectTimeoutMs?: number;
}

type Env = Record<string, string | undefined>;

async function fileExists(path: string): Promise<boolean> {
  try {
    await stat(path);
    return true;
  } catch (err: unknown) {
    if (isNotFound(err)) {
      return false;
    }
    throw new AuthError('Io', `Unable to stat ${path}: ${errorMessage(err)}`, { cause: err });
  }
}

async function readSecretFile(path: string): Promise<string> {
  try {
    return await readFile(path, 'utf-8');
  } catch (err: unknown) {
    throw new AuthError('Io', `Error reading secret file ${path}: ${errorMessage(err)}`, { cause: err });
  }
}

async function initializeClientSecret(secretsDir: string, env: Env): Promise<ClientCredential | null> {
  const fromEnv = env.CLIENT_SECRET;
  if (fromEnv !== undefined) {
    log.debug('Reading client secret from CLIENT_SECRET environment variable');
    return parseClientCredential(fromEnv, 'CLIENT_SECRET environment variable');
  }

  const secretPath = join(secretsDir, 'client_secret.json');
  if (!(await fileExists(secretPath))) return null;

  log.debug({ path: secretPath }, 'Reading client secret from file');
  return parseClientCredential(await readSecretFile(secretPath), `client secret file ${secretPath}`);
}

async function initializeServiceAccountKey(secretsDir: string, env: Env): Promise<ServiceAccountKey | null> {
  const fromEnv = env.SERVICE_ACCOUNT_KEY;
  if (fromEnv !== undefined) {
    log.debug('Reading service account key from SERVICE_ACCOUNT_KEY environment variable');
    return parseServiceAccountKey(fromEnv, 'SERVICE_ACCOUNT_KEY environment variable');
  }

  const keyPath = join(secretsDir, 'service_account_key.json');
  if (!(await fileExists(keyPath))) return null;

  log.debug({ path: keyPath }, 'Reading service account key from file');
  return parseServiceAccountKey(await readSecretFile(keyPath), `service account key file ${keyPath}`);
}

async function initializeTokenCache(secretsDir: string, env: Env): Promise<string> {
  const tokenCachePath = join(secretsDir, 'token_cache.json');

  if (env.DELETE_TOKEN_CACHE !== undefined && (await fileExists(tokenCachePath))) {
    log.warn({ path: tokenCachePath }, 'Deleting existing token cache file');
    try {
      await rm(tokenCachePath);
    } catch (err: unknown) {
      throw new AuthError('Io', `Error removing token cache file ${tokenCachePath}: ${errorMessage(err)}`, {
        cause: err,
      });
    }
  }

  const seed = env.TOKEN_CACHE;
  const exists = await fileExists(tokenCachePath);

  if (seed === undefined) {
    if (exists) {
      log.debug({ path: tokenCachePath }, 'Pre-existing token cache file will be used');
    } else {
      log.debug({ path: tokenCachePath }, 'Token cache will be created by the first authentication');
    }
    return tokenCachePath;
  }

  log.debug('Reading token cache from TOKEN_CACHE environment variable');
  parseJsonDocument(seed, TokenCacheFileSchema, 'TOKEN_CACHE environment variable');

  if (exists && env.OVERWRITE_TOKEN_CACHE !== 'true') {
    log.debug({ path: tokenCachePath }, 'Token cache file already exists, will not overwrite');
    return tokenCachePath;
  }

  if (exists) {
    log.warn({ path: tokenCachePath }, 'Overwriting token cache file');
  } else {
    log.info({ path: tokenCachePath }, 'Writing new token cache file');
  }

  try {
    await writeFile(tokenCachePath, seed, { encoding: 'utf-8', mode: PRIVATE_CREDENTIAL_FILE_MODE });
  } catch (err: unknown) {
    throw new AuthError('Io', `Error writing token cache file ${tokenCachePath}: ${errorMessage(err)}`, {
      cause: err,
    });
  }
  return tokenCachePath;
}

/**
 * Initialize the secrets required for mailbox authentication.
 */
export async function loadSecrets(secretsDir: string, env: Env = process.env): Promise<Secrets> {
  let isDirectory = false;
  try {
    isDirectory = (await stat(secretsDir)).isDirectory();
  } catch {
    isDirectory = false;
  }
  if (!isDirectory) {
    throw new AuthError('Configuration', `secrets dir ${secretsDir} does not exist or is not a directory`);
  }

  try {
    const clientSecret = await initializeClientSecret(secretsDir, env);
    const tokenCachePath = await initializeTokenCache(secretsDir, env);
    const serviceAccountKey = await initializeServiceAccountKey(secretsDir, env);
    return { tokenCachePath, clientSecret, serviceAccountKey };
  } catch (err: unknown) {
    throw wrapError('initialize secrets', err);
  }
}

const FlowSchema = z.enum(['installed', 'device', 'service_account']);

/**
 * Resolve which flow to run and with what parameters. OAUTH_FLOW picks the
 * flow explicitly; otherwise a service account key wins over a client secret.
 */
export function loadOAuthConfig(secrets: Secrets, env: Env = process.env): OAuthConfig {
  let flow: FlowKind;
  if (env.OAUTH_FLOW) {
    const parsed = FlowSchema.safeParse(env.OAUTH_FLOW);
    if (!parsed.success) {
      throw new AuthError(
        'Configuration',
        `OAUTH_FLOW must be one of ${FlowSchema.options.join(', ')}, got "${env.OAUTH_FLOW}"`,
      );
    }
    flow = parsed.data;
  } else {
    flow = secrets.serviceAccountKey ? 'service_account' : 'installed';
  }

  if (flow === 'service_account' && !secrets.serviceAccountKey) {
    throw new AuthError('Configuration', 'Service account key has not been provided, and is required for the service account flow');
  }
  if (flow !== 'service_account' && !secrets.clientSecret) {
    throw new AuthError('Configuration', `Client secret has not been provided, and is required for the ${flow} flow`);
  }

  const scopes = env.OAUTH_SCOPES
    ? env.OAUTH_SCOPES.split(/\s+/).filter(Boolean)
    : DEFAULT_SCOPES;

  let redirectTimeoutMs: number | undefined;
  if (env.OAUTH_REDIRECT_TIMEOUT_MS) {
    redirectTimeoutMs = Number(env.OAUTH_REDIRECT_TIMEOUT_MS);
    // setTimeout fires immediately for delays past a signed 32-bit int
    if (
      !Number.isInteger(redirectTimeoutMs) ||
      redirectTimeoutMs <= 0 ||
      redirectTimeoutMs > MAX_TIMER_DELAY_MS
    ) {
      throw new AuthError(
        'Configuration',
        `OAUTH_REDIRECT_TIMEOUT_MS must be a positive integer no greater than ${MAX_TIMER_DELAY_MS}`,
      );
    }
  }

  return {
    flow,
    scopes,
    redirectUrl: env.OAUTH_REDIRECT_URL || undefined,
    deviceAuthorizationUrl: env.OAUTH_DEVICE_AUTH_URL || DEFAULT_DEVICE_AUTHORIZATION_URL,
    redirectTimeoutMs,
  };
}
