/**
 * Forecast Relay — Shared Type Definitions
 *
 * Core interfaces used by the OAuth2 core and the application around it.
 */

import type { z } from 'zod';
import type {
  DeviceAuthorizationResponseSchema,
  OAuthErrorBodySchema,
  TokenResponseSchema,
} from './schemas.js';

// ─── Credentials ────────────────────────────────────────────

/** OAuth2 client registration, parsed from a client secret file */
export interface ClientCredential {
  /** Envelope the credential was found under */
  kind: 'installed' | 'web';
  clientId: string;
  clientSecret: string;
  projectId?: string;
  /** Authorization endpoint */
  authUri: string;
  /** Token endpoint */
  tokenUri: string;
  redirectUris: string[];
}

export interface ServiceAccountKey {
  /** Email address of the service account, used as the JWT issuer */
  clientEmail: string;
  /** PEM encoded RSA private key. Secret. */
  privateKey: string;
  privateKeyId?: string;
  projectId?: string;
  tokenUri: string;
}

// ─── Tokens ─────────────────────────────────────────────────

export type TokenResponse = z.infer<typeof TokenResponseSchema>;

export type OAuthErrorBody = z.infer<typeof OAuthErrorBodySchema>;

export type DeviceAuthorizationResponse = z.infer<typeof DeviceAuthorizationResponseSchema>;

export interface TokenCacheData {
  /** Provider payload as received, minus `expires_in` once reloaded */
  response: TokenResponse;
  /** Absolute expiry computed when the token was obtained. `null` never expires. */
  expiresTime: Date | null;
}

/** Single-use values delivered by the consent redirect */
export interface RedirectParameters {
  code: string;
  state: string;
}

// ─── Flow Selection ─────────────────────────────────────────

export type FlowKind = 'installed' | 'device' | 'service_account';
