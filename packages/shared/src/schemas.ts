/**
 * Forecast Relay — Wire Schemas
 *
 * zod schemas for every JSON document the OAuth2 core reads: client secret
 * files, service account keys, provider token responses, provider error bodies
 * and the on-disk token cache.
 */

import { z } from 'zod';

// ─── Credential Files ───────────────────────────────────────

const ClientSecretBodySchema = z.object({
  client_id: z.string().min(1),
  client_secret: z.string().min(1),
  project_id: z.string().optional(),
  auth_uri: z.string().url(),
  token_uri: z.string().url(),
  auth_provider_x509_cert_url: z.string().url().optional(),
  redirect_uris: z.array(z.string()).default([]),
});

/** `{"installed": {...}}` or `{"web": {...}}` as downloaded from the provider console */
export const ClientSecretFileSchema = z.union([
  z.object({ installed: ClientSecretBodySchema }),
  z.object({ web: ClientSecretBodySchema }),
]);

export const ServiceAccountKeyFileSchema = z.object({
  type: z.literal('service_account'),
  project_id: z.string().optional(),
  private_key_id: z.string().optional(),
  private_key: z.string().min(1),
  client_email: z.string().min(1),
  client_id: z.string().optional(),
  auth_uri: z.string().url().optional(),
  token_uri: z.string().url(),
  auth_provider_x509_cert_url: z.string().url().optional(),
  client_x509_cert_url: z.string().url().optional(),
});

// ─── Provider Responses ─────────────────────────────────────

/**
 * Standard OAuth2 token endpoint response. Unknown fields are kept so the
 * payload round-trips through the cache untouched.
 */
export const TokenResponseSchema = z
  .object({
    access_token: z.string().min(1),
    token_type: z.string().optional(),
    refresh_token: z.string().optional(),
    expires_in: z.number().nonnegative().optional(),
    scope: z.string().optional(),
    id_token: z.string().optional(),
  })
  .passthrough();

/** RFC 6749 §5.2 error body */
export const OAuthErrorBodySchema = z
  .object({
    error: z.string(),
    error_description: z.string().optional(),
    error_uri: z.string().optional(),
  })
  .passthrough();

/**
 * RFC 8628 device authorization response. Google still sends the older
 * `verification_url` spelling, so either is accepted.
 */
export const DeviceAuthorizationResponseSchema = z
  .object({
    device_code: z.string().min(1),
    user_code: z.string().min(1),
    verification_uri: z.string().optional(),
    verification_url: z.string().optional(),
    verification_uri_complete: z.string().optional(),
    expires_in: z.number().positive(),
    interval: z.number().positive().optional(),
  })
  .passthrough()
  .refine(
    (value) => value.verification_uri !== undefined || value.verification_url !== undefined,
    { message: 'verification_uri is required' },
  );

// ─── Token Cache File ───────────────────────────────────────

export const TokenCacheFileSchema = z.object({
  response: TokenResponseSchema,
  expires_time: z.string().datetime({ offset: true }).nullable().optional(),
});
