/**
 * Parsing of credential documents into the core's camelCase types.
 */

import type { ZodError, ZodType, ZodTypeDef } from 'zod';
import { AuthError, errorMessage } from './errors.js';
import { ClientSecretFileSchema, ServiceAccountKeyFileSchema } from './schemas.js';
import type { ClientCredential, ServiceAccountKey } from './types.js';

export function formatIssues(error: ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}

/**
 * Parse and validate a JSON document. Any failure is a Deserialize error
 * naming `source`.
 */
export function parseJsonDocument<T>(
  raw: string,
  schema: ZodType<T, ZodTypeDef, unknown>,
  source: string,
): T {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (err: unknown) {
    throw new AuthError('Deserialize', `Invalid JSON in ${source}: ${errorMessage(err)}`, { cause: err });
  }

  const result = schema.safeParse(json);
  if (!result.success) {
    throw new AuthError('Deserialize', `Invalid ${source}: ${formatIssues(result.error)}`, {
      cause: result.error,
    });
  }
  return result.data;
}

export function parseClientCredential(raw: string, source = 'client secret'): ClientCredential {
  const file = parseJsonDocument(raw, ClientSecretFileSchema, source);
  const [kind, body] = 'installed' in file
    ? (['installed', file.installed] as const)
    : (['web', file.web] as const);

  return {
    kind,
    clientId: body.client_id,
    clientSecret: body.client_secret,
    projectId: body.project_id,
    authUri: body.auth_uri,
    tokenUri: body.token_uri,
    redirectUris: body.redirect_uris,
  };
}

export function parseServiceAccountKey(raw: string, source = 'service account key'): ServiceAccountKey {
  const key = parseJsonDocument(raw, ServiceAccountKeyFileSchema, source);
  return {
    clientEmail: key.client_email,
    privateKey: key.private_key,
    privateKeyId: key.private_key_id,
    projectId: key.project_id,
    tokenUri: key.token_uri,
  };
}
