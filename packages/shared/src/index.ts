/**
 * @forecast-relay/shared — Core utilities for the forecast relay
 *
 * Credential types and schemas, secrets loading, the authentication error
 * taxonomy, logging and retry helpers.
 */

// Types
export * from './types.js';

// Schemas
export {
  ClientSecretFileSchema,
  ServiceAccountKeyFileSchema,
  TokenResponseSchema,
  OAuthErrorBodySchema,
  DeviceAuthorizationResponseSchema,
  TokenCacheFileSchema,
} from './schemas.js';

// Credentials
export {
  formatIssues,
  parseJsonDocument,
  parseClientCredential,
  parseServiceAccountKey,
} from './credentials.js';

// Configuration
export {
  DEFAULT_SCOPES,
  DEFAULT_DEVICE_AUTHORIZATION_URL,
  MAX_TIMER_DELAY_MS,
  loadSecrets,
  loadOAuthConfig,
} from './config.js';

export type { Secrets, OAuthConfig } from './config.js';

// Errors
export {
  AuthError,
  isAuthError,
  isNotFound,
  isAbortError,
  cancelledError,
  errorMessage,
  wrapError,
  serverError,
  isRetryable,
  formatUserError,
} from './errors.js';

export type { AuthErrorKind, AuthErrorOptions } from './errors.js';

// Logging
export { createLogger, maskSecret } from './logger.js';
export type { Logger } from './logger.js';

// Time
export { systemClock, formatDuration, sleep } from './time.js';
export type { Clock } from './time.js';

// Retry
export { withRetry } from './retry.js';
export type { RetryOptions } from './retry.js';
