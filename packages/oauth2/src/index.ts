/**
 * @forecast-relay/oauth2 — OAuth2 credential lifecycle for the mailbox connection
 *
 * Token cache, cache orchestration and the Installed, Device and Service
 * Account flows, all behind `AuthenticationFlow.authenticate()`.
 */

// Flows
export { createAuthenticationFlow } from './flow.js';
export type { AuthenticationFlow, CreateFlowOptions } from './flow.js';

export { InstalledFlow, createOAuth2Client, credentialsToTokenResponse } from './installed.js';
export type { AuthorizationCodeClient, InstalledFlowOptions } from './installed.js';

export { DeviceFlow, DEVICE_CODE_GRANT } from './device.js';
export type { DeviceAuthorization, DeviceFlowOptions } from './device.js';

export { ServiceAccountFlow, JWT_BEARER_GRANT, createClaims, encodeJwt } from './service-account.js';
export type { JwtClaims, ServiceAccountFlowOptions } from './service-account.js';

// Consent
export { OutOfBandConsent, HttpRedirectConsent, OUT_OF_BAND_REDIRECT_URI } from './consent.js';
export type { ConsentRedirect, OutOfBandConsentOptions, HttpRedirectConsentOptions } from './consent.js';

export { RedirectChannel } from './redirect-channel.js';
export type { ReceiveOptions, SendResult } from './redirect-channel.js';

// Token cache
export {
  TokenCache,
  TokenCacheGuard,
  createTokenCacheData,
  expiresInNow,
  isExpired,
  serializeTokenCache,
  deserializeTokenCache,
} from './token-cache.js';

export { authenticateWithTokenCache } from './orchestrator.js';
export type { ObtainNewToken, RefreshToken, OrchestratorOptions } from './orchestrator.js';

export type { FetchLike } from './http.js';

// Mail
export { formatXOAuth2, encodeXOAuth2, XOAuth2Authenticator } from './xoauth2.js';
