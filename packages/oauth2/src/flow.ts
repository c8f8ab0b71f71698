/**
 * Flow selection.
 *
 * Every flow exposes the same single operation. `createAuthenticationFlow`
 * picks one from the loaded secrets and configuration.
 */

import { AuthError, type Clock, type OAuthConfig, type Secrets } from '@forecast-relay/shared';
import { HttpRedirectConsent, OutOfBandConsent, type ConsentRedirect } from './consent.js';
import { DeviceFlow } from './device.js';
import type { FetchLike } from './http.js';
import { InstalledFlow, type AuthorizationCodeClient } from './installed.js';
import type { RedirectChannel } from './redirect-channel.js';
import { ServiceAccountFlow } from './service-account.js';

export interface AuthenticationFlow {
  /**
   * Return a valid access token for `scopes` (the flow's defaults when
   * omitted), reusing, refreshing or obtaining it as needed.
   */
  authenticate(scopes?: string[]): Promise<string>;
}

export interface CreateFlowOptions {
  /** Receives the HTTP redirect; required when `redirectUrl` is configured */
  channel?: RedirectChannel;
  /** Overrides the consent mechanism chosen from configuration */
  consent?: ConsentRedirect;
  signal?: AbortSignal;
  client?: AuthorizationCodeClient;
  fetch?: FetchLike;
  clock?: Clock;
}

function missing(what: string, flow: string): AuthError {
  return new AuthError('Configuration', `${what} has not been provided, and is required for the ${flow} flow`);
}

function selectConsent(config: OAuthConfig, options: CreateFlowOptions): ConsentRedirect {
  if (options.consent) return options.consent;
  if (!config.redirectUrl) return new OutOfBandConsent();
  if (!options.channel) {
    throw new AuthError('Configuration', 'A redirect channel is required when a redirect URL is configured');
  }
  return new HttpRedirectConsent(options.channel, config.redirectUrl, {
    timeoutMs: config.redirectTimeoutMs,
    signal: options.signal,
  });
}

export function createAuthenticationFlow(
  secrets: Secrets,
  config: OAuthConfig,
  options: CreateFlowOptions = {},
): AuthenticationFlow {
  switch (config.flow) {
    case 'installed': {
      if (!secrets.clientSecret) throw missing('Client secret', 'installed');
      return new InstalledFlow(secrets.clientSecret, selectConsent(config, options), secrets.tokenCachePath, {
        scopes: config.scopes,
        client: options.client,
        fetch: options.fetch,
        clock: options.clock,
        signal: options.signal,
      });
    }
    case 'device': {
      if (!secrets.clientSecret) throw missing('Client secret', 'device');
      return new DeviceFlow(secrets.clientSecret, config.deviceAuthorizationUrl, secrets.tokenCachePath, {
        scopes: config.scopes,
        fetch: options.fetch,
        clock: options.clock,
        signal: options.signal,
      });
    }
    case 'service_account': {
      if (!secrets.serviceAccountKey) throw missing('Service account key', 'service account');
      return new ServiceAccountFlow(secrets.serviceAccountKey, secrets.tokenCachePath, {
        scopes: config.scopes,
        fetch: options.fetch,
        clock: options.clock,
        signal: options.signal,
      });
    }
  }
}
