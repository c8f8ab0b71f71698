/**
 * Device authorization grant (RFC 8628).
 *
 * For hosts without a browser: the operator is shown a verification URL and a
 * short user code to enter on another device while we poll the token endpoint.
 */

import {
  AuthError,
  DEFAULT_SCOPES,
  DeviceAuthorizationResponseSchema,
  OAuthErrorBodySchema,
  cancelledError,
  createLogger,
  formatIssues,
  serverError,
  sleep,
  systemClock,
  type ClientCredential,
  type Clock,
  type TokenResponse,
} from '@forecast-relay/shared';
import type { AuthenticationFlow } from './flow.js';
import { parseTokenResponse, postForm, refreshAccessToken, responseError, type FetchLike } from './http.js';
import { authenticateWithTokenCache } from './orchestrator.js';
import { TokenCache } from './token-cache.js';

const log = createLogger('device-flow');

export const DEVICE_CODE_GRANT = 'urn:ietf:params:oauth:grant-type:device_code';

const DEFAULT_POLL_INTERVAL_SECONDS = 5;
const SLOW_DOWN_INCREMENT_SECONDS = 5;

const KNOWN_DEVICE_FIELDS = new Set([
  'device_code',
  'user_code',
  'verification_uri',
  'verification_url',
  'verification_uri_complete',
  'expires_in',
  'interval',
]);

export interface DeviceAuthorization {
  deviceCode: string;
  userCode: string;
  verificationUri: string;
  verificationUriComplete?: string;
  /** Seconds the device code stays valid */
  expiresIn: number;
  /** Seconds between polls */
  interval: number;
  /** Provider specific fields, kept as received */
  extra: Record<string, unknown>;
}

export interface DeviceFlowOptions {
  scopes?: string[];
  fetch?: FetchLike;
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
  clock?: Clock;
  signal?: AbortSignal;
}

export class DeviceFlow implements AuthenticationFlow {
  private readonly cache: TokenCache;
  private readonly scopes: string[];
  private readonly fetchFn: FetchLike;
  private readonly sleep: (ms: number, signal?: AbortSignal) => Promise<void>;
  private readonly clock: Clock;
  private readonly signal?: AbortSignal;

  constructor(
    private readonly credential: ClientCredential,
    private readonly deviceAuthorizationUrl: string,
    tokenCachePath: string,
    options: DeviceFlowOptions = {},
  ) {
    this.cache = new TokenCache(tokenCachePath);
    this.scopes = options.scopes ?? DEFAULT_SCOPES;
    this.fetchFn = options.fetch ?? ((input, init) => fetch(input, init));
    this.sleep = options.sleep ?? sleep;
    this.clock = options.clock ?? systemClock;
    this.signal = options.signal;
  }

  authenticate(scopes: string[] = this.scopes): Promise<string> {
    return this.cache.withLock((guard) =>
      authenticateWithTokenCache(
        scopes,
        guard,
        (requested) => this.obtainNewToken(requested),
        (refreshToken, requested) => this.refreshToken(refreshToken, requested),
        { clock: this.clock, logger: log },
      ),
    );
  }

  async requestDeviceAuthorization(scopes: string[]): Promise<DeviceAuthorization> {
    const url = this.deviceAuthorizationUrl;
    const res = await postForm(
      this.fetchFn,
      url,
      { client_id: this.credential.clientId, scope: scopes.join(' ') },
      this.signal,
    );
    if (!res.ok) throw responseError(res, url);

    const parsed = DeviceAuthorizationResponseSchema.safeParse(res.body);
    if (!parsed.success) {
      throw new AuthError(
        'Deserialize',
        `Invalid device authorization response from ${url}: ${formatIssues(parsed.error)}`,
      );
    }

    const body = parsed.data;
    const extra: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(body)) {
      if (!KNOWN_DEVICE_FIELDS.has(key)) extra[key] = value;
    }

    return {
      deviceCode: body.device_code,
      userCode: body.user_code,
      // the refine on the schema guarantees one of the two
      verificationUri: body.verification_uri ?? body.verification_url ?? '',
      verificationUriComplete: body.verification_uri_complete,
      expiresIn: body.expires_in,
      interval: body.interval ?? DEFAULT_POLL_INTERVAL_SECONDS,
      extra,
    };
  }

  /**
   * Poll the token endpoint until the operator approves or denies the request,
   * or the device code expires.
   */
  async pollForToken(details: DeviceAuthorization): Promise<TokenResponse> {
    const tokenUrl = this.credential.tokenUri;
    const deadline = this.clock().getTime() + details.expiresIn * 1000;
    let interval = details.interval;

    for (;;) {
      const res = await postForm(
        this.fetchFn,
        tokenUrl,
        {
          grant_type: DEVICE_CODE_GRANT,
          device_code: details.deviceCode,
          client_id: this.credential.clientId,
          client_secret: this.credential.clientSecret,
        },
        this.signal,
      );
      if (res.ok) return parseTokenResponse(res.body, tokenUrl);

      const error = OAuthErrorBodySchema.safeParse(res.body);
      if (!error.success) throw responseError(res, tokenUrl);

      switch (error.data.error) {
        case 'authorization_pending':
          break;
        case 'slow_down':
          interval += SLOW_DOWN_INCREMENT_SECONDS;
          log.debug({ interval }, 'Provider asked to slow down polling');
          break;
        default:
          throw serverError('Device authorization failed', error.data, { status: res.status });
      }

      try {
        await this.sleep(interval * 1000, this.signal);
      } catch (err: unknown) {
        if (this.signal?.aborted) throw cancelledError(this.signal, 'Device authorization polling');
        throw err;
      }
      if (this.clock().getTime() >= deadline) {
        throw serverError(
          'Device code expired before authorization completed',
          { error: 'expired_token' },
          { status: res.status },
        );
      }
    }
  }

  async obtainNewToken(scopes: string[]): Promise<TokenResponse> {
    const details = await this.requestDeviceAuthorization(scopes);
    log.info(
      `Open this URL in your browser:\n${details.verificationUriComplete ?? details.verificationUri}\nand enter the code: ${details.userCode}`,
    );
    return this.pollForToken(details);
  }

  refreshToken(refreshToken: string, scopes: string[]): Promise<TokenResponse> {
    return refreshAccessToken(
      this.fetchFn,
      {
        tokenUrl: this.credential.tokenUri,
        clientId: this.credential.clientId,
        clientSecret: this.credential.clientSecret,
        refreshToken,
        scopes,
      },
      this.signal,
    );
  }
}
