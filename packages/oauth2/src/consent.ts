/**
 * Consent mechanisms for the Installed flow.
 *
 * A ConsentRedirect shows the authorization URL to the operator and yields the
 * authorization code once the provider hands it back, either typed in by the
 * operator (out-of-band) or delivered to our own HTTP redirect endpoint.
 */

import { password } from '@inquirer/prompts';
import { AuthError, createLogger } from '@forecast-relay/shared';
import type { RedirectChannel } from './redirect-channel.js';

const log = createLogger('consent');

export const OUT_OF_BAND_REDIRECT_URI = 'urn:ietf:wg:oauth:2.0:oob';

export interface ConsentRedirect {
  /** Sent as `redirect_uri` in both the authorization URL and the code exchange */
  readonly redirectUri: string;
  /**
   * Present `authUrl` and resolve with the authorization code. `state` is the
   * CSRF token embedded in the URL; mechanisms that receive it back verify it.
   */
  awaitCode(authUrl: string, state: string): Promise<string>;
}

// ─── Out-of-band ──────────────────────────────────────────────

export interface OutOfBandConsentOptions {
  /** Reads the code from the operator. Defaults to a masked terminal prompt. */
  prompt?: (message: string) => Promise<string>;
  display?: (message: string) => void;
}

export class OutOfBandConsent implements ConsentRedirect {
  readonly redirectUri = OUT_OF_BAND_REDIRECT_URI;

  constructor(private readonly options: OutOfBandConsentOptions = {}) {}

  async awaitCode(authUrl: string): Promise<string> {
    const display = this.options.display ?? ((message: string) => console.log(message));
    const prompt = this.options.prompt ?? ((message: string) => password({ message }));

    display(`Open this URL to obtain the OAuth2 authorization code for your email account:\n${authUrl}`);
    const code = (await prompt('Enter the code:')).trim();
    if (!code) {
      throw new AuthError('Configuration', 'No authorization code was entered');
    }
    return code;
  }
}

// ─── HTTP redirect ────────────────────────────────────────────

export interface HttpRedirectConsentOptions {
  /** Upper bound on waiting for the redirect. Unbounded when omitted. */
  timeoutMs?: number;
  /** Aborts the wait, e.g. on process shutdown */
  signal?: AbortSignal;
}

export class HttpRedirectConsent implements ConsentRedirect {
  constructor(
    private readonly channel: RedirectChannel,
    readonly redirectUri: string,
    private readonly options: HttpRedirectConsentOptions = {},
  ) {}

  async awaitCode(authUrl: string, state: string): Promise<string> {
    log.info(`Open this URL to authorize access to your email account:\n${authUrl}`);
    log.debug({ redirectUri: this.redirectUri }, 'Waiting for the authorization redirect');

    const params = await this.channel.receive({
      timeoutMs: this.options.timeoutMs,
      signal: this.options.signal,
    });

    if (params.state !== state) {
      throw new AuthError(
        'CsrfMismatch',
        'State returned by the authorization redirect does not match the state sent in the authorization URL',
      );
    }
    return params.code;
  }
}
