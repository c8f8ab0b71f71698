/**
 * SASL XOAUTH2 for IMAP/SMTP.
 *
 * https://developers.google.com/gmail/imap/xoauth2-protocol
 */

import { createLogger, formatUserError, withRetry, type RetryOptions } from '@forecast-relay/shared';
import type { AuthenticationFlow } from './flow.js';

const log = createLogger('xoauth2');

export function formatXOAuth2(user: string, accessToken: string): string {
  return `user=${user}\x01auth=Bearer ${accessToken}\x01\x01`;
}

/** Base64 form, as sent in `AUTHENTICATE XOAUTH2` */
export function encodeXOAuth2(user: string, accessToken: string): string {
  return Buffer.from(formatXOAuth2(user, accessToken)).toString('base64');
}

/**
 * Mailbox login on top of a flow. Whole `authenticate()` calls are retried
 * with backoff when the failure is transient.
 */
export class XOAuth2Authenticator {
  constructor(
    private readonly flow: AuthenticationFlow,
    readonly user: string,
    private readonly retry: RetryOptions = {},
  ) {}

  accessToken(scopes?: string[]): Promise<string> {
    return withRetry(() => this.flow.authenticate(scopes), {
      ...this.retry,
      onRetry: (error, attempt) => {
        log.warn({ attempt, user: this.user }, `Authentication failed, retrying: ${formatUserError(error)}`);
        this.retry.onRetry?.(error, attempt);
      },
    });
  }

  async initialResponse(scopes?: string[]): Promise<string> {
    return encodeXOAuth2(this.user, await this.accessToken(scopes));
  }
}
