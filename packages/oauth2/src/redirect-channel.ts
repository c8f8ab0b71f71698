/**
 * Hand-off between the HTTP redirect handler and a waiting Installed flow.
 *
 * The web layer calls `send()` with the `code` and `state` query parameters;
 * the flow awaits `receive()`. Nothing is buffered: a redirect only goes
 * through while a flow is waiting for it, so stray requests cannot line up in
 * front of the genuine one. Once closed, pending and future receivers fail
 * with `ChannelClosed`.
 */

import {
  AuthError,
  MAX_TIMER_DELAY_MS,
  cancelledError,
  type RedirectParameters,
} from '@forecast-relay/shared';

export type SendResult = 'delivered' | 'not-waiting' | 'closed';

export interface ReceiveOptions {
  /** Give up after this many milliseconds. Waits forever when omitted. */
  timeoutMs?: number;
  signal?: AbortSignal;
}

interface Waiter {
  resolve: (params: RedirectParameters) => void;
  reject: (err: unknown) => void;
}

function channelClosed(): AuthError {
  return new AuthError('ChannelClosed', 'Redirect channel closed before the authorization code was received');
}

export class RedirectChannel {
  private waiter: Waiter | null = null;
  private closed = false;

  get isClosed(): boolean {
    return this.closed;
  }

  /** Whether a flow is currently waiting for a redirect */
  get isWaiting(): boolean {
    return this.waiter !== null;
  }

  send(params: RedirectParameters): SendResult {
    if (this.closed) return 'closed';
    const waiter = this.waiter;
    if (!waiter) return 'not-waiting';
    waiter.resolve(params);
    return 'delivered';
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;
    this.waiter?.reject(channelClosed());
  }

  receive(options: ReceiveOptions = {}): Promise<RedirectParameters> {
    const { timeoutMs, signal } = options;

    if (this.closed) return Promise.reject(channelClosed());
    if (signal?.aborted) return Promise.reject(cancelledError(signal, 'Waiting for the authorization redirect'));
    if (
      timeoutMs !== undefined &&
      !(Number.isInteger(timeoutMs) && timeoutMs > 0 && timeoutMs <= MAX_TIMER_DELAY_MS)
    ) {
      return Promise.reject(
        new AuthError(
          'Configuration',
          `Redirect timeout must be a whole number of milliseconds between 1 and ${MAX_TIMER_DELAY_MS}, got ${timeoutMs}`,
        ),
      );
    }
    if (this.waiter) {
      return Promise.reject(
        new AuthError('Configuration', 'Another authorization is already waiting on this redirect channel'),
      );
    }

    return new Promise<RedirectParameters>((resolve, reject) => {
      let timer: NodeJS.Timeout | undefined;

      const cleanup = () => {
        if (timer) clearTimeout(timer);
        signal?.removeEventListener('abort', onAbort);
        if (this.waiter === waiter) this.waiter = null;
      };

      const waiter: Waiter = {
        resolve: (params) => {
          cleanup();
          resolve(params);
        },
        reject: (err) => {
          cleanup();
          reject(err);
        },
      };

      const onAbort = () => waiter.reject(cancelledError(signal, 'Waiting for the authorization redirect'));

      if (timeoutMs !== undefined) {
        timer = setTimeout(() => {
          waiter.reject(
            new AuthError(
              'ChannelClosed',
              `Timed out after ${timeoutMs}ms waiting for the authorization redirect`,
            ),
          );
        }, timeoutMs);
      }
      signal?.addEventListener('abort', onAbort, { once: true });
      this.waiter = waiter;
    });
  }
}
