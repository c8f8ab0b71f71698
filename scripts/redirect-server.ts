/**
 * HTTP endpoint for the Installed flow's consent redirect.
 *
 * The provider sends the browser to `GET /oauth2?code=...&state=...`; the
 * parameters are handed to the waiting flow through a RedirectChannel. The
 * state check itself happens in the flow. Redirects that arrive while no flow
 * is waiting are refused rather than held.
 */

import express, { type Express } from 'express';
import { createLogger } from '@forecast-relay/shared';
import type { RedirectChannel } from '@forecast-relay/oauth2';

const log = createLogger('redirect-server');

export const REDIRECT_PATH = '/oauth2';

export interface RedirectResult {
  status: number;
  body: string;
}

const SUCCESS_PAGE = `<html>
  <body style="font-family: system-ui; padding: 40px; max-width: 600px; margin: 0 auto;">
    <h1>Authorization successful</h1>
    <p>You may close this browser tab.</p>
  </body>
</html>`;

export function handleRedirect(channel: RedirectChannel, query: Record<string, unknown>): RedirectResult {
  // An error redirect never ends the wait
  if (typeof query.error === 'string') {
    log.warn({ error: query.error }, 'Provider redirected with an error');
    return { status: 400, body: `Authorization failed: ${query.error}` };
  }

  const { code, state } = query;
  if (typeof code !== 'string' || typeof state !== 'string' || !code || !state) {
    return { status: 400, body: 'Missing code or state query parameter' };
  }

  switch (channel.send({ code, state })) {
    case 'delivered':
      return { status: 200, body: SUCCESS_PAGE };
    case 'not-waiting':
      return { status: 503, body: 'No authorization is waiting for a redirect' };
    case 'closed':
      return { status: 410, body: 'No authorization is in progress' };
  }
}

export function createRedirectApp(channel: RedirectChannel): Express {
  const app = express();

  app.get(REDIRECT_PATH, (req, res) => {
    const result = handleRedirect(channel, req.query);
    res.status(result.status).type('html').send(result.body);
  });

  app.get('/health', (_req, res) => {
    res.json({ status: 'ok', waiting: channel.isWaiting });
  });

  return app;
}
