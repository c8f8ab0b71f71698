/**
 * Mailbox OAuth2 Authorization
 *
 * Runs the configured flow once so the token cache is seeded before the relay
 * starts. Run with: npm run authorize
 *
 * Usage:
 *   npm run authorize                     # Flow from OAUTH_FLOW, out-of-band consent
 *   npm run authorize -- --redirect=http  # Installed flow, consent redirect to this host
 *
 * Environment: SECRETS_DIR (default ./secrets), PORT (default 3000), plus
 * everything loadSecrets/loadOAuthConfig read.
 */

import 'dotenv/config';
import type { Server } from 'node:http';
import {
  createLogger,
  formatUserError,
  loadOAuthConfig,
  loadSecrets,
  maskSecret,
} from '@forecast-relay/shared';
import { RedirectChannel, createAuthenticationFlow } from '@forecast-relay/oauth2';
import { REDIRECT_PATH, createRedirectApp } from './redirect-server.js';

const log = createLogger('authorize');

async function main() {
  const secretsDir = process.env.SECRETS_DIR ?? 'secrets';
  const secrets = await loadSecrets(secretsDir);
  const config = loadOAuthConfig(secrets);

  const redirectArg = process.argv.find((a) => a.startsWith('--redirect='));
  const useHttpRedirect = redirectArg?.split('=')[1] === 'http' || config.redirectUrl !== undefined;

  const controller = new AbortController();
  process.once('SIGINT', () => controller.abort(new Error('Interrupted')));

  let channel: RedirectChannel | undefined;
  let server: Server | undefined;

  if (useHttpRedirect && config.flow === 'installed') {
    const port = Number(process.env.PORT ?? 3000);
    config.redirectUrl = config.redirectUrl ?? `http://localhost:${port}${REDIRECT_PATH}`;
    channel = new RedirectChannel();
    const app = createRedirectApp(channel);
    server = app.listen(port, () => {
      log.info({ port }, `Waiting for authorization redirect on ${config.redirectUrl}`);
    });
  }

  console.log(`\nAuthorizing mailbox access with the ${config.flow} flow`);
  console.log(`   Scopes: ${config.scopes.join(' ')}\n`);

  try {
    const flow = createAuthenticationFlow(secrets, config, { channel, signal: controller.signal });
    const token = await flow.authenticate();
    console.log(`\nAuthorization successful, access token ${maskSecret(token)}`);
    console.log(`Token cache written to ${secrets.tokenCachePath}\n`);
  } finally {
    channel?.close();
    server?.close();
  }
}

main().catch((error: unknown) => {
  console.error(`\nAuthorization failed: ${formatUserError(error)}`);
  process.exitCode = 1;
});
