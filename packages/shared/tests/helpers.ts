import { mkdtemp, rm } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';

export async function createTmpDir(): Promise<string> {
  return mkdtemp(join(tmpdir(), 'forecast-relay-shared-'));
}

export async function cleanTmpDir(dir: string): Promise<void> {
  await rm(dir, { recursive: true, force: true });
}

export const CLIENT_SECRET_JSON = JSON.stringify({
  installed: {
    client_id: 'client-1',
    client_secret: 'test-secret',
    project_id: 'forecast-relay',
    auth_uri: 'https://accounts.example.test/o/oauth2/auth',
    token_uri: 'https://oauth2.example.test/token',
  },
});

export const SERVICE_ACCOUNT_JSON = JSON.stringify({
  type: 'service_account',
  project_id: 'forecast-relay',
  private_key_id: 'key-1',
  private_key: 'test-private-key',
  client_email: 'relay@project.iam.example.test',
  token_uri: 'https://oauth2.example.test/token',
});

export const TOKEN_CACHE_JSON = JSON.stringify({
  response: { access_token: 'seeded', refresh_token: 'refresh-1' },
  expires_time: '2026-01-01T01:00:00Z',
});
