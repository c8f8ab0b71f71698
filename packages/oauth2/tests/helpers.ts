import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import type { ClientCredential, ServiceAccountKey } from '@forecast-relay/shared';

export const NOW = new Date('2026-01-01T00:00:00.000Z');

export const SCOPES = ['https://mail.google.com/'];

export const TEST_CLIENT: ClientCredential = {
  kind: 'installed',
  clientId: 'client-1',
  clientSecret: 'test-secret',
  authUri: 'https://accounts.example.test/o/oauth2/auth',
  tokenUri: 'https://oauth2.example.test/token',
  redirectUris: [],
};

export function testServiceAccountKey(privateKey: string): ServiceAccountKey {
  return {
    clientEmail: 'relay@project.iam.example.test',
    privateKey,
    privateKeyId: 'key-1',
    tokenUri: 'https://oauth2.example.test/token',
  };
}

export async function createTmpDir(): Promise<string> {
  return mkdtemp(join(tmpdir(), 'forecast-relay-test-'));
}

export async function cleanTmpDir(dir: string): Promise<void> {
  await rm(dir, { recursive: true, force: true });
}

/** A clock that only moves when told to */
export function manualClock(start: Date = NOW) {
  let current = start.getTime();
  return {
    clock: () => new Date(current),
    advance(ms: number) {
      current += ms;
    },
  };
}

/** What fetch and abortable timers reject with once their signal fires */
export function abortError(): Error {
  return Object.assign(new Error('This operation was aborted'), { name: 'AbortError' });
}

export function jsonResponse(status: number, body: unknown): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}

export async function seedTokenCache(
  path: string,
  response: Record<string, unknown>,
  expiresTime: Date | null,
): Promise<void> {
  await writeFile(
    path,
    JSON.stringify({ response, expires_time: expiresTime ? expiresTime.toISOString() : null }, null, 2),
    'utf-8',
  );
}
