import { describe, it, expect, beforeEach, afterEach, vi, type Mock } from 'vitest';
import { readFile } from 'node:fs/promises';
import { join } from 'node:path';
import type { Auth } from 'googleapis';
import { AuthError, isAuthError } from '@forecast-relay/shared';
import { HttpRedirectConsent, OUT_OF_BAND_REDIRECT_URI, OutOfBandConsent } from '../src/consent.js';
import type { FetchLike } from '../src/http.js';
import { InstalledFlow, credentialsToTokenResponse } from '../src/installed.js';
import { RedirectChannel } from '../src/redirect-channel.js';
import {
  NOW,
  SCOPES,
  TEST_CLIENT,
  cleanTmpDir,
  createTmpDir,
  jsonResponse,
  manualClock,
  seedTokenCache,
} from './helpers.js';

const REDIRECT_URI = 'http://localhost:3000/oauth2';
const AUTH_URL = 'https://accounts.example.test/o/oauth2/auth?client_id=client-1';

function fakeClient() {
  return {
    generateAuthUrl: vi.fn((_opts: Auth.GenerateAuthUrlOpts) => AUTH_URL),
    generateCodeVerifierAsync: vi.fn(async (): Promise<Auth.CodeVerifierResults> => ({
      codeVerifier: 'test-verifier',
      codeChallenge: 'test-challenge',
    })),
    getToken: vi.fn(async (_options: Auth.GetTokenOptions): Promise<{ tokens: Auth.Credentials }> => ({
      tokens: {
        access_token: 'abc',
        refresh_token: 'refresh-1',
        token_type: 'Bearer',
        expiry_date: NOW.getTime() + 3600 * 1000,
      },
    })),
  };
}

function providerError(status: number, data: unknown): Error {
  return Object.assign(new Error(`Request failed with status code ${status}`), { response: { status, data } });
}

describe('InstalledFlow', () => {
  let tmpDir: string;
  let path: string;
  let client: ReturnType<typeof fakeClient>;
  let channel: RedirectChannel;
  let fetchMock: Mock<FetchLike>;
  const { clock } = manualClock();

  function httpFlow(): InstalledFlow {
    const consent = new HttpRedirectConsent(channel, REDIRECT_URI);
    return new InstalledFlow(TEST_CLIENT, consent, path, { client, clock, scopes: SCOPES, fetch: fetchMock });
  }

  /**
   * Deliver the redirect the way the browser would, echoing the generated
   * state once the flow is waiting for it.
   */
  function redirectWithState(code: string, state?: (sent: string) => string) {
    client.generateAuthUrl.mockImplementation((opts) => {
      const sent = String(opts.state);
      setTimeout(() => channel.send({ code, state: state ? state(sent) : sent }), 0);
      return AUTH_URL;
    });
  }

  beforeEach(async () => {
    tmpDir = await createTmpDir();
    path = join(tmpDir, 'token_cache.json');
    client = fakeClient();
    channel = new RedirectChannel();
    fetchMock = vi.fn<FetchLike>();
  });

  afterEach(async () => {
    await cleanTmpDir(tmpDir);
  });

  it('runs the full consent and exchange and caches the result', async () => {
    redirectWithState('abc');

    await expect(httpFlow().authenticate()).resolves.toBe('abc');

    const authOpts = client.generateAuthUrl.mock.calls[0][0];
    expect(authOpts).toMatchObject({
      access_type: 'offline',
      scope: SCOPES,
      code_challenge: 'test-challenge',
      code_challenge_method: 'S256',
      redirect_uri: REDIRECT_URI,
    });
    expect(authOpts.state).toMatch(/^[0-9a-f]{64}$/);
    expect(client.getToken).toHaveBeenCalledWith({
      code: 'abc',
      codeVerifier: 'test-verifier',
      redirect_uri: REDIRECT_URI,
    });

    const file = JSON.parse(await readFile(path, 'utf-8'));
    expect(file).toEqual({
      response: { access_token: 'abc', token_type: 'Bearer', refresh_token: 'refresh-1', expires_in: 3600 },
      expires_time: '2026-01-01T01:00:00.000Z',
    });
  });

  it('rejects a redirect with a different state before exchanging the code', async () => {
    redirectWithState('abc', () => 'forged-state');

    const err = await httpFlow().authenticate().catch((e: unknown) => e);

    expect(isAuthError(err, 'CsrfMismatch')).toBe(true);
    expect(client.getToken).not.toHaveBeenCalled();
    await expect(readFile(path, 'utf-8')).rejects.toThrow();
  });

  it('fails with ChannelClosed when the redirect listener is gone', async () => {
    channel.close();

    const err = await httpFlow().authenticate().catch((e: unknown) => e);

    expect(isAuthError(err, 'ChannelClosed')).toBe(true);
    expect(client.getToken).not.toHaveBeenCalled();
  });

  it('reports a structured provider error as ServerError with the body', async () => {
    redirectWithState('abc');
    client.getToken.mockRejectedValueOnce(
      providerError(400, { error: 'invalid_grant', error_description: 'Bad Request' }),
    );

    const err = await httpFlow().authenticate().catch((e: unknown) => e);

    expect(isAuthError(err, 'ServerError')).toBe(true);
    expect(err).toMatchObject({
      status: 400,
      step: 'obtain new token',
      details: '{\n  "error": "invalid_grant",\n  "error_description": "Bad Request"\n}',
    });
  });

  it('reports a transport failure as Network', async () => {
    redirectWithState('abc');
    client.getToken.mockRejectedValueOnce(new Error('socket hang up'));

    const err = await httpFlow().authenticate().catch((e: unknown) => e);

    expect(isAuthError(err, 'Network')).toBe(true);
    expect(err instanceof AuthError ? err.message : '').toBe(
      'Error while trying to obtain new token: Failed to exchange authorization code: socket hang up',
    );
  });

  it('caches a response without refresh token as-is', async () => {
    redirectWithState('abc');
    client.getToken.mockResolvedValueOnce({ tokens: { access_token: 'abc', expiry_date: NOW.getTime() + 600_000 } });

    await expect(httpFlow().authenticate()).resolves.toBe('abc');

    const file = JSON.parse(await readFile(path, 'utf-8'));
    expect(file.response).toEqual({ access_token: 'abc', expires_in: 600 });
  });

  it('refreshes an expired token with the requested scopes', async () => {
    await seedTokenCache(path, { access_token: 'stale', refresh_token: 'refresh-1' }, new Date(NOW.getTime() - 1000));
    fetchMock.mockResolvedValueOnce(
      jsonResponse(200, { access_token: 'access-2', token_type: 'Bearer', expires_in: 3600 }),
    );

    await expect(httpFlow().authenticate()).resolves.toBe('access-2');

    expect(client.generateAuthUrl).not.toHaveBeenCalled();
    expect(fetchMock).toHaveBeenCalledTimes(1);
    expect(fetchMock.mock.calls[0][0]).toBe(TEST_CLIENT.tokenUri);
    const form = new URLSearchParams(String(fetchMock.mock.calls[0][1]?.body));
    expect(Object.fromEntries(form)).toEqual({
      grant_type: 'refresh_token',
      refresh_token: 'refresh-1',
      client_id: 'client-1',
      client_secret: 'test-secret',
      scope: 'https://mail.google.com/',
    });

    const file = JSON.parse(await readFile(path, 'utf-8'));
    expect(file.response).toEqual({
      access_token: 'access-2',
      token_type: 'Bearer',
      expires_in: 3600,
      refresh_token: 'refresh-1',
    });
  });

  it('reports a rejected refresh as ServerError', async () => {
    await seedTokenCache(path, { access_token: 'stale', refresh_token: 'refresh-1' }, new Date(NOW.getTime() - 1000));
    fetchMock.mockResolvedValueOnce(jsonResponse(400, { error: 'invalid_grant' }));

    const err = await httpFlow().authenticate().catch((e: unknown) => e);

    expect(isAuthError(err, 'ServerError')).toBe(true);
    expect(err).toMatchObject({ step: 'refresh token', status: 400 });
  });

  describe('out-of-band consent', () => {
    it('prompts for the code and uses the out-of-band redirect URI', async () => {
      const prompt = vi.fn(async (_message: string) => '  abc  ');
      const display = vi.fn((_message: string) => undefined);
      const flow = new InstalledFlow(TEST_CLIENT, new OutOfBandConsent({ prompt, display }), path, { client, clock });

      await expect(flow.authenticate()).resolves.toBe('abc');

      expect(prompt).toHaveBeenCalledWith('Enter the code:');
      expect(display.mock.calls[0][0]).toContain(AUTH_URL);
      expect(client.generateAuthUrl.mock.calls[0][0].redirect_uri).toBe(OUT_OF_BAND_REDIRECT_URI);
      expect(client.getToken).toHaveBeenCalledWith({
        code: 'abc',
        codeVerifier: 'test-verifier',
        redirect_uri: OUT_OF_BAND_REDIRECT_URI,
      });
    });

    it('rejects an empty code', async () => {
      const consent = new OutOfBandConsent({ prompt: async () => '   ', display: () => undefined });
      const flow = new InstalledFlow(TEST_CLIENT, consent, path, { client, clock });

      const err = await flow.authenticate().catch((e: unknown) => e);
      expect(isAuthError(err, 'Configuration')).toBe(true);
      expect(client.getToken).not.toHaveBeenCalled();
    });
  });
});

describe('credentialsToTokenResponse', () => {
  it('converts the absolute expiry back to seconds from now', () => {
    expect(
      credentialsToTokenResponse({ access_token: 'abc', expiry_date: NOW.getTime() + 90_400, scope: 'a b' }, NOW),
    ).toEqual({ access_token: 'abc', scope: 'a b', expires_in: 90 });
  });

  it('requires an access token', () => {
    expect(() => credentialsToTokenResponse({ refresh_token: 'refresh-1' }, NOW)).toThrow(
      'did not contain an access token',
    );
  });
});
