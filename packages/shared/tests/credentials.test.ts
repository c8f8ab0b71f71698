import { describe, it, expect } from 'vitest';
import { parseClientCredential, parseServiceAccountKey } from '../src/credentials.js';
import { isAuthError } from '../src/errors.js';
import { CLIENT_SECRET_JSON, SERVICE_ACCOUNT_JSON } from './helpers.js';

describe('parseClientCredential', () => {
  it('reads an installed application secret', () => {
    expect(parseClientCredential(CLIENT_SECRET_JSON)).toEqual({
      kind: 'installed',
      clientId: 'client-1',
      clientSecret: 'test-secret',
      projectId: 'forecast-relay',
      authUri: 'https://accounts.example.test/o/oauth2/auth',
      tokenUri: 'https://oauth2.example.test/token',
      redirectUris: [],
    });
  });

  it('reads a web application secret', () => {
    const raw = JSON.stringify({ web: JSON.parse(CLIENT_SECRET_JSON).installed });
    expect(parseClientCredential(raw).kind).toBe('web');
  });

  it('names the source on invalid JSON', () => {
    expect(() => parseClientCredential('{', 'client secret file')).toThrow('Invalid JSON in client secret file');
  });

  it('fails with Deserialize when fields are missing', () => {
    let caught: unknown;
    try {
      parseClientCredential(JSON.stringify({ installed: { client_id: 'client-1' } }));
    } catch (err: unknown) {
      caught = err;
    }
    expect(isAuthError(caught, 'Deserialize')).toBe(true);
  });
});

describe('parseServiceAccountKey', () => {
  it('reads the fields the flow needs', () => {
    expect(parseServiceAccountKey(SERVICE_ACCOUNT_JSON)).toEqual({
      clientEmail: 'relay@project.iam.example.test',
      privateKey: 'test-private-key',
      privateKeyId: 'key-1',
      projectId: 'forecast-relay',
      tokenUri: 'https://oauth2.example.test/token',
    });
  });

  it('rejects other credential types', () => {
    const raw = JSON.stringify({ ...JSON.parse(SERVICE_ACCOUNT_JSON), type: 'authorized_user' });
    expect(() => parseServiceAccountKey(raw)).toThrow('Invalid service account key');
  });
});
