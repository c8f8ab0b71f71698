/**
 * Token endpoint plumbing for the flows that talk to the provider over fetch.
 */

import {
  AuthError,
  OAuthErrorBodySchema,
  cancelledError,
  isAbortError,
  TokenResponseSchema,
  errorMessage,
  formatIssues,
  serverError,
  type TokenResponse,
} from '@forecast-relay/shared';

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

export interface FormResponse {
  ok: boolean;
  status: number;
  /** Decoded JSON body, `undefined` when the body was not JSON */
  body: unknown;
}

/**
 * POST an `application/x-www-form-urlencoded` body and decode the JSON reply.
 */
export async function postForm(
  fetchFn: FetchLike,
  url: string,
  params: Record<string, string>,
  signal?: AbortSignal,
): Promise<FormResponse> {
  let res: Response;
  try {
    res = await fetchFn(url, {
      method: 'POST',
      headers: {
        'Content-Type': 'application/x-www-form-urlencoded',
        Accept: 'application/json',
      },
      body: new URLSearchParams(params).toString(),
      signal,
    });
  } catch (err: unknown) {
    if (signal?.aborted || isAbortError(err)) throw cancelledError(signal, `POST ${url}`);
    throw new AuthError('Network', `POST ${url} failed: ${errorMessage(err)}`, { cause: err });
  }

  let body: unknown;
  try {
    body = await res.json();
  } catch {
    body = undefined;
  }
  return { ok: res.ok, status: res.status, body };
}

export function parseTokenResponse(body: unknown, url: string): TokenResponse {
  const result = TokenResponseSchema.safeParse(body);
  if (!result.success) {
    throw new AuthError(
      'Deserialize',
      `Invalid token response from ${url}: ${formatIssues(result.error)}`,
    );
  }
  return result.data;
}

/**
 * Turn a non-2xx reply into a ServerError, keeping the provider body when it
 * decoded as JSON.
 */
export function responseError(res: FormResponse, url: string): AuthError {
  if (res.body === undefined) {
    return new AuthError('ServerError', `POST ${url} responded with HTTP status ${res.status}`, {
      status: res.status,
    });
  }
  return serverError(`POST ${url} responded with HTTP status ${res.status}`, res.body, {
    status: res.status,
  });
}

/**
 * Exchange a grant at the token endpoint.
 */
export async function requestToken(
  fetchFn: FetchLike,
  tokenUrl: string,
  params: Record<string, string>,
  signal?: AbortSignal,
): Promise<TokenResponse> {
  const res = await postForm(fetchFn, tokenUrl, params, signal);
  if (!res.ok) throw responseError(res, tokenUrl);
  return parseTokenResponse(res.body, tokenUrl);
}

export interface RefreshGrant {
  tokenUrl: string;
  clientId: string;
  clientSecret: string;
  refreshToken: string;
  scopes: string[];
}

/**
 * RFC 6749 §6 refresh, client credentials in the body and the requested
 * scopes sent along.
 */
export function refreshAccessToken(
  fetchFn: FetchLike,
  grant: RefreshGrant,
  signal?: AbortSignal,
): Promise<TokenResponse> {
  return requestToken(
    fetchFn,
    grant.tokenUrl,
    {
      grant_type: 'refresh_token',
      refresh_token: grant.refreshToken,
      client_id: grant.clientId,
      client_secret: grant.clientSecret,
      scope: grant.scopes.join(' '),
    },
    signal,
  );
}

/**
 * Map a failure from the googleapis client. Gaxios errors carry the provider
 * reply on `response`; a structured OAuth2 error body becomes a ServerError.
 */
export function clientRequestError(action: string, err: unknown): AuthError {
  if (err instanceof AuthError) return err;
  if (isAbortError(err)) return new AuthError('Cancelled', `${action} was cancelled`, { cause: err });

  if (err instanceof Error && 'response' in err) {
    const response = err.response;
    if (typeof response === 'object' && response !== null && 'data' in response) {
      const parsed = OAuthErrorBodySchema.safeParse(response.data);
      if (parsed.success) {
        const status =
          'status' in response && typeof response.status === 'number' ? response.status : undefined;
        return serverError(`Failed to ${action}`, parsed.data, { status });
      }
    }
  }

  return new AuthError('Network', `Failed to ${action}: ${errorMessage(err)}`, { cause: err });
}
