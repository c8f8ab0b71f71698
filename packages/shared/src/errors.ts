/**
 * Error taxonomy for the OAuth2 core.
 *
 * Every failure crossing the `authenticate()` boundary is an AuthError. The
 * kind tells the outer caller whether retrying the whole call makes sense;
 * `step` names the stage that failed.
 */

export type AuthErrorKind =
  | 'Io'
  | 'Deserialize'
  | 'Serialize'
  | 'Network'
  | 'ServerError'
  | 'CsrfMismatch'
  | 'ChannelClosed'
  | 'Configuration'
  | 'Cancelled';

export interface AuthErrorOptions {
  /** Stage that failed, e.g. "read token cache" */
  step?: string;
  /** Provider response body, pretty printed */
  details?: string;
  /** HTTP status of the provider response, when there was one */
  status?: number;
  cause?: unknown;
}

export class AuthError extends Error {
  readonly kind: AuthErrorKind;
  readonly step?: string;
  readonly details?: string;
  readonly status?: number;

  constructor(kind: AuthErrorKind, message: string, options: AuthErrorOptions = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = 'AuthError';
    this.kind = kind;
    this.step = options.step;
    this.details = options.details;
    this.status = options.status;
  }
}

export function isAuthError(error: unknown, kind?: AuthErrorKind): error is AuthError {
  return error instanceof AuthError && (kind === undefined || error.kind === kind);
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/** Rejection raised by an aborted fetch or timer */
export function isAbortError(err: unknown): boolean {
  return err instanceof Error && err.name === 'AbortError';
}

/**
 * The caller's signal fired. Carries the abort reason as the cause.
 */
export function cancelledError(signal: AbortSignal | undefined, what: string): AuthError {
  return new AuthError('Cancelled', `${what} was cancelled`, { cause: signal?.reason });
}

export function isNotFound(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

/**
 * Prefix an error with the step that failed. AuthErrors keep their kind and
 * details; an abort stays a cancellation, anything else is treated as a
 * transport failure.
 */
export function wrapError(step: string, err: unknown): AuthError {
  let kind: AuthErrorKind = 'Network';
  if (err instanceof AuthError) kind = err.kind;
  else if (isAbortError(err)) kind = 'Cancelled';
  return new AuthError(kind, `Error while trying to ${step}: ${errorMessage(err)}`, {
    step,
    details: err instanceof AuthError ? err.details : undefined,
    status: err instanceof AuthError ? err.status : undefined,
    cause: err,
  });
}

/**
 * Build a ServerError from a provider error body. The body is kept verbatim
 * in the message so operators can see what the provider said.
 */
export function serverError(
  message: string,
  body: unknown,
  options: { step?: string; status?: number } = {},
): AuthError {
  let details: string;
  try {
    details = JSON.stringify(body, null, 2);
  } catch (err: unknown) {
    details = `Unable to display response, error while serializing it to JSON (${errorMessage(err)})`;
  }
  return new AuthError('ServerError', `${message}. Server returned error response:\n${details}`, {
    ...options,
    details,
  });
}

/**
 * Whether an outer caller may retry a whole `authenticate()` call after this
 * error. Security and configuration failures never are.
 */
export function isRetryable(error: unknown): boolean {
  if (!(error instanceof AuthError)) return false;
  switch (error.kind) {
    case 'Network':
    case 'Io':
      return true;
    case 'ServerError':
      return error.status !== undefined && (error.status === 429 || error.status >= 500);
    default:
      return false;
  }
}

/**
 * Operator-facing one-liner for an authentication failure.
 */
export function formatUserError(error: unknown): string {
  if (!(error instanceof AuthError)) {
    return errorMessage(error) || 'Something went wrong. Try again.';
  }

  switch (error.kind) {
    case 'CsrfMismatch':
      return 'Consent redirect state did not match the request. The redirect was rejected; start authorization again.';
    case 'ChannelClosed':
      return 'The redirect listener shut down before the consent code arrived.';
    case 'Configuration':
      return `Configuration error: ${error.message}`;
    case 'Deserialize':
      return `Could not parse credentials or token cache: ${error.message}`;
    case 'Io':
    case 'Serialize':
      return `Token cache could not be accessed: ${error.message}`;
    case 'ServerError':
      return `The OAuth2 provider rejected the request: ${error.message}`;
    case 'Network':
      return `Network error talking to the OAuth2 provider: ${error.message}`;
    case 'Cancelled':
      return 'Authentication was cancelled.';
  }
}
