/**
 * Error taxonomy shared by the session layer, the sites proxy and the
 * HTTP front end.
 *
 * Every error carries an `errorKind` the UI switches on and, where the
 * remote side answered, the upstream HTTP `status`. Messages never contain
 * client secrets or bearer tokens.
 */

export type ErrorKind =
  | 'AuthenticationError'
  | 'RegionResolutionError'
  | 'NotAuthenticated'
  | 'NetworkError'
  | 'ProxyError';

export type ProxyErrorReason = 'NotFound' | 'Validation' | 'Unknown';

export abstract class LocalSitesError extends Error {
  abstract readonly errorKind: ErrorKind;
  readonly status?: number;

  constructor(message: string, status?: number, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.status = status;
  }
}

export class AuthenticationError extends LocalSitesError {
  readonly errorKind = 'AuthenticationError';
  readonly code?: string;

  constructor(message: string, options: { status?: number; code?: string; cause?: unknown } = {}) {
    super(message, options.status, options.cause);
    this.name = 'AuthenticationError';
    this.code = options.code;
  }
}

export class RegionResolutionError extends LocalSitesError {
  readonly errorKind = 'RegionResolutionError';

  constructor(message: string, status?: number, cause?: unknown) {
    super(message, status, cause);
    this.name = 'RegionResolutionError';
  }
}

export class NotAuthenticatedError extends LocalSitesError {
  readonly errorKind = 'NotAuthenticated';

  constructor(message = 'Not authenticated: call login first.') {
    super(message);
    this.name = 'NotAuthenticatedError';
  }
}

export class NetworkError extends LocalSitesError {
  readonly errorKind = 'NetworkError';
  readonly code?: string;

  constructor(message: string, code?: string, cause?: unknown) {
    super(message, undefined, cause);
    this.name = 'NetworkError';
    this.code = code;
  }
}

export class ProxyError extends LocalSitesError {
  readonly errorKind = 'ProxyError';
  readonly reason: ProxyErrorReason;

  constructor(reason: ProxyErrorReason, message: string, status?: number, cause?: unknown) {
    super(message, status, cause);
    this.name = 'ProxyError';
    this.reason = reason;
  }
}

export const isLocalSitesError = (error: unknown): error is LocalSitesError => error instanceof LocalSitesError;

export const proxyReasonForStatus = (status: number): ProxyErrorReason => {
  if (status === 404) {
    return 'NotFound';
  }
  if (status === 400 || status === 409 || status === 422) {
    return 'Validation';
  }
  return 'Unknown';
};

export const mapUpstreamError = (status: number, message: string): ProxyError =>
  new ProxyError(proxyReasonForStatus(status), message, status);

const readStringField = (data: object, key: string): string | undefined => {
  const value: unknown = Reflect.get(data, key);
  return typeof value === 'string' && value.length > 0 ? value : undefined;
};

/**
 * Pulls the human-readable reason out of an upstream error body, unmodified.
 * Falls back to a generic message carrying the status.
 */
export const extractUpstreamMessage = (data: unknown, status: number): string => {
  if (typeof data === 'string' && data.trim().length > 0) {
    return data;
  }
  if (data !== null && typeof data === 'object') {
    const message = readStringField(data, 'message')
      ?? readStringField(data, 'error_description')
      ?? readStringField(data, 'error');
    if (message) {
      return message;
    }
  }
  return `Upstream request failed (${status})`;
};

/**
 * OAuth error code (`error`) or the identity provider's `errorCode`.
 */
export const extractUpstreamCode = (data: unknown): string | undefined => {
  if (data === null || typeof data !== 'object') {
    return undefined;
  }
  return readStringField(data, 'error') ?? readStringField(data, 'errorCode');
};

export const getErrorMessage = (error: unknown): string => {
  if (error instanceof Error) {
    return error.message;
  }
  if (typeof error === 'string') {
    return error;
  }
  return 'Unknown error';
};
