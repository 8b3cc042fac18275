import type { FastifyReply } from 'fastify';
import {
  ProxyError,
  getErrorMessage,
  isLocalSitesError,
  type ErrorKind,
  type LocalSitesError,
  type ProxyErrorReason,
} from '../errors/index.js';
import type { StructuredLogger } from '../services/logger.service.js';

export interface ErrorBody {
  ok: false;
  errorKind: ErrorKind | 'InternalError';
  reason?: ProxyErrorReason;
  status?: number;
  error: string;
}

/**
 * HTTP status the local API answers with for a core error
 */
export function httpStatusFor(error: LocalSitesError): number {
  switch (error.errorKind) {
    case 'NotAuthenticated':
    case 'AuthenticationError':
      return 401;
    case 'RegionResolutionError':
      return 502;
    case 'NetworkError':
      return 504;
    case 'ProxyError':
      if (error.status !== undefined && error.status >= 400 && error.status < 500) {
        return error.status;
      }
      return 502;
  }
}

export function toErrorBody(error: unknown): ErrorBody {
  if (!isLocalSitesError(error)) {
    return { ok: false, errorKind: 'InternalError', error: 'Internal error' };
  }
  return {
    ok: false,
    errorKind: error.errorKind,
    reason: error instanceof ProxyError ? error.reason : undefined,
    status: error.status,
    error: error.message,
  };
}

/**
 * Sends a core error to the caller. Unknown errors are logged and
 * answered with a generic 500.
 */
export function sendError(reply: FastifyReply, error: unknown, logger: StructuredLogger): FastifyReply {
  if (isLocalSitesError(error)) {
    return reply.code(httpStatusFor(error)).send(toErrorBody(error));
  }
  logger.error('Unhandled error in local API', { error, detail: getErrorMessage(error) });
  return reply.code(500).send(toErrorBody(error));
}
