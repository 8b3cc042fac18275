/**
 * Structured Logger Service
 *
 * Structured JSON logging for the session and proxy layers.
 *
 * Fields per event:
 * - timestamp: ISO 8601 timestamp
 * - level: log level (info, warn, error, debug)
 * - event: dotted event name (session.login, token.renewed, upstream.request, ...)
 * - tenantId / dataRegion: when a session exists
 * - operation: upstream operation (token, whoami, list, create, delete)
 * - http_status: upstream HTTP status (when applicable)
 * - error_kind: error taxonomy kind (when applicable)
 * - message: human-readable message
 *
 * Client secrets, bearer tokens and Authorization headers are redacted by
 * pino before a record is written.
 */

import pino from 'pino';
import { config } from '../config/env.js';

/**
 * Log context for session and proxy events
 */
export interface LogContext {
  tenantId?: string;
  dataRegion?: string;
  operation?: string;
  http_status?: number;
  error_kind?: string;
  duration?: number;
  [key: string]: unknown;
}

/**
 * Paths pino censors in every record
 */
export const REDACT_PATHS = [
  'clientSecret',
  '*.clientSecret',
  'client_secret',
  '*.client_secret',
  'accessToken',
  '*.accessToken',
  'access_token',
  '*.access_token',
  'req.headers.authorization',
  'headers.authorization',
  '*.headers.authorization',
];

/**
 * Create base logger instance
 */
const baseLogger = pino({
  level: config.logLevel,

  formatters: {
    level: (label) => {
      return { level: label };
    },
  },

  base: {
    service: 'local-sites-proxy',
    environment: config.nodeEnv,
  },

  redact: {
    paths: REDACT_PATHS,
    censor: '[REDACTED]',
  },

  timestamp: () => `,"timestamp":"${new Date().toISOString()}"`,

  // Pretty print in development
  transport: config.nodeEnv === 'development' ? {
    target: 'pino-pretty',
    options: {
      colorize: true,
      translateTime: 'HH:MM:ss.l',
      ignore: 'pid,hostname',
      singleLine: false,
    },
  } : undefined,
});

/**
 * Masks a token for logging (first 6 and last 4 characters)
 */
export function maskToken(token: string): string {
  if (token.length <= 10) {
    return '***';
  }
  return `${token.substring(0, 6)}...${token.substring(token.length - 4)}`;
}

/**
 * Masks a URL for logging (drops query string and credentials)
 */
export function maskUrl(url: string): string {
  try {
    const urlObj = new URL(url);
    return `${urlObj.protocol}//${urlObj.host}${urlObj.pathname}`;
  } catch {
    return url;
  }
}

/**
 * Structured Logger
 */
export class StructuredLogger {
  private logger: pino.Logger;

  constructor(logger: pino.Logger = baseLogger) {
    this.logger = logger;
  }

  /**
   * Logs a successful login
   */
  loginSucceeded(context: { tenantId: string; dataRegion: string; apiBase: string; expiresAt: string }) {
    this.logger.info({
      event: 'session.login',
      status: 'AUTHENTICATED',
      tenantId: context.tenantId,
      dataRegion: context.dataRegion,
      apiBase: context.apiBase,
      expiresAt: context.expiresAt,
      message: `Login OK: tenant=${context.tenantId}, dataRegion=${context.dataRegion}, apiBase=${context.apiBase}`,
    });
  }

  /**
   * Logs a failed login (the session is left unauthenticated)
   */
  loginFailed(context: { errorKind: string; status?: number; error: string }) {
    this.logger.warn({
      event: 'session.login_failed',
      status: 'UNAUTHENTICATED',
      error_kind: context.errorKind,
      http_status: context.status,
      error: context.error,
      message: `Login failed (${context.errorKind}): ${context.error}`,
    });
  }

  /**
   * Logs token renewal
   */
  tokenRenewed(context: { success: boolean; expiresAt?: string; token?: string; error?: string }) {
    if (context.success) {
      this.logger.info({
        event: 'token.renewed',
        status: 'SUCCESS',
        expiresAt: context.expiresAt,
        token: context.token ? maskToken(context.token) : undefined,
        message: `Access token renewed (expires: ${context.expiresAt})`,
      });
    } else {
      this.logger.error({
        event: 'token.renewal_failed',
        status: 'FAILED',
        error: context.error,
        message: `Token renewal failed: ${context.error}`,
      });
    }
  }

  /**
   * Logs a completed upstream call
   */
  upstreamRequest(context: LogContext & { operation: string; method: string; url: string; http_status: number }) {
    this.logger.debug({
      ...context,
      event: 'upstream.request',
      url: maskUrl(context.url),
      message: `${context.method} ${maskUrl(context.url)} -> ${context.http_status}`,
    });
  }

  /**
   * Logs a failed upstream call (remote error or transport failure)
   */
  upstreamFailed(context: LogContext & { operation: string; error: string }) {
    this.logger.warn({
      ...context,
      event: 'upstream.failed',
      message: `Upstream ${context.operation} failed: ${context.error}`,
    });
  }

  /**
   * Logs graceful shutdown
   */
  shutdownStarted(context: { signal: string }) {
    this.logger.warn({
      event: 'shutdown.started',
      signal: context.signal,
      message: `Graceful shutdown initiated (${context.signal})`,
    });
  }

  /**
   * Logs shutdown completion
   */
  shutdownCompleted(context: { duration: number }) {
    this.logger.info({
      event: 'shutdown.completed',
      duration: context.duration,
      message: `Graceful shutdown completed (${context.duration}ms)`,
    });
  }

  info(message: string, context?: LogContext) {
    this.logger.info({ ...context, message });
  }

  warn(message: string, context?: LogContext) {
    this.logger.warn({ ...context, message });
  }

  error(message: string, context?: LogContext & { error?: unknown }) {
    const error = context?.error;
    this.logger.error({
      ...context,
      error: error instanceof Error ? error.message : error,
      stack: error instanceof Error ? error.stack : undefined,
      message,
    });
  }

  debug(message: string, context?: LogContext) {
    this.logger.debug({ ...context, message });
  }
}

/**
 * Global logger instance
 */
export const logger = new StructuredLogger();
