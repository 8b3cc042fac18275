import { Mutex } from 'async-mutex';
import type { IAuthClient } from '../providers/auth-client.interface.js';
import { AuthenticationError, NotAuthenticatedError, getErrorMessage, isLocalSitesError } from '../errors/index.js';
import type {
  AccessContext,
  AuthenticatedSession,
  ClientCredentials,
  RegionContext,
  SessionStatus,
  TokenGrant,
} from '../types/session.types.js';
import type { TokenStore } from './token-store.service.js';
import type { RegionResolver } from './region-resolver.service.js';
import { logger as defaultLogger, type StructuredLogger } from './logger.service.js';
import { metrics as defaultMetrics, type MetricsService, type TokenExchangePurpose } from './metrics.service.js';

export interface SessionManagerConfig {
  store: TokenStore;
  authClient: IAuthClient;
  regionResolver: RegionResolver;
  renewalSkewMs?: number; // Renew N milliseconds before expiry
  now?: () => number;
  logger?: StructuredLogger;
  metrics?: MetricsService;
}

/**
 * Anything able to hand out a valid access context (implemented by
 * SessionManager, faked in tests)
 */
export interface AccessContextProvider {
  getAccessContext(): Promise<AccessContext>;
}

const toAccessContext = (session: AuthenticatedSession): AccessContext => ({
  accessToken: session.accessToken,
  tenantId: session.tenantId,
  apiBase: session.apiBase,
});

/**
 * Session Manager
 *
 * Produces, on demand, a token valid for immediate use.
 *
 * Features:
 * - login: token exchange + who-am-I + region resolution, committed all at once
 * - proactive renewal 60 seconds before expiry (configurable)
 * - renewal reuses the stored credentials, tenant/region stay as resolved at login
 * - single flight: concurrent callers share one renewal, success or failure
 * - failed login leaves the session unauthenticated, failed renewal leaves it as it was
 */
export class SessionManager implements AccessContextProvider {
  private readonly mutex = new Mutex();
  private renewal?: Promise<AuthenticatedSession>;
  private readonly store: TokenStore;
  private readonly authClient: IAuthClient;
  private readonly regionResolver: RegionResolver;
  private readonly renewalSkewMs: number;
  private readonly now: () => number;
  private readonly logger: StructuredLogger;
  private readonly metrics: MetricsService;

  constructor(config: SessionManagerConfig) {
    this.store = config.store;
    this.authClient = config.authClient;
    this.regionResolver = config.regionResolver;
    this.renewalSkewMs = config.renewalSkewMs ?? 60_000;
    this.now = config.now ?? Date.now;
    this.logger = config.logger ?? defaultLogger;
    this.metrics = config.metrics ?? defaultMetrics;
  }

  /**
   * Authenticates with the given credentials and resolves tenant routing.
   * Always replaces the previous session; on failure none is left.
   */
  async login(clientId: string, clientSecret: string): Promise<RegionContext> {
    const credentials: ClientCredentials = {
      clientId: clientId.trim(),
      clientSecret: clientSecret.trim(),
    };

    return this.mutex.runExclusive(async () => {
      try {
        if (!credentials.clientId || !credentials.clientSecret) {
          throw new AuthenticationError('Client ID / Secret not set.');
        }

        const requestedAt = this.now();
        const grant = await this.exchange(credentials, 'login');
        const identity = await this.authClient.whoAmI(grant.accessToken);
        const region = this.regionResolver.resolve(identity);

        const session: AuthenticatedSession = {
          status: 'authenticated',
          credentials,
          accessToken: grant.accessToken,
          expiresAt: this.expiryFor(grant, requestedAt),
          ...region,
        };
        this.store.set(session);
        this.metrics.setSessionAuthenticated(true);

        this.logger.loginSucceeded({
          ...region,
          expiresAt: new Date(session.expiresAt).toISOString(),
        });

        return region;
      } catch (error) {
        this.store.clear();
        this.metrics.setSessionAuthenticated(false);
        this.logger.loginFailed({
          errorKind: isLocalSitesError(error) ? error.errorKind : 'Unknown',
          status: isLocalSitesError(error) ? error.status : undefined,
          error: getErrorMessage(error),
        });
        throw error;
      }
    });
  }

  /**
   * Gets a valid bearer token, renewing if necessary
   */
  async getValidToken(): Promise<string> {
    const context = await this.getAccessContext();
    return context.accessToken;
  }

  /**
   * Gets token + tenant + API base as one snapshot, renewing if necessary
   */
  async getAccessContext(): Promise<AccessContext> {
    const current = this.requireSession();
    if (this.isFresh(current)) {
      return toAccessContext(current);
    }

    // Callers arriving while a renewal is pending share its outcome
    if (!this.renewal) {
      this.renewal = this.mutex
        .runExclusive(async () => {
          // A login may have replaced the session while this one waited
          const session = this.requireSession();
          return this.isFresh(session) ? session : this.renew(session);
        })
        .finally(() => {
          this.renewal = undefined;
        });
    }

    return toAccessContext(await this.renewal);
  }

  /**
   * Public view of the session, without token or credentials
   */
  describe(): SessionStatus {
    const session = this.store.get();
    if (session.status === 'unauthenticated') {
      return { authenticated: false };
    }
    return {
      authenticated: true,
      tenantId: session.tenantId,
      dataRegion: session.dataRegion,
      apiBase: session.apiBase,
      expiresAt: new Date(session.expiresAt).toISOString(),
    };
  }

  private requireSession(): AuthenticatedSession {
    const session = this.store.get();
    if (session.status === 'unauthenticated') {
      throw new NotAuthenticatedError();
    }
    return session;
  }

  /**
   * Token is usable only until `renewalSkewMs` before its expiry
   */
  private isFresh(session: AuthenticatedSession): boolean {
    return this.now() < session.expiresAt - this.renewalSkewMs;
  }

  /**
   * Renews the token with the stored credentials. Must run under the mutex.
   */
  private async renew(session: AuthenticatedSession): Promise<AuthenticatedSession> {
    const secondsLeft = Math.floor((session.expiresAt - this.now()) / 1000);
    this.logger.debug(`Token expires in ${secondsLeft}s, renewing`, { tenantId: session.tenantId });

    const requestedAt = this.now();
    let grant: TokenGrant;
    try {
      grant = await this.exchange(session.credentials, 'renewal');
    } catch (error) {
      this.logger.tokenRenewed({ success: false, error: getErrorMessage(error) });
      throw error;
    }

    const renewed: AuthenticatedSession = {
      ...session,
      accessToken: grant.accessToken,
      expiresAt: this.expiryFor(grant, requestedAt),
    };
    this.store.set(renewed);

    this.logger.tokenRenewed({
      success: true,
      expiresAt: new Date(renewed.expiresAt).toISOString(),
      token: renewed.accessToken,
    });
    return renewed;
  }

  private async exchange(credentials: ClientCredentials, purpose: TokenExchangePurpose): Promise<TokenGrant> {
    try {
      const grant = await this.authClient.exchangeToken(credentials);
      this.metrics.recordTokenExchange(purpose, true);
      return grant;
    } catch (error) {
      this.metrics.recordTokenExchange(purpose, false);
      if (error instanceof AuthenticationError) {
        throw error;
      }
      throw new AuthenticationError(`Token request failed: ${getErrorMessage(error)}`, { cause: error });
    }
  }

  private expiryFor(grant: TokenGrant, requestedAt: number): number {
    return requestedAt + grant.expiresInSeconds * 1000;
  }
}
