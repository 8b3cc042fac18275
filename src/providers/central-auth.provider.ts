import type { AxiosInstance } from 'axios';
import type { IAuthClient } from './auth-client.interface.js';
import { UpstreamHttpClient, type UpstreamResponse } from './upstream-http.client.js';
import {
  AuthenticationError,
  RegionResolutionError,
  extractUpstreamCode,
  extractUpstreamMessage,
  getErrorMessage,
} from '../errors/index.js';
import {
  DEFAULT_TOKEN_LIFETIME_SECONDS,
  TokenResponseSchema,
  type ClientCredentials,
  type TokenGrant,
} from '../types/session.types.js';
import type { StructuredLogger } from '../services/logger.service.js';
import type { MetricsService } from '../services/metrics.service.js';

export interface CentralAuthProviderConfig {
  tokenUrl: string;
  whoAmIUrl: string;
  timeoutMs?: number;
  scope?: string;
  http?: AxiosInstance;
  logger?: StructuredLogger;
  metrics?: MetricsService;
}

const isSuccess = (status: number): boolean => status >= 200 && status < 300;

/**
 * Central Auth Provider
 *
 * Implementation of IAuthClient for the identity provider and the
 * who-am-I endpoint of the management API.
 *
 * Token exchange: form-encoded client_credentials grant, `scope=token`.
 * Any failure of the exchange, including a transport failure, surfaces
 * as AuthenticationError with the upstream status and OAuth error code.
 */
export class CentralAuthProvider implements IAuthClient {
  private readonly config: CentralAuthProviderConfig;
  private readonly client: UpstreamHttpClient;

  constructor(config: CentralAuthProviderConfig) {
    this.config = {
      ...config,
      timeoutMs: config.timeoutMs ?? 20000, // 20 seconds default
      scope: config.scope ?? 'token',
    };
    this.client = new UpstreamHttpClient({
      timeoutMs: this.config.timeoutMs ?? 20000,
      http: config.http,
      logger: config.logger,
      metrics: config.metrics,
    });
  }

  async exchangeToken(credentials: ClientCredentials): Promise<TokenGrant> {
    const body = new URLSearchParams();
    body.set('grant_type', 'client_credentials');
    body.set('client_id', credentials.clientId);
    body.set('client_secret', credentials.clientSecret);
    body.set('scope', this.config.scope ?? 'token');

    let response: UpstreamResponse;
    try {
      response = await this.client.send('token', {
        method: 'POST',
        url: this.config.tokenUrl,
        data: body.toString(),
        headers: {
          'Content-Type': 'application/x-www-form-urlencoded',
          Accept: 'application/json',
        },
      });
    } catch (error) {
      throw new AuthenticationError(`Token request failed: ${getErrorMessage(error)}`, { cause: error });
    }

    if (!isSuccess(response.status)) {
      throw new AuthenticationError(
        `Token request failed (${response.status}): ${extractUpstreamMessage(response.data, response.status)}`,
        { status: response.status, code: extractUpstreamCode(response.data) }
      );
    }

    const parsed = TokenResponseSchema.safeParse(response.data);
    if (!parsed.success) {
      throw new AuthenticationError('Token response missing access token.', { status: response.status });
    }

    return {
      accessToken: parsed.data.access_token,
      expiresInSeconds: parsed.data.expires_in ?? DEFAULT_TOKEN_LIFETIME_SECONDS,
    };
  }

  async whoAmI(accessToken: string): Promise<unknown> {
    const response = await this.client.send('whoami', {
      method: 'GET',
      url: this.config.whoAmIUrl,
      headers: {
        Authorization: `Bearer ${accessToken}`,
        Accept: 'application/json',
      },
    });

    if (response.status === 401 || response.status === 403) {
      throw new AuthenticationError(
        `Who-am-I rejected the token (${response.status}): ${extractUpstreamMessage(response.data, response.status)}`,
        { status: response.status, code: extractUpstreamCode(response.data) }
      );
    }

    if (!isSuccess(response.status)) {
      throw new RegionResolutionError(
        `Who-am-I request failed (${response.status}): ${extractUpstreamMessage(response.data, response.status)}`,
        response.status
      );
    }

    return response.data;
  }
}
