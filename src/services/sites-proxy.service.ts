import type { AxiosInstance, AxiosRequestConfig } from 'axios';
import { UpstreamHttpClient, type UpstreamResponse } from '../providers/upstream-http.client.js';
import { ProxyError, extractUpstreamMessage, mapUpstreamError } from '../errors/index.js';
import {
  LocalSiteSchema,
  LocalSitesPageSchema,
  type CreateLocalSiteInput,
  type DeleteResult,
  type ListOptions,
  type ListResult,
  type LocalSite,
} from '../types/local-site.types.js';
import type { AccessContext } from '../types/session.types.js';
import type { AccessContextProvider } from './session-manager.service.js';
import { logger as defaultLogger, type StructuredLogger } from './logger.service.js';
import type { MetricsService } from './metrics.service.js';

export interface SitesProxyConfig {
  session: AccessContextProvider;
  localSitesPath?: string;
  timeoutMs?: number;
  http?: AxiosInstance;
  logger?: StructuredLogger;
  metrics?: MetricsService;
}

export const DEFAULT_LIST_OPTIONS: ListOptions = {
  all: true,
  page: 1,
  pageTotal: true,
};

interface PageResult {
  items: LocalSite[];
  totalPages?: number;
}

/**
 * Sites Proxy
 *
 * Translates local site operations into calls against the remote
 * paginated collection. Every call asks the session for a fresh access
 * context first, so renewals are always respected.
 *
 * - list: single page, or every page fetched sequentially (all-or-nothing)
 * - create: only `url` checked locally, everything else is up to the remote API
 * - delete: remote 404 is reported as ProxyError{NotFound}
 *
 * No call is retried here.
 */
export class SitesProxy {
  private readonly session: AccessContextProvider;
  private readonly localSitesPath: string;
  private readonly client: UpstreamHttpClient;
  private readonly logger: StructuredLogger;

  constructor(config: SitesProxyConfig) {
    this.session = config.session;
    this.localSitesPath = config.localSitesPath ?? '/endpoint/v1/settings/web-control/local-sites';
    this.logger = config.logger ?? defaultLogger;
    this.client = new UpstreamHttpClient({
      timeoutMs: config.timeoutMs ?? 30000, // 30 seconds default
      http: config.http,
      logger: this.logger,
      metrics: config.metrics,
    });
  }

  async list(options: Partial<ListOptions> = {}): Promise<ListResult> {
    const { all, page, pageTotal } = { ...DEFAULT_LIST_OPTIONS, ...options };
    const context = await this.session.getAccessContext();

    if (!all) {
      const result = await this.fetchPage(context, page > 0 ? page : undefined, pageTotal);
      return pageTotal ? result : { items: result.items };
    }

    const result = await this.collectAllPages(context);
    this.logger.debug(`Listed ${result.items.length} local sites across ${result.totalPages} page(s)`, {
      tenantId: context.tenantId,
      operation: 'list',
    });
    return result;
  }

  async create(input: CreateLocalSiteInput): Promise<LocalSite> {
    const url = input.url.trim();
    if (!url) {
      throw new ProxyError('Validation', 'URL is required.', 400);
    }

    const payload: Record<string, unknown> = { url };
    const tags = [...new Set(input.tags ?? [])];
    if (tags.length > 0) {
      payload.tags = tags;
    }
    if (input.comment) {
      payload.comment = input.comment;
    }
    if (input.categoryId !== undefined) {
      payload.categoryId = input.categoryId;
    }

    const context = await this.session.getAccessContext();
    const response = await this.call('create', context, {
      method: 'POST',
      url: this.collectionUrl(context),
      data: payload,
    });
    this.assertStatus('create', context, response, [200, 201]);

    const parsed = LocalSiteSchema.safeParse(response.data);
    if (!parsed.success) {
      throw new ProxyError('Unknown', 'Create response is not a local site.', response.status, parsed.error);
    }

    this.logger.info(`Local site created: ${parsed.data.id}`, { tenantId: context.tenantId, operation: 'create' });
    return parsed.data;
  }

  async delete(id: string): Promise<DeleteResult> {
    if (!id.trim()) {
      throw new ProxyError('Validation', 'Local site id is required.', 400);
    }

    const context = await this.session.getAccessContext();
    const response = await this.call('delete', context, {
      method: 'DELETE',
      url: `${this.collectionUrl(context)}/${encodeURIComponent(id)}`,
    });
    this.assertStatus('delete', context, response, [200, 204]);

    this.logger.info(`Local site deleted: ${id}`, { tenantId: context.tenantId, operation: 'delete' });
    return { ok: true };
  }

  /**
   * Fold over pages 1..total. The first failure aborts the whole listing.
   */
  private async collectAllPages(context: AccessContext): Promise<ListResult & { totalPages: number }> {
    const first = await this.fetchPage(context, 1, true);
    const totalPages = first.totalPages ?? 1;

    let items = first.items;
    for (let page = 2; page <= totalPages; page += 1) {
      const next = await this.fetchPage(context, page, true);
      items = [...items, ...next.items];
    }

    return { items, totalPages };
  }

  private async fetchPage(context: AccessContext, page: number | undefined, pageTotal: boolean): Promise<PageResult> {
    const params: Record<string, string> = {};
    if (pageTotal) {
      params.pageTotal = 'true';
    }
    if (page !== undefined) {
      params.page = String(page);
    }

    const response = await this.call('list', context, {
      method: 'GET',
      url: this.collectionUrl(context),
      params,
    });
    this.assertStatus('list', context, response, [200]);

    const parsed = LocalSitesPageSchema.safeParse(response.data);
    if (!parsed.success) {
      throw new ProxyError('Unknown', `Local sites page ${page ?? 1} is malformed.`, response.status, parsed.error);
    }

    return {
      items: parsed.data.items ?? parsed.data.data ?? [],
      totalPages: parsed.data.pages?.total ?? undefined,
    };
  }

  private call(operation: string, context: AccessContext, request: AxiosRequestConfig): Promise<UpstreamResponse> {
    return this.client.send(operation, {
      ...request,
      headers: {
        Authorization: `Bearer ${context.accessToken}`,
        'X-Tenant-ID': context.tenantId,
        'Content-Type': 'application/json',
        Accept: 'application/json',
      },
    });
  }

  private assertStatus(
    operation: string,
    context: AccessContext,
    response: UpstreamResponse,
    accepted: readonly number[]
  ): void {
    if (accepted.includes(response.status)) {
      return;
    }

    const error = mapUpstreamError(response.status, extractUpstreamMessage(response.data, response.status));
    this.logger.upstreamFailed({
      operation,
      tenantId: context.tenantId,
      http_status: response.status,
      error_kind: `${error.errorKind}:${error.reason}`,
      error: error.message,
    });
    throw error;
  }

  private collectionUrl(context: AccessContext): string {
    return `${context.apiBase}${this.localSitesPath}`;
  }
}
