import axios from 'axios';
import type { AxiosInstance, AxiosRequestConfig } from 'axios';
import { NetworkError } from '../errors/index.js';
import { logger as defaultLogger, type StructuredLogger } from '../services/logger.service.js';
import { metrics as defaultMetrics, type MetricsService } from '../services/metrics.service.js';

export interface UpstreamHttpClientConfig {
  timeoutMs: number;
  http?: AxiosInstance;
  logger?: StructuredLogger;
  metrics?: MetricsService;
}

/**
 * Raw upstream answer. Any HTTP status resolves; only transport
 * failures reject.
 */
export interface UpstreamResponse {
  status: number;
  data: unknown;
}

/**
 * Upstream HTTP Client
 *
 * Thin wrapper over axios used for every remote call:
 * - bounded by a per-request timeout
 * - every status code resolves, callers decide what counts as success
 * - timeouts and connection failures become NetworkError
 * - request count and duration recorded per operation
 */
export class UpstreamHttpClient {
  private readonly http: AxiosInstance;
  private readonly timeoutMs: number;
  private readonly logger: StructuredLogger;
  private readonly metrics: MetricsService;

  constructor(config: UpstreamHttpClientConfig) {
    this.http = config.http ?? axios.create();
    this.timeoutMs = config.timeoutMs;
    this.logger = config.logger ?? defaultLogger;
    this.metrics = config.metrics ?? defaultMetrics;
  }

  async send(operation: string, request: AxiosRequestConfig): Promise<UpstreamResponse> {
    const method = (request.method ?? 'GET').toUpperCase();
    const url = request.url ?? '';
    const startTime = Date.now();

    try {
      const response = await this.http.request<unknown>({
        ...request,
        timeout: this.timeoutMs,
        validateStatus: () => true,
      });
      this.record(operation, response.status, startTime);
      this.logger.upstreamRequest({ operation, method, url, http_status: response.status });
      return { status: response.status, data: response.data };
    } catch (error) {
      if (axios.isAxiosError(error) && error.response) {
        this.record(operation, error.response.status, startTime);
        return { status: error.response.status, data: error.response.data };
      }

      this.record(operation, 0, startTime);
      const networkError = this.toNetworkError(operation, error);
      this.logger.upstreamFailed({
        operation,
        error_kind: networkError.errorKind,
        error: networkError.message,
        code: networkError.code,
      });
      throw networkError;
    }
  }

  private toNetworkError(operation: string, error: unknown): NetworkError {
    if (!axios.isAxiosError(error)) {
      const message = error instanceof Error ? error.message : String(error);
      return new NetworkError(`Upstream ${operation} failed: ${message}`, undefined, error);
    }

    const code = error.code;
    if (code === 'ECONNABORTED' || code === 'ETIMEDOUT') {
      return new NetworkError(`Upstream ${operation} timed out after ${this.timeoutMs}ms`, code, error);
    }
    return new NetworkError(`Upstream ${operation} failed: ${error.message}`, code, error);
  }

  private record(operation: string, statusCode: number, startTime: number): void {
    this.metrics.recordUpstreamRequest(operation, statusCode, (Date.now() - startTime) / 1000);
  }
}
