import Fastify, { type FastifyInstance } from 'fastify';
import swagger from '@fastify/swagger';
import swaggerUi from '@fastify/swagger-ui';
import { config } from './config/env.js';
import { authRoutes } from './routes/auth.routes.js';
import { localSitesRoutes } from './routes/local-sites.routes.js';
import { uiRoutes } from './routes/ui.routes.js';
import type { SessionManager } from './services/session-manager.service.js';
import type { SitesProxy } from './services/sites-proxy.service.js';
import { metrics as defaultMetrics, type MetricsService } from './services/metrics.service.js';
import { logger as defaultLogger, REDACT_PATHS, type StructuredLogger } from './services/logger.service.js';

export interface AppDependencies {
  sessionManager: SessionManager;
  sitesProxy: SitesProxy;
  metrics?: MetricsService;
  logger?: StructuredLogger;
  corsDefaultOrigin?: string;
  enableDocs?: boolean;
  indexPath?: string;
}

const CORS_ALLOWED_HEADERS = 'Content-Type, Authorization, X-Tenant-ID';
const CORS_ALLOWED_METHODS = 'GET, POST, DELETE, OPTIONS';

/**
 * Origin echoed back to the browser. Any localhost origin is reflected,
 * everything else gets the configured default.
 */
export function resolveCorsOrigin(origin: string | undefined, defaultOrigin: string): string {
  if (origin && origin.startsWith('http://localhost')) {
    return origin;
  }
  return defaultOrigin;
}

export async function buildApp(deps: AppDependencies): Promise<FastifyInstance> {
  const metrics = deps.metrics ?? defaultMetrics;
  const logger = deps.logger ?? defaultLogger;
  const corsDefaultOrigin = deps.corsDefaultOrigin ?? config.corsDefaultOrigin;

  const fastify = Fastify({
    logger: {
      level: config.logLevel,
      redact: REDACT_PATHS,
      transport: config.nodeEnv === 'development' ? {
        target: 'pino-pretty',
        options: {
          translateTime: 'HH:MM:ss Z',
          ignore: 'pid,hostname'
        }
      } : undefined
    }
  });

  // Swagger hooks onRoute, so it goes in before any route
  await fastify.register(swagger, {
    openapi: {
      info: {
        title: 'Local Sites Proxy API',
        description: 'Local backend that authenticates against the management API and proxies the local sites collection',
        version: '1.0.0'
      },
      tags: [
        { name: 'Session', description: 'Login and session status' },
        { name: 'Local Sites', description: 'List, create and delete local sites' },
        { name: 'Health', description: 'Health and monitoring endpoints' }
      ]
    }
  });

  if (deps.enableDocs ?? true) {
    await fastify.register(swaggerUi, {
      routePrefix: '/docs',
      uiConfig: {
        docExpansion: 'list',
        deepLinking: true,
        displayRequestDuration: true
      },
      staticCSP: true
    });
  }

  // CORS for the browser UI
  fastify.addHook('onSend', async (request, reply, payload) => {
    if (request.url.startsWith('/api/')) {
      reply.header('Access-Control-Allow-Origin', resolveCorsOrigin(request.headers.origin, corsDefaultOrigin));
      reply.header('Access-Control-Allow-Credentials', 'true');
      reply.header('Access-Control-Allow-Headers', CORS_ALLOWED_HEADERS);
      reply.header('Access-Control-Allow-Methods', CORS_ALLOWED_METHODS);
    }
    return payload;
  });

  // Metrics tracking
  fastify.addHook('onResponse', async (request, reply) => {
    const route = request.routeOptions.url || request.url;
    metrics.recordApiRequest(request.method, route, reply.statusCode, reply.elapsedTime / 1000);
  });

  fastify.options('/api/*', { schema: { hide: true } }, async (_request, reply) => {
    return reply.code(204).send();
  });

  await fastify.register(uiRoutes, { indexPath: deps.indexPath });
  await fastify.register(authRoutes, { sessionManager: deps.sessionManager, logger });
  await fastify.register(localSitesRoutes, { sitesProxy: deps.sitesProxy, logger });

  // Health check endpoint
  fastify.get('/health', {
    schema: {
      description: 'Health check endpoint - process status and session summary',
      tags: ['Health'],
      response: {
        200: {
          description: 'Service is up',
          type: 'object',
          properties: {
            status: { type: 'string' },
            timestamp: { type: 'string', format: 'date-time' },
            session: {
              type: 'object',
              properties: {
                authenticated: { type: 'boolean' },
                tenantId: { type: 'string' },
                dataRegion: { type: 'string' },
                apiBase: { type: 'string' },
                expiresAt: { type: 'string', format: 'date-time' }
              }
            }
          }
        }
      }
    }
  }, async () => {
    return {
      status: 'ok',
      timestamp: new Date().toISOString(),
      session: deps.sessionManager.describe()
    };
  });

  // Metrics endpoint
  fastify.get('/metrics', {
    schema: {
      description: 'Prometheus metrics endpoint - returns metrics in Prometheus text format',
      tags: ['Health'],
      response: {
        200: {
          description: 'Prometheus metrics',
          type: 'string'
        },
        500: {
          description: 'Failed to generate metrics',
          type: 'object',
          properties: {
            error: { type: 'string' }
          }
        }
      }
    }
  }, async (_request, reply) => {
    try {
      const metricsOutput = await metrics.getMetrics();
      reply.type(metrics.getContentType());
      return metricsOutput;
    } catch (error) {
      logger.error('Failed to generate metrics', { error });
      reply.code(500);
      return { error: 'Failed to generate metrics' };
    }
  });

  return fastify;
}
