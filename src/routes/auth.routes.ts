import type { FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import type { SessionManager } from '../services/session-manager.service.js';
import { logger as defaultLogger, type StructuredLogger } from '../services/logger.service.js';
import { sendError } from './error-reply.js';

export interface AuthRoutesOptions {
  sessionManager: SessionManager;
  logger?: StructuredLogger;
}

interface LoginBody {
  clientId: string;
  clientSecret: string;
}

const errorResponseSchema = {
  type: 'object',
  properties: {
    ok: { type: 'boolean' },
    errorKind: { type: 'string' },
    status: { type: 'number' },
    error: { type: 'string' }
  }
};

export async function authRoutes(fastify: FastifyInstance, options: AuthRoutesOptions) {
  const { sessionManager } = options;
  const logger = options.logger ?? defaultLogger;

  // POST /api/login - Exchange client credentials and resolve tenant/region
  fastify.post<{ Body: LoginBody }>('/api/login', {
    schema: {
      description: 'Authenticate with a client ID/secret pair. Credentials stay in process memory only.',
      tags: ['Session'],
      body: {
        type: 'object',
        required: ['clientId', 'clientSecret'],
        properties: {
          clientId: { type: 'string', minLength: 1 },
          clientSecret: { type: 'string', minLength: 1 }
        }
      },
      response: {
        200: {
          description: 'Authenticated',
          type: 'object',
          properties: {
            ok: { type: 'boolean' },
            tenantId: { type: 'string' },
            dataRegion: { type: 'string' },
            apiBase: { type: 'string' }
          }
        },
        401: errorResponseSchema,
        502: errorResponseSchema,
        504: errorResponseSchema
      }
    }
  }, async (request: FastifyRequest<{ Body: LoginBody }>, reply: FastifyReply) => {
    try {
      const region = await sessionManager.login(request.body.clientId, request.body.clientSecret);
      return reply.code(200).send({ ok: true, ...region });
    } catch (error) {
      return sendError(reply, error, logger);
    }
  });

  // GET /api/session - Current session summary (never the token)
  fastify.get('/api/session', {
    schema: {
      description: 'Current session status',
      tags: ['Session'],
      response: {
        200: {
          type: 'object',
          properties: {
            ok: { type: 'boolean' },
            authenticated: { type: 'boolean' },
            tenantId: { type: 'string' },
            dataRegion: { type: 'string' },
            apiBase: { type: 'string' },
            expiresAt: { type: 'string', format: 'date-time' }
          }
        }
      }
    }
  }, async () => {
    return { ok: true, ...sessionManager.describe() };
  });
}
