import type { FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import type { SitesProxy } from '../services/sites-proxy.service.js';
import type { CreateLocalSiteInput } from '../types/local-site.types.js';
import { logger as defaultLogger, type StructuredLogger } from '../services/logger.service.js';
import { sendError } from './error-reply.js';

export interface LocalSitesRoutesOptions {
  sitesProxy: SitesProxy;
  logger?: StructuredLogger;
}

interface ListQuery {
  all?: boolean;
  page?: number;
  pageTotal?: boolean;
}

interface SiteParams {
  id: string;
}

// Remote items are returned as received, unknown fields included
const localSiteSchema = {
  type: 'object',
  additionalProperties: true,
  properties: {
    id: { type: 'string' },
    url: { type: 'string' },
    tags: { type: ['array', 'null'], items: { type: 'string' } },
    categoryId: { type: ['integer', 'null'] },
    comment: { type: ['string', 'null'] }
  }
};

const errorResponseSchema = {
  type: 'object',
  properties: {
    ok: { type: 'boolean' },
    errorKind: { type: 'string' },
    reason: { type: 'string' },
    status: { type: 'number' },
    error: { type: 'string' }
  }
};

const errorResponses = {
  401: errorResponseSchema,
  404: errorResponseSchema,
  409: errorResponseSchema,
  422: errorResponseSchema,
  502: errorResponseSchema,
  504: errorResponseSchema
};

export async function localSitesRoutes(fastify: FastifyInstance, options: LocalSitesRoutesOptions) {
  const { sitesProxy } = options;
  const logger = options.logger ?? defaultLogger;

  // GET /api/local-sites - List local sites (every page by default)
  fastify.get<{ Querystring: ListQuery }>('/api/local-sites', {
    schema: {
      description: 'List local sites. With all=true every page is fetched and concatenated in page order.',
      tags: ['Local Sites'],
      querystring: {
        type: 'object',
        properties: {
          all: { type: 'boolean', default: true },
          page: { type: 'integer', minimum: 1, default: 1 },
          pageTotal: { type: 'boolean', default: true }
        }
      },
      response: {
        200: {
          type: 'object',
          properties: {
            ok: { type: 'boolean' },
            items: { type: 'array', items: localSiteSchema },
            totalPages: { type: 'integer' }
          }
        },
        ...errorResponses
      }
    }
  }, async (request: FastifyRequest<{ Querystring: ListQuery }>, reply: FastifyReply) => {
    try {
      const result = await sitesProxy.list(request.query);
      return reply.code(200).send({ ok: true, ...result });
    } catch (error) {
      return sendError(reply, error, logger);
    }
  });

  // POST /api/local-sites - Create a local site
  fastify.post<{ Body: CreateLocalSiteInput }>('/api/local-sites', {
    schema: {
      description: 'Create a local site. Pass either tags or categoryId; the remote API enforces which.',
      tags: ['Local Sites'],
      body: {
        type: 'object',
        required: ['url'],
        properties: {
          url: { type: 'string', minLength: 1 },
          tags: { type: 'array', items: { type: 'string' } },
          categoryId: { type: 'integer' },
          comment: { type: 'string' }
        }
      },
      response: {
        201: {
          type: 'object',
          properties: {
            ok: { type: 'boolean' },
            item: localSiteSchema
          }
        },
        ...errorResponses
      }
    }
  }, async (request: FastifyRequest<{ Body: CreateLocalSiteInput }>, reply: FastifyReply) => {
    try {
      const item = await sitesProxy.create(request.body);
      return reply.code(201).send({ ok: true, item });
    } catch (error) {
      return sendError(reply, error, logger);
    }
  });

  // DELETE /api/local-sites/:id - Delete a local site
  fastify.delete<{ Params: SiteParams }>('/api/local-sites/:id', {
    schema: {
      description: 'Delete a local site by id. An id the remote API does not know answers 404.',
      tags: ['Local Sites'],
      params: {
        type: 'object',
        required: ['id'],
        properties: {
          id: { type: 'string', minLength: 1 }
        }
      },
      response: {
        200: {
          type: 'object',
          properties: {
            ok: { type: 'boolean' }
          }
        },
        ...errorResponses
      }
    }
  }, async (request: FastifyRequest<{ Params: SiteParams }>, reply: FastifyReply) => {
    try {
      return reply.code(200).send(await sitesProxy.delete(request.params.id));
    } catch (error) {
      return sendError(reply, error, logger);
    }
  });
}
