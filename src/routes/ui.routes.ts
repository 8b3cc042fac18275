import type { FastifyInstance } from 'fastify';
import { readFile } from 'fs/promises';
import { fileURLToPath } from 'url';
import { dirname, resolve } from 'path';

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

export const DEFAULT_INDEX_PATH = resolve(__dirname, '../../public/index.html');

export interface UiRoutesOptions {
  indexPath?: string;
}

export async function uiRoutes(fastify: FastifyInstance, options: UiRoutesOptions) {
  const indexHtml = await readFile(options.indexPath ?? DEFAULT_INDEX_PATH, 'utf-8');

  // GET / - Static UI document
  fastify.get('/', { schema: { hide: true } }, async (_request, reply) => {
    return reply.type('text/html; charset=utf-8').send(indexHtml);
  });
}
