import { describe, it, expect, beforeEach } from 'vitest';
import { NetworkError, NotAuthenticatedError, ProxyError } from '../../src/errors/index.js';
import { CLIENT_ID, CLIENT_SECRET } from '../helpers/fake-upstream.js';
import { createHarness, type Harness } from '../helpers/harness.js';

describe('SitesProxy', () => {
  let h: Harness;

  beforeEach(async () => {
    h = createHarness();
    await h.sessionManager.login(CLIENT_ID, CLIENT_SECRET);
  });

  describe('list', () => {
    it('should concatenate every page in order', async () => {
      h.upstream.seed(5);

      const result = await h.sitesProxy.list();

      expect(result.items.map((site) => site.id)).toEqual(['site-1', 'site-2', 'site-3', 'site-4', 'site-5']);
      expect(result.totalPages).toBe(3);
      expect(h.upstream.calls.list).toBe(3);
    });

    it('should fail the whole listing when a page fails', async () => {
      h.upstream.seed(5);
      h.upstream.failures.set('list:2', { status: 500, body: { message: 'Internal failure' } });

      const error = await h.sitesProxy.list().catch((e: unknown) => e);

      expect(error).toBeInstanceOf(ProxyError);
      expect(error).toMatchObject({ reason: 'Unknown', status: 500, message: 'Internal failure' });
      expect(h.upstream.calls.list).toBe(2);
    });

    it('should fetch a single page when all is false', async () => {
      h.upstream.seed(5);

      const result = await h.sitesProxy.list({ all: false, page: 2 });

      expect(result.items.map((site) => site.id)).toEqual(['site-3', 'site-4']);
      expect(result.totalPages).toBe(3);
      expect(h.upstream.calls.list).toBe(1);
      expect(h.upstream.lastRequest()?.params).toEqual({ pageTotal: 'true', page: '2' });
    });

    it('should omit the page total when not requested', async () => {
      h.upstream.seed(3);

      const result = await h.sitesProxy.list({ all: false, page: 1, pageTotal: false });

      expect(result).not.toHaveProperty('totalPages');
      expect(result.items).toHaveLength(2);
      expect(h.upstream.lastRequest()?.params).toEqual({ page: '1' });
    });

    it('should return an empty list for an empty collection', async () => {
      expect(await h.sitesProxy.list({ all: false, page: 1 })).toEqual({ items: [], totalPages: 0 });
      expect(await h.sitesProxy.list()).toEqual({ items: [], totalPages: 0 });
    });

    it('should send the bearer token and tenant header', async () => {
      await h.sitesProxy.list();

      const request = h.upstream.lastRequest();
      expect(request?.url).toBe('https://api-eu01.example.test/endpoint/v1/settings/web-control/local-sites');
      expect(request?.headers.get('Authorization')).toBe('Bearer token-1');
      expect(request?.headers.get('X-Tenant-ID')).toBe('tenant-1');
    });

    it('should use a renewed token once the old one nears expiry', async () => {
      h.clock.advance(3600 * 1000);

      await h.sitesProxy.list();

      expect(h.upstream.lastRequest()?.headers.get('Authorization')).toBe('Bearer token-2');
    });

    it('should read items from the legacy data field', async () => {
      h.upstream.failures.set('list:1', {
        status: 200,
        body: { data: [{ id: 'legacy-1', url: 'https://legacy.example.org' }], pages: { total: 1 } },
      });

      const result = await h.sitesProxy.list();

      expect(result).toEqual({ items: [{ id: 'legacy-1', url: 'https://legacy.example.org' }], totalPages: 1 });
    });

    it('should pass items through with null optional fields and unknown fields', async () => {
      h.upstream.failures.set('list:1', {
        status: 200,
        body: {
          items: [{ id: 'site-a', url: 'https://a.example.org', comment: null, categoryId: null, extra: 1 }],
          pages: { total: 1 },
        },
      });

      const result = await h.sitesProxy.list();

      expect(result).toEqual({
        items: [{ id: 'site-a', url: 'https://a.example.org', comment: null, categoryId: null, extra: 1 }],
        totalPages: 1,
      });
    });

    it('should reject a malformed page', async () => {
      h.upstream.failures.set('list:1', { status: 200, body: { items: [{ url: 'https://no-id.example.org' }] } });

      await expect(h.sitesProxy.list()).rejects.toMatchObject({
        errorKind: 'ProxyError',
        reason: 'Unknown',
        message: 'Local sites page 1 is malformed.',
      });
    });

    it('should report a timeout as NetworkError', async () => {
      h.upstream.failures.set('list', { network: 'ECONNABORTED' });

      const error = await h.sitesProxy.list().catch((e: unknown) => e);

      expect(error).toBeInstanceOf(NetworkError);
      expect(error).toMatchObject({ code: 'ECONNABORTED', message: 'Upstream list timed out after 1000ms' });
    });

    it('should report a refused connection as NetworkError', async () => {
      h.upstream.failures.set('list', { network: 'ECONNREFUSED' });

      await expect(h.sitesProxy.list()).rejects.toThrow(new NetworkError('Upstream list failed: connect ECONNREFUSED'));
    });

    it('should require a session', async () => {
      const anonymous = createHarness();

      await expect(anonymous.sitesProxy.list()).rejects.toBeInstanceOf(NotAuthenticatedError);
      expect(anonymous.upstream.calls.list).toBe(0);
    });
  });

  describe('create and delete', () => {
    it('should create, delete, then report the second delete as not found', async () => {
      const created = await h.sitesProxy.create({
        url: ' https://new.example.org ',
        tags: ['allow', 'allow', 'marketing'],
        comment: 'added from test',
      });

      expect(created).toEqual({
        id: 'site-1',
        url: 'https://new.example.org',
        tags: ['allow', 'marketing'],
        comment: 'added from test',
      });
      expect(await h.sitesProxy.delete(created.id)).toEqual({ ok: true });

      const error = await h.sitesProxy.delete(created.id).catch((e: unknown) => e);
      expect(error).toBeInstanceOf(ProxyError);
      expect(error).toMatchObject({ reason: 'NotFound', status: 404, message: 'Local site site-1 not found' });
    });

    it('should send a category id when given', async () => {
      const created = await h.sitesProxy.create({ url: 'https://category.example.org', categoryId: 12 });

      expect(created).toEqual({ id: 'site-1', url: 'https://category.example.org', categoryId: 12 });
    });

    it('should reject a blank url locally', async () => {
      await expect(h.sitesProxy.create({ url: '   ' })).rejects.toMatchObject({
        reason: 'Validation',
        status: 400,
        message: 'URL is required.',
      });
      expect(h.upstream.calls.create).toBe(0);
    });

    it('should pass the remote validation message through', async () => {
      await expect(h.sitesProxy.create({ url: 'https://bare.example.org' })).rejects.toMatchObject({
        reason: 'Validation',
        status: 400,
        message: 'Either tags or categoryId is required',
      });
    });

    it('should report a conflict as a validation failure', async () => {
      h.upstream.failures.set('create', { status: 409, body: { message: 'Site already exists' } });

      await expect(h.sitesProxy.create({ url: 'https://dup.example.org', tags: ['x'] })).rejects.toMatchObject({
        reason: 'Validation',
        status: 409,
        message: 'Site already exists',
      });
    });

    it('should encode the id in the delete path', async () => {
      await expect(h.sitesProxy.delete('a/b')).rejects.toMatchObject({
        reason: 'NotFound',
        message: 'Local site a/b not found',
      });
      expect(h.upstream.lastRequest()?.url).toBe(
        'https://api-eu01.example.test/endpoint/v1/settings/web-control/local-sites/a%2Fb'
      );
    });

    it('should reject a blank id locally', async () => {
      await expect(h.sitesProxy.delete(' ')).rejects.toThrow(new ProxyError('Validation', 'Local site id is required.'));
      expect(h.upstream.calls.delete).toBe(0);
    });
  });
});
