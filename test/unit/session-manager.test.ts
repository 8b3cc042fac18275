import { describe, it, expect, beforeEach } from 'vitest';
import {
  AuthenticationError,
  NetworkError,
  NotAuthenticatedError,
  RegionResolutionError,
} from '../../src/errors/index.js';
import { CLIENT_ID, CLIENT_SECRET } from '../helpers/fake-upstream.js';
import { createHarness, type Harness } from '../helpers/harness.js';

const LIFETIME_MS = 3600 * 1000;
const SKEW_MS = 60_000;

describe('SessionManager', () => {
  let h: Harness;

  beforeEach(() => {
    h = createHarness();
  });

  describe('login', () => {
    it('should resolve tenant routing and reuse the token afterwards', async () => {
      const region = await h.sessionManager.login(CLIENT_ID, CLIENT_SECRET);

      expect(region).toEqual({
        tenantId: 'tenant-1',
        dataRegion: 'eu01',
        apiBase: 'https://api-eu01.example.test',
      });
      expect(await h.sessionManager.getValidToken()).toBe('token-1');
      expect(h.upstream.calls.token).toBe(1);
      expect(h.upstream.calls.whoami).toBe(1);
    });

    it('should trim surrounding whitespace from credentials', async () => {
      await h.sessionManager.login(`  ${CLIENT_ID} `, `${CLIENT_SECRET}\n`);

      expect(h.sessionManager.describe().authenticated).toBe(true);
    });

    it('should reject blank credentials without calling the identity provider', async () => {
      await expect(h.sessionManager.login('  ', CLIENT_SECRET)).rejects.toThrow('Client ID / Secret not set.');
      expect(h.upstream.calls.token).toBe(0);
    });

    it('should leave no session when credentials are rejected', async () => {
      const error = await h.sessionManager.login(CLIENT_ID, 'wrong-secret').catch((e: unknown) => e);

      expect(error).toBeInstanceOf(AuthenticationError);
      expect(error).toMatchObject({
        status: 401,
        code: 'invalid_client',
        message: 'Token request failed (401): Client authentication failed',
      });
      expect(h.upstream.calls.whoami).toBe(0);
      await expect(h.sessionManager.getValidToken()).rejects.toBeInstanceOf(NotAuthenticatedError);
    });

    it('should drop the previous session when a later login fails', async () => {
      await h.sessionManager.login(CLIENT_ID, CLIENT_SECRET);

      await expect(h.sessionManager.login(CLIENT_ID, 'wrong-secret')).rejects.toBeInstanceOf(AuthenticationError);

      expect(h.sessionManager.describe()).toEqual({ authenticated: false });
      expect(h.store.get().status).toBe('unauthenticated');
    });

    it('should fail with RegionResolutionError when the identity has no region', async () => {
      h.upstream.whoAmIBody = { id: 'tenant-1', idType: 'tenant' };

      await expect(h.sessionManager.login(CLIENT_ID, CLIENT_SECRET)).rejects.toThrow(
        new RegionResolutionError('Who-am-I response has no data region.')
      );
      expect(h.sessionManager.describe().authenticated).toBe(false);
    });

    it('should use the top-level data region when no regional host is given', async () => {
      h.upstream.whoAmIBody = { id: 'tenant-2', idType: 'tenant', dataRegion: 'us03' };

      const region = await h.sessionManager.login(CLIENT_ID, CLIENT_SECRET);

      expect(region).toEqual({
        tenantId: 'tenant-2',
        dataRegion: 'us03',
        apiBase: 'https://api-us03.example.test',
      });
    });

    it('should prefer the regional host over the top-level field', async () => {
      h.upstream.whoAmIBody = {
        id: 'tenant-3',
        dataRegion: 'us03',
        apiHosts: { dataRegion: 'https://api-eu02.example.test' },
      };

      const region = await h.sessionManager.login(CLIENT_ID, CLIENT_SECRET);

      expect(region.dataRegion).toBe('eu02');
    });

    it('should report a rejected who-am-I call as AuthenticationError', async () => {
      h.upstream.failures.set('whoami', { status: 403, body: { message: 'Forbidden' } });

      await expect(h.sessionManager.login(CLIENT_ID, CLIENT_SECRET)).rejects.toMatchObject({
        errorKind: 'AuthenticationError',
        status: 403,
      });
    });

    it('should wrap a token endpoint timeout in AuthenticationError', async () => {
      h.upstream.failures.set('token', { network: 'ECONNABORTED' });

      const error = await h.sessionManager.login(CLIENT_ID, CLIENT_SECRET).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(AuthenticationError);
      expect(error).toMatchObject({ message: 'Token request failed: Upstream token timed out after 1000ms' });
      expect(error instanceof Error ? error.cause : undefined).toBeInstanceOf(NetworkError);
    });
  });

  describe('getValidToken', () => {
    beforeEach(async () => {
      await h.sessionManager.login(CLIENT_ID, CLIENT_SECRET);
    });

    it('should not renew while outside the renewal window', async () => {
      h.clock.advance(LIFETIME_MS - SKEW_MS - 1);

      expect(await h.sessionManager.getValidToken()).toBe('token-1');
      expect(h.upstream.calls.token).toBe(1);
    });

    it('should renew once the renewal window is reached', async () => {
      h.clock.advance(LIFETIME_MS - SKEW_MS);

      expect(await h.sessionManager.getValidToken()).toBe('token-2');
      expect(h.upstream.calls.token).toBe(2);
      expect(h.upstream.calls.whoami).toBe(1);
    });

    it('should perform a single exchange for concurrent callers', async () => {
      h.clock.advance(LIFETIME_MS);

      const tokens = await Promise.all(Array.from({ length: 5 }, () => h.sessionManager.getValidToken()));

      expect(tokens).toEqual(['token-2', 'token-2', 'token-2', 'token-2', 'token-2']);
      expect(h.upstream.calls.token).toBe(2);
    });

    it('should share one failed renewal between concurrent callers', async () => {
      h.clock.advance(LIFETIME_MS);
      h.upstream.failures.set('token', { status: 500, body: { message: 'Service unavailable' } });

      const results = await Promise.allSettled(Array.from({ length: 5 }, () => h.sessionManager.getValidToken()));

      expect(results.map((result) => result.status)).toEqual(['rejected', 'rejected', 'rejected', 'rejected', 'rejected']);
      expect(h.upstream.calls.token).toBe(2);

      h.upstream.failures.clear();
      expect(await h.sessionManager.getValidToken()).toBe('token-3');
    });

    it('should keep tenant and region across renewals', async () => {
      h.clock.advance(LIFETIME_MS);
      await h.sessionManager.getValidToken();

      expect(h.sessionManager.describe()).toEqual({
        authenticated: true,
        tenantId: 'tenant-1',
        dataRegion: 'eu01',
        apiBase: 'https://api-eu01.example.test',
        expiresAt: new Date(h.clock.current + LIFETIME_MS).toISOString(),
      });
    });

    it('should keep the session untouched when renewal fails', async () => {
      h.clock.advance(LIFETIME_MS);
      h.upstream.failures.set('token', { status: 500, body: { message: 'Service unavailable' } });

      await expect(h.sessionManager.getValidToken()).rejects.toThrow('Token request failed (500): Service unavailable');

      const session = h.store.get();
      expect(session.status).toBe('authenticated');
      expect(session.status === 'authenticated' ? session.accessToken : undefined).toBe('token-1');

      h.upstream.failures.clear();
      expect(await h.sessionManager.getValidToken()).toBe('token-3');
    });

    it('should count renewals separately from logins', async () => {
      h.clock.advance(LIFETIME_MS);
      await h.sessionManager.getValidToken();

      const exchanges = await h.metrics.tokenExchangesTotal.get();
      const count = (purpose: string) =>
        exchanges.values.find((value) => value.labels.purpose === purpose)?.value;

      expect(count('login')).toBe(1);
      expect(count('renewal')).toBe(1);
    });
  });

  describe('describe', () => {
    it('should never expose the token or credentials', async () => {
      await h.sessionManager.login(CLIENT_ID, CLIENT_SECRET);

      const status = h.sessionManager.describe();

      expect(Object.keys(status).sort()).toEqual(['apiBase', 'authenticated', 'dataRegion', 'expiresAt', 'tenantId']);
      expect(JSON.stringify(status)).not.toContain(CLIENT_SECRET);
    });
  });
});
