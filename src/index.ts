import { config } from './config/env.js';
import { buildApp } from './app.js';
import { CentralAuthProvider } from './providers/central-auth.provider.js';
import { RegionResolver } from './services/region-resolver.service.js';
import { TokenStore } from './services/token-store.service.js';
import { SessionManager } from './services/session-manager.service.js';
import { SitesProxy } from './services/sites-proxy.service.js';
import { createGracefulShutdown } from './services/graceful-shutdown.service.js';
import { metrics } from './services/metrics.service.js';
import { logger } from './services/logger.service.js';

const start = async () => {
  console.log('⚙️  Starting local sites proxy...');
  console.log(`   Token endpoint: ${config.authTokenUrl}`);
  console.log(`   Who-am-I endpoint: ${config.whoAmIUrl}`);
  console.log(`   API host template: ${config.apiHostTemplate}`);
  console.log('');

  // One of each, passed by handle
  const store = new TokenStore();
  const sessionManager = new SessionManager({
    store,
    authClient: new CentralAuthProvider({
      tokenUrl: config.authTokenUrl,
      whoAmIUrl: config.whoAmIUrl,
      timeoutMs: config.authTimeoutMs,
      logger,
      metrics,
    }),
    regionResolver: new RegionResolver({ apiHostTemplate: config.apiHostTemplate }),
    renewalSkewMs: config.tokenRenewalSkewMs,
    logger,
    metrics,
  });

  const sitesProxy = new SitesProxy({
    session: sessionManager,
    localSitesPath: config.localSitesPath,
    timeoutMs: config.upstreamTimeoutMs,
    logger,
    metrics,
  });

  console.log('⚙️  Configuring Fastify...');
  const fastify = await buildApp({
    sessionManager,
    sitesProxy,
    metrics,
    logger,
    corsDefaultOrigin: config.corsDefaultOrigin,
  });
  console.log('✅ Routes registered\n');

  const gracefulShutdown = createGracefulShutdown({
    timeout: config.shutdownTimeoutMs,
    forceTimeout: config.forceShutdownTimeoutMs,
    logger,

    onShutdownStart: async () => {
      console.log('🛑 Closing HTTP server...');
      await fastify.close();
    },

    onBeforeExit: () => {
      console.log('🧹 Discarding in-memory session...');
      store.clear();
      metrics.setSessionAuthenticated(false);
    },
  });

  gracefulShutdown.registerHandlers();

  try {
    await fastify.ready();
    await fastify.listen({ port: config.port, host: config.host });
    console.log(`✅ Server running on http://${config.host}:${config.port}`);
    console.log(`📘 API docs on http://${config.host}:${config.port}/docs`);
  } catch (err) {
    fastify.log.error(err);
    process.exit(1);
  }
};

start().catch((error: unknown) => {
  logger.error('Failed to start', { error });
  process.exit(1);
});
