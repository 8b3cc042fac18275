import dotenv from 'dotenv';
import { fileURLToPath } from 'url';
import { dirname, resolve } from 'path';

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

// Load .env from project root
dotenv.config({ path: resolve(__dirname, '../../.env') });

export interface Config {
  port: number;
  host: string;
  nodeEnv: string;
  logLevel: string;
  authTokenUrl: string;
  whoAmIUrl: string;
  apiHostTemplate: string;
  localSitesPath: string;
  tokenRenewalSkewMs: number;
  authTimeoutMs: number;
  upstreamTimeoutMs: number;
  corsDefaultOrigin: string;
  shutdownTimeoutMs: number;
  forceShutdownTimeoutMs: number;
}

const nodeEnv = process.env.NODE_ENV || 'development';

const defaultLogLevel = (env: string): string => {
  if (env === 'test') {
    return 'silent';
  }
  return env === 'production' ? 'info' : 'debug';
};

export const config: Config = {
  port: parseInt(process.env.PORT || '5000', 10),
  host: process.env.HOST || '127.0.0.1',
  nodeEnv,
  logLevel: process.env.LOG_LEVEL || defaultLogLevel(nodeEnv),
  authTokenUrl: process.env.AUTH_TOKEN_URL || 'https://id.sophos.com/api/v2/oauth2/token',
  whoAmIUrl: process.env.WHOAMI_URL || 'https://api.central.sophos.com/whoami/v1',
  apiHostTemplate: process.env.API_HOST_TEMPLATE || 'https://api-{region}.central.sophos.com',
  localSitesPath: process.env.LOCAL_SITES_PATH || '/endpoint/v1/settings/web-control/local-sites',
  tokenRenewalSkewMs: parseInt(process.env.TOKEN_RENEWAL_SKEW_MS || '60000', 10), // 60 seconds
  authTimeoutMs: parseInt(process.env.AUTH_TIMEOUT_MS || '20000', 10),
  upstreamTimeoutMs: parseInt(process.env.UPSTREAM_TIMEOUT_MS || '30000', 10),
  corsDefaultOrigin: process.env.CORS_DEFAULT_ORIGIN || 'http://localhost:5000',
  shutdownTimeoutMs: parseInt(process.env.SHUTDOWN_TIMEOUT_MS || '10000', 10),
  forceShutdownTimeoutMs: parseInt(process.env.FORCE_SHUTDOWN_TIMEOUT_MS || '20000', 10),
};
