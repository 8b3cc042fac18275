import { RegionResolutionError } from '../errors/index.js';
import { WhoAmIResponseSchema, type RegionContext, type WhoAmIResponse } from '../types/session.types.js';

/**
 * One way of reading the data region out of a who-am-I payload
 */
export interface RegionExtractionStrategy {
  name: string;
  extract(identity: WhoAmIResponse): string | undefined;
}

const REGION_CODE_PATTERN = /^[a-z0-9-]+$/i;
const REGION_HOST_PATTERN = /^api-([a-z0-9-]+)\./i;

/**
 * `apiHosts.dataRegion` holds the regional host, e.g.
 * https://api-eu01.central.sophos.com -> eu01
 */
export const nestedHostStrategy: RegionExtractionStrategy = {
  name: 'apiHosts.dataRegion',
  extract(identity) {
    const host = identity.apiHosts?.dataRegion;
    if (!host) {
      return undefined;
    }
    try {
      const match = REGION_HOST_PATTERN.exec(new URL(host).hostname);
      return match?.[1];
    } catch {
      return undefined;
    }
  },
};

export const topLevelStrategy: RegionExtractionStrategy = {
  name: 'dataRegion',
  extract(identity) {
    return identity.dataRegion || undefined;
  },
};

export const DEFAULT_REGION_STRATEGIES: readonly RegionExtractionStrategy[] = [
  nestedHostStrategy,
  topLevelStrategy,
];

export interface RegionResolverConfig {
  apiHostTemplate: string; // must contain {region}
  strategies?: readonly RegionExtractionStrategy[];
}

/**
 * Region Resolver
 *
 * Turns a who-am-I payload into tenant routing data. Strategies are
 * tried in order and the first one that yields a region wins.
 */
export class RegionResolver {
  private readonly apiHostTemplate: string;
  private readonly strategies: readonly RegionExtractionStrategy[];

  constructor(config: RegionResolverConfig) {
    this.apiHostTemplate = config.apiHostTemplate;
    this.strategies = config.strategies ?? DEFAULT_REGION_STRATEGIES;
  }

  resolve(payload: unknown): RegionContext {
    const parsed = WhoAmIResponseSchema.safeParse(payload);
    if (!parsed.success) {
      throw new RegionResolutionError('Who-am-I response is malformed.', undefined, parsed.error);
    }

    const identity = parsed.data;
    const tenantId = identity.id || identity.tenantId;
    if (!tenantId) {
      throw new RegionResolutionError('Who-am-I response has no tenant id.');
    }

    const dataRegion = this.extractRegion(identity)?.toLowerCase();
    if (!dataRegion) {
      throw new RegionResolutionError('Who-am-I response has no data region.');
    }

    return {
      tenantId,
      dataRegion,
      apiBase: this.deriveApiBase(dataRegion),
    };
  }

  /**
   * Builds the regional API base URL from the host template
   */
  deriveApiBase(dataRegion: string): string {
    if (!REGION_CODE_PATTERN.test(dataRegion)) {
      throw new RegionResolutionError(`Data region "${dataRegion}" is not a valid region code.`);
    }
    return this.apiHostTemplate.replace('{region}', dataRegion.toLowerCase()).replace(/\/$/, '');
  }

  private extractRegion(identity: WhoAmIResponse): string | undefined {
    for (const strategy of this.strategies) {
      const region = strategy.extract(identity);
      if (region) {
        return region;
      }
    }
    return undefined;
  }
}
