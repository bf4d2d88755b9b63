/**
 * Memoized SDK resolution, keyed by (name, version)
 */

import { consoleLogger } from './logger.js';
import { getOrCreate } from './memo.js';
import type { Logger, SdkReference, SdkResolution, SdkResolutionRequest, SdkResult } from './types.js';

export interface SdkResolutionCacheOptions {
  logger?: Logger;
}

function cacheKey(sdk: SdkReference): string {
  return `${sdk.name.toLowerCase()}\0${(sdk.version ?? '').toLowerCase()}`;
}

/**
 * The first request for a pair delegates; its outcome (success, failure
 * result or rejection) is returned for every later request.
 */
export class SdkResolutionCache {
  private readonly results = new Map<string, Promise<SdkResult>>();
  private readonly versionsByName = new Map<string, string[]>();
  private readonly logger: Logger;

  constructor(options: SdkResolutionCacheOptions = {}) {
    this.logger = options.logger ?? consoleLogger;
  }

  resolve(sdk: SdkReference, resolver: SdkResolution, request?: SdkResolutionRequest): Promise<SdkResult> {
    const key = cacheKey(sdk);
    if (!this.results.has(key)) {
      this.trackVersion(sdk);
    }
    return getOrCreate(this.results, key, () => resolver.resolveSdk(sdk, request));
  }

  has(sdk: SdkReference): boolean {
    return this.results.has(cacheKey(sdk));
  }

  get size(): number {
    return this.results.size;
  }

  private trackVersion(sdk: SdkReference): void {
    const name = sdk.name.toLowerCase();
    const version = sdk.version ?? '';
    const versions = this.versionsByName.get(name) ?? [];
    if (versions.length > 0) {
      this.logger.warn(
        `[sdk-cache] Multiple versions of SDK "${sdk.name}" are referenced: ${[...versions, version]
          .map((v) => `"${v}"`)
          .join(', ')}`
      );
    }
    versions.push(version);
    this.versionsByName.set(name, versions);
  }
}

/**
 * Routes lookups through a context's SdkResolutionCache
 */
export class CachingSdkResolverService implements SdkResolution {
  constructor(
    private readonly cache: SdkResolutionCache,
    private readonly inner: SdkResolution
  ) {}

  resolveSdk(sdk: SdkReference, request?: SdkResolutionRequest): Promise<SdkResult> {
    return this.cache.resolve(sdk, this.inner, request);
  }
}
