/**
 * SDK resolution over a prioritized set of pluggable resolvers
 */

import { SdkResolverError } from './errors.js';
import { consoleLogger } from './logger.js';
import type {
  Logger,
  SdkReference,
  SdkResolution,
  SdkResolutionRequest,
  SdkResolver,
  SdkResolverContext,
  SdkResult,
  SdkResultFactory,
} from './types.js';

export interface SdkResolverServiceOptions {
  resolvers?: SdkResolver[];
  logger?: Logger;
}

/**
 * An absent reference version matches any resolved version
 */
export function isReferenceSameVersion(sdk: SdkReference, version: string | undefined): boolean {
  if (!sdk.version) {
    return true;
  }
  return version !== undefined && sdk.version.toLowerCase() === version.toLowerCase();
}

export function sdkReferenceToString(sdk: SdkReference): string {
  const parts = [sdk.name];
  if (sdk.version) parts.push(sdk.version);
  if (sdk.minimumVersion) parts.push(`min=${sdk.minimumVersion}`);
  return parts.join('/');
}

export function createSdkResultFactory(sdk: SdkReference): SdkResultFactory {
  return {
    indicateSuccess: (path, version, warnings = [], additionalPaths = []) => ({
      success: true,
      sdk,
      path,
      ...(version !== undefined ? { version } : {}),
      additionalPaths,
      warnings,
    }),
    indicateFailure: (errors, warnings = []) => ({
      success: false,
      sdk,
      errors,
      warnings,
    }),
  };
}

function byPriority(a: SdkResolver, b: SdkResolver): number {
  return a.priority - b.priority;
}

type Attempt = { result: SdkResult; resolved: true } | { errors: string[]; warnings: string[]; resolved: false };

/**
 * Resolvers whose pattern matches the SDK name are tried first, then every
 * general resolver. Within a pass, lower priority runs first; the first
 * success wins.
 */
export class SdkResolverService implements SdkResolution {
  private readonly resolvers: SdkResolver[];
  private readonly logger: Logger;
  private readonly resolverState = new Map<SdkResolver, unknown>();

  constructor(options: SdkResolverServiceOptions = {}) {
    this.resolvers = [...(options.resolvers ?? [])];
    this.logger = options.logger ?? consoleLogger;
  }

  async resolveSdk(sdk: SdkReference, request: SdkResolutionRequest = {}): Promise<SdkResult> {
    const errors: string[] = [];
    const warnings: string[] = [];

    const specific = this.resolvers
      .filter((resolver) => resolver.resolvableSdkPattern?.test(sdk.name) ?? false)
      .sort(byPriority);

    if (specific.length > 0) {
      const attempt = await this.tryResolvers(specific, sdk, request);
      if (attempt.resolved) {
        return attempt.result;
      }
      errors.push(...attempt.errors);
      warnings.push(...attempt.warnings);
    }

    const general = this.resolvers.filter((resolver) => !resolver.resolvableSdkPattern).sort(byPriority);
    const attempt = await this.tryResolvers(general, sdk, request);
    if (attempt.resolved) {
      return attempt.result;
    }
    errors.push(...attempt.errors);
    warnings.push(...attempt.warnings);

    this.logWarnings(warnings);
    return createSdkResultFactory(sdk).indicateFailure(errors, warnings);
  }

  private async tryResolvers(
    resolvers: SdkResolver[],
    sdk: SdkReference,
    request: SdkResolutionRequest
  ): Promise<Attempt> {
    const errors: string[] = [];
    const warnings: string[] = [];

    for (const resolver of resolvers) {
      const context: SdkResolverContext = {
        ...request,
        state: this.resolverState.get(resolver),
      };
      const factory = createSdkResultFactory(sdk);

      let result: SdkResult | undefined;
      try {
        result = await resolver.resolve(sdk, context, factory);
      } catch (err) {
        throw new SdkResolverError(resolver.name, sdk, err);
      }

      this.resolverState.set(resolver, context.state);
      result ??= factory.indicateFailure([`The SDK resolver "${resolver.name}" returned null.`]);

      if (result.success) {
        this.logger.debug(
          `[sdk-resolver] Resolved SDK "${sdkReferenceToString(sdk)}" with "${resolver.name}" to "${result.path}"`
        );
        this.logWarnings(result.warnings);
        if (!isReferenceSameVersion(sdk, result.version)) {
          this.logger.warn(
            `[sdk-resolver] The SDK reference "${sdk.name}" version "${sdk.version}" was resolved to version "${result.version ?? ''}" instead.`
          );
        }
        return { result, resolved: true };
      }

      this.logger.debug(
        `[sdk-resolver] "${resolver.name}" could not resolve "${sdkReferenceToString(sdk)}": ${result.errors.join('; ') || 'no errors'}`
      );
      errors.push(...result.errors);
      warnings.push(...result.warnings);
    }

    return { errors, warnings, resolved: false };
  }

  private logWarnings(warnings: string[]): void {
    for (const warning of warnings) {
      if (warning.trim()) {
        this.logger.warn(`[sdk-resolver] ${warning}`);
      }
    }
  }
}
