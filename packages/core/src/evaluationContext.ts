/**
 * EvaluationContext - owns the caches shared by the evaluations handed the same context
 */

import { z } from 'zod';
import { ConfigurationError } from './errors.js';
import { ExistenceCache } from './existenceCache.js';
import { nodeFileSystem } from './fileSystem.js';
import { GlobExpansionCache } from './globExpansionCache.js';
import { consoleLogger } from './logger.js';
import { CachingSdkResolverService, SdkResolutionCache } from './sdkResolutionCache.js';
import { SdkResolverService } from './sdkResolverService.js';
import type { FileSystem, Logger, SdkResolution } from './types.js';

export const SharingPolicy = {
  /** One context, pooled caches, reused by every new project */
  Shared: 'shared',
  /** Fresh context and caches for every new project */
  Isolated: 'isolated',
} as const;

export type SharingPolicy = (typeof SharingPolicy)[keyof typeof SharingPolicy];

export interface EvaluationContextOptions {
  policy: SharingPolicy;
  /** Replaces the local disk for existence and enumeration probes; Shared policy only */
  fileSystem?: FileSystem;
  /** Underlying resolver service; its results are memoized per context */
  sdkResolverService?: SdkResolution;
  logger?: Logger;
}

function hasMethods(value: unknown, names: string[]): boolean {
  if (!value || typeof value !== 'object') return false;
  return names.every((name) => typeof Reflect.get(value, name) === 'function');
}

const optionsSchema = z.object({
  policy: z.enum([SharingPolicy.Shared, SharingPolicy.Isolated]),
  fileSystem: z
    .custom<FileSystem>(
      (value) =>
        hasMethods(value, ['fileExists', 'directoryExists', 'exists', 'isSymbolicLink', 'directoryEntries']),
      'fileSystem must implement fileExists, directoryExists, exists, isSymbolicLink and directoryEntries'
    )
    .optional(),
  sdkResolverService: z
    .custom<SdkResolution>(
      (value) => hasMethods(value, ['resolveSdk']),
      'sdkResolverService must implement resolveSdk'
    )
    .optional(),
  logger: z
    .custom<Logger>((value) => hasMethods(value, ['debug', 'warn']), 'logger must implement debug and warn')
    .optional(),
});

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}

let nextContextId = 1;

export class EvaluationContext {
  /** Monotonic handle; equal ids mean the same context */
  readonly id: number;
  readonly policy: SharingPolicy;
  readonly fileSystem: FileSystem | undefined;
  readonly existenceCache: ExistenceCache;
  readonly globCache: GlobExpansionCache;
  readonly sdkCache: SdkResolutionCache;
  /** Resolves SDKs through this context's sdkCache */
  readonly sdkResolverService: CachingSdkResolverService;

  private readonly resolverService: SdkResolution;
  private readonly logger: Logger;

  private constructor(options: EvaluationContextOptions & { sdkResolverService: SdkResolution; logger: Logger }) {
    this.id = nextContextId++;
    this.policy = options.policy;
    this.fileSystem = options.fileSystem;
    this.logger = options.logger;
    this.resolverService = options.sdkResolverService;

    this.existenceCache = new ExistenceCache(this.fileSystem ?? nodeFileSystem);
    this.globCache = new GlobExpansionCache(this.existenceCache);
    this.sdkCache = new SdkResolutionCache({ logger: this.logger });
    this.sdkResolverService = new CachingSdkResolverService(this.sdkCache, this.resolverService);
  }

  /**
   * Create a context.
   * @throws ConfigurationError for unknown options or a fileSystem under the Isolated policy
   */
  static create(policyOrOptions: SharingPolicy | EvaluationContextOptions, fileSystem?: FileSystem): EvaluationContext {
    const raw =
      typeof policyOrOptions === 'string'
        ? { policy: policyOrOptions, ...(fileSystem ? { fileSystem } : {}) }
        : { ...policyOrOptions, ...(fileSystem ? { fileSystem } : {}) };

    const parsed = optionsSchema.safeParse(raw);
    if (!parsed.success) {
      throw new ConfigurationError(`Invalid evaluation context options: ${formatIssues(parsed.error)}`);
    }

    const options = parsed.data;
    if (options.fileSystem && options.policy !== SharingPolicy.Shared) {
      throw new ConfigurationError(
        `A file system can only be supplied to a "${SharingPolicy.Shared}" evaluation context, got "${options.policy}"`
      );
    }

    const logger = options.logger ?? consoleLogger;
    return new EvaluationContext({
      policy: options.policy,
      ...(options.fileSystem ? { fileSystem: options.fileSystem } : {}),
      sdkResolverService: options.sdkResolverService ?? new SdkResolverService({ logger }),
      logger,
    });
  }

  /**
   * Context for a project evaluated for the first time.
   * Shared returns this context; Isolated returns a new one with empty caches.
   */
  contextForNewProject(): EvaluationContext {
    switch (this.policy) {
      case SharingPolicy.Shared:
        return this;
      case SharingPolicy.Isolated:
        return new EvaluationContext({
          policy: this.policy,
          sdkResolverService: this.resolverService,
          logger: this.logger,
        });
    }
  }
}
