/**
 * Evaluation context cache
 *
 * Core concepts:
 * - One context owns one existence, SDK and glob cache
 * - Shared policy pools caches across projects; Isolated starts each new project cold
 * - Cached results are never refreshed within a context's lifetime
 */

export { EvaluationContext, SharingPolicy } from './evaluationContext.js';
export type { EvaluationContextOptions } from './evaluationContext.js';

export { ExistenceCache } from './existenceCache.js';
export { GlobExpansionCache } from './globExpansionCache.js';
export { SdkResolutionCache, CachingSdkResolverService } from './sdkResolutionCache.js';
export type { SdkResolutionCacheOptions } from './sdkResolutionCache.js';
export {
  SdkResolverService,
  isReferenceSameVersion,
  sdkReferenceToString,
  createSdkResultFactory,
} from './sdkResolverService.js';
export type { SdkResolverServiceOptions } from './sdkResolverService.js';

export {
  normalizePath,
  isAbsolutePath,
  resolvePath,
  joinPath,
  isGlobPattern,
  splitGlobPattern,
  createGlobCacheKey,
  globCacheKeyToString,
} from './pathNormalizer.js';
export type { GlobPatternParts } from './pathNormalizer.js';

export { nodeFileSystem } from './fileSystem.js';
export { MemoryFileSystem } from './memoryFileSystem.js';
export type { ProbeCounts } from './memoryFileSystem.js';

export { Project } from './project.js';
export type { ProjectOptions } from './project.js';
export { ProjectCollection } from './projectCollection.js';
export type { ProjectCollectionOptions } from './projectCollection.js';
export {
  evaluateProject,
  parseProjectDefinition,
  projectDefinitionSchema,
  SDK_IMPORT_FILENAMES,
} from './evaluator.js';
export type {
  ProjectDefinition,
  ParsedProjectDefinition,
  ProjectEvaluation,
  EvaluatedItem,
} from './evaluator.js';

export { ConfigurationError, InvalidProjectError, SdkResolverError } from './errors.js';
export { consoleLogger, silentLogger } from './logger.js';

export type {
  FileSystem,
  Logger,
  GlobCacheKey,
  SdkReference,
  SdkResult,
  SdkResultSuccess,
  SdkResultFailure,
  SdkResolver,
  SdkResolverContext,
  SdkResultFactory,
  SdkResolution,
  SdkResolutionRequest,
} from './types.js';
