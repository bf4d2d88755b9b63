/**
 * Evaluation context type definitions
 */

/**
 * File system abstraction probed by the existence cache
 */
export interface FileSystem {
  /** Whether a regular file exists at path */
  fileExists(path: string): Promise<boolean>;
  /** Whether a directory exists at path */
  directoryExists(path: string): Promise<boolean>;
  /** Whether a file or a directory exists at path, in one probe */
  exists(path: string): Promise<boolean>;
  /** Whether path itself is a symbolic link (not followed) */
  isSymbolicLink(path: string): Promise<boolean>;
  /** Entry names of a directory, in a stable order. Missing directory yields [] */
  directoryEntries(path: string): Promise<string[]>;
}

/**
 * Minimal logger, structurally compatible with `console`
 */
export interface Logger {
  debug(message: string): void;
  warn(message: string): void;
}

/**
 * Glob cache key: absolute fixed directory root + wildcard remainder
 */
export interface GlobCacheKey {
  fixedDirectoryRoot: string;
  patternRemainder: string;
}

/**
 * Reference to an SDK from a project
 */
export interface SdkReference {
  name: string;
  /** Absent version matches whatever the resolver returns */
  version?: string;
  minimumVersion?: string;
}

export interface SdkResultSuccess {
  success: true;
  sdk: SdkReference;
  /** Directory containing the SDK's props/targets */
  path: string;
  version?: string;
  additionalPaths: string[];
  warnings: string[];
}

export interface SdkResultFailure {
  success: false;
  sdk: SdkReference;
  errors: string[];
  warnings: string[];
}

export type SdkResult = SdkResultSuccess | SdkResultFailure;

/**
 * Per-call context handed to a resolver
 */
export interface SdkResolverContext {
  projectPath?: string;
  solutionPath?: string;
  /** Resolver-owned state, preserved across calls on the same service */
  state: unknown;
}

/**
 * Builds results on behalf of a resolver
 */
export interface SdkResultFactory {
  indicateSuccess(path: string, version?: string, warnings?: string[], additionalPaths?: string[]): SdkResult;
  indicateFailure(errors: string[], warnings?: string[]): SdkResult;
}

/**
 * Pluggable SDK resolver
 */
export interface SdkResolver {
  name: string;
  /** Lower runs first */
  priority: number;
  /** When set, the resolver is tried in the first pass for names matching it */
  resolvableSdkPattern?: RegExp;
  resolve(
    sdk: SdkReference,
    context: SdkResolverContext,
    factory: SdkResultFactory
  ): SdkResult | undefined | Promise<SdkResult | undefined>;
}

/**
 * Project-level details forwarded to resolvers
 */
export interface SdkResolutionRequest {
  projectPath?: string;
  solutionPath?: string;
}

/**
 * Anything that resolves SDK references
 */
export interface SdkResolution {
  resolveSdk(sdk: SdkReference, request?: SdkResolutionRequest): Promise<SdkResult>;
}
