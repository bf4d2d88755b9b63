import type { SdkReference } from './types.js';

/**
 * Invalid options passed when creating an evaluation context
 */
export class ConfigurationError extends Error {
  override readonly name = 'ConfigurationError';
}

/**
 * A project definition cannot be evaluated
 */
export class InvalidProjectError extends Error {
  override readonly name = 'InvalidProjectError';

  constructor(
    message: string,
    readonly projectPath?: string
  ) {
    super(message);
  }
}

/**
 * An SDK resolver threw while resolving a reference
 */
export class SdkResolverError extends Error {
  override readonly name = 'SdkResolverError';

  constructor(
    readonly resolverName: string,
    readonly sdk: SdkReference,
    cause: unknown
  ) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    super(`The SDK resolver "${resolverName}" failed while attempting to resolve the SDK "${sdk.name}": ${detail}`, {
      cause,
    });
  }
}
