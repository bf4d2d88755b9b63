/**
 * Malformed toolset definition data
 */
export class InvalidDefinitionError extends Error {
  override readonly name = 'InvalidDefinitionError';

  constructor(
    message: string,
    readonly source?: string
  ) {
    super(source ? `${message} (${source})` : message);
  }
}
