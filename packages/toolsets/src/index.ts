/**
 * Toolset definitions: base properties, sub-toolset overlays and the readers
 * that load them
 */

export { Toolset, SubToolset, SUB_TOOLSET_VERSION_PROPERTY } from './toolset.js';
export type { ToolsetInit } from './toolset.js';
export {
  ToolsetReader,
  TOOLS_PATH_PROPERTY,
  BIN_PATH_PROPERTY,
  RESERVED_PROPERTY_NAMES,
  isReservedPropertyName,
} from './toolsetReader.js';
export type {
  ToolsetReaderOptions,
  ReadToolsetsResult,
  PropertyDefinition,
  ToolsVersionDefinition,
} from './toolsetReader.js';
export { DefinitionKeyToolsetReader, ObjectDefinitionKey, readToolsetDefinitionFile } from './definitionKeyReader.js';
export type { DefinitionKey } from './definitionKeyReader.js';
export { PropertyDictionary } from './propertyDictionary.js';
export { convertToVersion, compareVersions, versionsEqual } from './version.js';
export type { Version } from './version.js';
export { InvalidDefinitionError } from './errors.js';
