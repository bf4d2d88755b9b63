/**
 * ToolsetReader - turns a source's tools-version definitions into Toolsets
 *
 * Subclasses supply the raw definitions; this class applies the rules shared by
 * every source (tools path, reserved names, global property protection).
 */

import { consoleLogger, type Logger } from '@eval-context/core';
import { InvalidDefinitionError } from './errors.js';
import { PropertyDictionary } from './propertyDictionary.js';
import { Toolset } from './toolset.js';

export const TOOLS_PATH_PROPERTY = 'MSBuildToolsPath';
export const BIN_PATH_PROPERTY = 'MSBuildBinPath';

/** Names a toolset may never define; evaluation sets them per project */
export const RESERVED_PROPERTY_NAMES: readonly string[] = [
  'MSBuildProjectDirectory',
  'MSBuildProjectDirectoryNoRoot',
  'MSBuildProjectFile',
  'MSBuildProjectExtension',
  'MSBuildProjectFullPath',
  'MSBuildProjectName',
  'MSBuildThisFile',
  'MSBuildThisFileDirectory',
  'MSBuildThisFileDirectoryNoRoot',
  'MSBuildThisFileExtension',
  'MSBuildThisFileFullPath',
  'MSBuildThisFileName',
  'MSBuildStartupDirectory',
  'MSBuildNodeCount',
  'MSBuildLastTaskResult',
  'MSBuildProgramFiles32',
  'MSBuildToolsVersion',
];

const reservedNames = new Set(RESERVED_PROPERTY_NAMES.map((name) => name.toLowerCase()));

export function isReservedPropertyName(name: string): boolean {
  return reservedNames.has(name.toLowerCase());
}

/** One name/value pair as read from a source */
export interface PropertyDefinition {
  name: string;
  value: string;
  /** Where the definition came from, for error messages */
  source: string;
}

export interface ToolsVersionDefinition {
  name: string;
  source: string;
  properties: PropertyDefinition[];
  subToolsets: Array<{ version: string; properties: PropertyDefinition[] }>;
}

export interface ToolsetReaderOptions {
  /** Protected from being overwritten by toolset properties */
  globalProperties?: Record<string, string>;
  environmentProperties?: Record<string, string>;
  logger?: Logger;
}

export interface ReadToolsetsResult {
  /** Keyed by tools version name */
  toolsets: Map<string, Toolset>;
  defaultToolsVersion: string | undefined;
  overrideTasksPath: string | undefined;
  defaultOverrideToolsVersion: string | undefined;
}

interface ReadProperties {
  properties: PropertyDictionary;
  toolsPath: string | undefined;
  binPath: string | undefined;
}

export abstract class ToolsetReader {
  protected readonly globalProperties: PropertyDictionary;
  protected readonly environmentProperties: PropertyDictionary;
  protected readonly logger: Logger;

  constructor(options: ToolsetReaderOptions = {}) {
    this.globalProperties = new PropertyDictionary(options.globalProperties);
    this.environmentProperties = new PropertyDictionary(options.environmentProperties);
    this.logger = options.logger ?? consoleLogger;
  }

  protected abstract readToolsVersions(): ToolsVersionDefinition[];
  protected abstract readDefaultToolsVersion(): string | undefined;
  protected abstract readOverrideTasksPath(): string | undefined;
  protected abstract readDefaultOverrideToolsVersion(): string | undefined;

  /**
   * Read every tools version into `into`. Tools versions already present in
   * `into` are left untouched.
   * @throws InvalidDefinitionError
   */
  readToolsets(into: Map<string, Toolset> = new Map()): ReadToolsetsResult {
    const overrideTasksPath = this.readOverrideTasksPath();
    const defaultOverrideToolsVersion = this.readDefaultOverrideToolsVersion();

    for (const definition of this.readToolsVersions()) {
      if (this.hasToolset(into, definition.name)) {
        continue;
      }
      const toolset = this.readToolset(definition, overrideTasksPath, defaultOverrideToolsVersion);
      if (toolset) {
        into.set(definition.name, toolset);
      }
    }

    return {
      toolsets: into,
      defaultToolsVersion: this.readDefaultToolsVersion(),
      overrideTasksPath,
      defaultOverrideToolsVersion,
    };
  }

  private hasToolset(toolsets: Map<string, Toolset>, name: string): boolean {
    const lowered = name.toLowerCase();
    return [...toolsets.keys()].some((key) => key.toLowerCase() === lowered);
  }

  private readToolset(
    definition: ToolsVersionDefinition,
    overrideTasksPath: string | undefined,
    defaultOverrideToolsVersion: string | undefined
  ): Toolset | undefined {
    const base = this.readProperties(definition.properties, definition);

    const subToolsets: Record<string, Record<string, string>> = {};
    for (const subToolset of definition.subToolsets) {
      const read = this.readProperties(subToolset.properties, definition);
      if (read.toolsPath !== undefined || read.binPath !== undefined) {
        throw new InvalidDefinitionError(
          `MSBuildToolsPath is not allowed in sub-toolset "${subToolset.version}" of tools version "${definition.name}"`,
          definition.source
        );
      }
      subToolsets[subToolset.version] = read.properties.toObject();
    }

    const toolsPath = base.toolsPath ?? base.binPath;
    if (toolsPath === undefined) {
      this.logger.debug(
        `[toolsets] Skipping tools version "${definition.name}": neither ${TOOLS_PATH_PROPERTY} nor ${BIN_PATH_PROPERTY} is set`
      );
      return undefined;
    }
    if (base.toolsPath !== undefined && base.binPath !== undefined && base.toolsPath !== base.binPath) {
      throw new InvalidDefinitionError(
        `Tools version "${definition.name}" has conflicting values for ${TOOLS_PATH_PROPERTY} and ${BIN_PATH_PROPERTY}`,
        definition.source
      );
    }

    return new Toolset({
      toolsVersion: definition.name,
      toolsPath,
      properties: base.properties.toObject(),
      subToolsets,
      globalProperties: this.globalProperties.toObject(),
      environmentProperties: this.environmentProperties.toObject(),
      ...(overrideTasksPath !== undefined ? { overrideTasksPath } : {}),
      ...(defaultOverrideToolsVersion !== undefined ? { defaultOverrideToolsVersion } : {}),
    });
  }

  private readProperties(definitions: PropertyDefinition[], toolsVersion: ToolsVersionDefinition): ReadProperties {
    const read: ReadProperties = { properties: new PropertyDictionary(), toolsPath: undefined, binPath: undefined };

    for (const property of definitions) {
      const lowered = property.name.toLowerCase();
      if (lowered === TOOLS_PATH_PROPERTY.toLowerCase()) {
        read.toolsPath = property.value;
      } else if (lowered === BIN_PATH_PROPERTY.toLowerCase()) {
        read.binPath = property.value;
      } else if (isReservedPropertyName(property.name)) {
        throw new InvalidDefinitionError(
          `The reserved property "${property.name}" cannot be set in tools version "${toolsVersion.name}"`,
          property.source
        );
      } else if (!this.globalProperties.has(property.name)) {
        read.properties.set(property.name, property.value);
      }
    }

    return read;
  }
}
