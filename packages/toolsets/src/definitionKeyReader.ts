/**
 * Toolset definitions stored as a tree of keys and values
 *
 * Layout:
 *   currentVersion/   DefaultToolsVersion, MsBuildOverrideTasksPath, DefaultOverrideToolsVersion
 *   toolsVersions/
 *     <toolsVersion>/  properties
 *       <subToolset>/  overlay properties
 */

import { readFile } from 'fs/promises';
import { z } from 'zod';
import { InvalidDefinitionError } from './errors.js';
import {
  ToolsetReader,
  type PropertyDefinition,
  type ReadToolsetsResult,
  type ToolsetReaderOptions,
  type ToolsVersionDefinition,
} from './toolsetReader.js';

export interface DefinitionKey {
  /** Location used in error messages */
  readonly location: string;
  valueNames(): string[];
  getValue(name: string): unknown;
  subKeyNames(): string[];
  openSubKey(name: string): DefinitionKey | undefined;
}

const CURRENT_VERSION_KEY = 'currentVersion';
const TOOLS_VERSIONS_KEY = 'toolsVersions';
const DEFAULT_TOOLS_VERSION_VALUE = 'DefaultToolsVersion';
const OVERRIDE_TASKS_PATH_VALUE = 'MsBuildOverrideTasksPath';
const DEFAULT_OVERRIDE_TOOLS_VERSION_VALUE = 'DefaultOverrideToolsVersion';

const stringValueSchema = z.string();

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function findName(names: string[], wanted: string): string | undefined {
  const lowered = wanted.toLowerCase();
  return names.find((name) => name.toLowerCase() === lowered);
}

/**
 * DefinitionKey over a plain object: nested objects are sub-keys, everything
 * else is a value. Names are looked up case-insensitively.
 */
export class ObjectDefinitionKey implements DefinitionKey {
  constructor(
    private readonly data: Record<string, unknown>,
    readonly location: string
  ) {}

  valueNames(): string[] {
    return Object.keys(this.data).filter((name) => !isPlainObject(this.data[name]));
  }

  getValue(name: string): unknown {
    const key = findName(this.valueNames(), name);
    return key === undefined ? undefined : this.data[key];
  }

  subKeyNames(): string[] {
    return Object.keys(this.data).filter((name) => isPlainObject(this.data[name]));
  }

  openSubKey(name: string): DefinitionKey | undefined {
    const key = findName(this.subKeyNames(), name);
    if (key === undefined) return undefined;
    const child = this.data[key];
    return isPlainObject(child) ? new ObjectDefinitionKey(child, `${this.location}/${key}`) : undefined;
  }
}

/**
 * Read a value that must be a string when present
 * @throws InvalidDefinitionError for any other type
 */
function readString(key: DefinitionKey, name: string): string | undefined {
  const value = key.getValue(name);
  if (value === undefined) return undefined;
  const parsed = stringValueSchema.safeParse(value);
  if (!parsed.success) {
    throw new InvalidDefinitionError(`Value "${name}" must be a string, got ${typeof value}`, key.location);
  }
  return parsed.data;
}

function readPropertyDefinitions(key: DefinitionKey): PropertyDefinition[] {
  return key.valueNames().map((name) => ({
    name,
    value: readString(key, name) ?? '',
    source: key.location,
  }));
}

export class DefinitionKeyToolsetReader extends ToolsetReader {
  constructor(
    private readonly root: DefinitionKey,
    options: ToolsetReaderOptions = {}
  ) {
    super(options);
  }

  protected readToolsVersions(): ToolsVersionDefinition[] {
    const toolsVersions = this.root.openSubKey(TOOLS_VERSIONS_KEY);
    if (!toolsVersions) return [];

    const definitions: ToolsVersionDefinition[] = [];
    // values directly under toolsVersions are not tools versions
    for (const name of toolsVersions.subKeyNames()) {
      const key = toolsVersions.openSubKey(name);
      if (!key) continue;

      const subToolsets: ToolsVersionDefinition['subToolsets'] = [];
      for (const version of key.subKeyNames()) {
        const subKey = key.openSubKey(version);
        if (subKey) {
          // keys below a sub-toolset are ignored
          subToolsets.push({ version, properties: readPropertyDefinitions(subKey) });
        }
      }

      definitions.push({ name, source: key.location, properties: readPropertyDefinitions(key), subToolsets });
    }
    return definitions;
  }

  protected readDefaultToolsVersion(): string | undefined {
    return this.readCurrentVersionValue(DEFAULT_TOOLS_VERSION_VALUE);
  }

  protected readOverrideTasksPath(): string | undefined {
    return this.readCurrentVersionValue(OVERRIDE_TASKS_PATH_VALUE);
  }

  protected readDefaultOverrideToolsVersion(): string | undefined {
    return this.readCurrentVersionValue(DEFAULT_OVERRIDE_TOOLS_VERSION_VALUE);
  }

  private readCurrentVersionValue(name: string): string | undefined {
    const currentVersion = this.root.openSubKey(CURRENT_VERSION_KEY);
    return currentVersion ? readString(currentVersion, name) : undefined;
  }
}

const definitionDocumentSchema = z.object({
  [CURRENT_VERSION_KEY]: z.record(z.string(), z.unknown()).optional(),
  [TOOLS_VERSIONS_KEY]: z.record(z.string(), z.unknown()).optional(),
});

/**
 * Read toolsets from a JSON definition file
 * @throws InvalidDefinitionError when the file is not valid JSON or has the wrong shape
 */
export async function readToolsetDefinitionFile(
  filePath: string,
  options: ToolsetReaderOptions = {}
): Promise<ReadToolsetsResult> {
  const content = await readFile(filePath, 'utf-8');

  let document: unknown;
  try {
    document = JSON.parse(content);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new InvalidDefinitionError(`Toolset definition is not valid JSON: ${reason}`, filePath);
  }

  const parsed = definitionDocumentSchema.safeParse(document);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => (issue.path.length ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
      .join('; ');
    throw new InvalidDefinitionError(`Invalid toolset definition: ${details}`, filePath);
  }

  return new DefinitionKeyToolsetReader(new ObjectDefinitionKey(parsed.data, filePath), options).readToolsets();
}
