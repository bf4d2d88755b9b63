/**
 * Toolset - base property set with named sub-toolset overlays
 */

import { PropertyDictionary } from './propertyDictionary.js';
import { compareVersions, convertToVersion, versionsEqual, type Version } from './version.js';

/** Property selecting the sub-toolset */
export const SUB_TOOLSET_VERSION_PROPERTY = 'VisualStudioVersion';

export class SubToolset {
  readonly properties: PropertyDictionary;

  constructor(
    readonly subToolsetVersion: string,
    properties: Record<string, string> = {}
  ) {
    this.properties = new PropertyDictionary(properties);
  }
}

export interface ToolsetInit {
  toolsVersion: string;
  toolsPath: string;
  properties?: Record<string, string>;
  /** Overlay properties by sub-toolset version, in definition order */
  subToolsets?: Record<string, Record<string, string>>;
  globalProperties?: Record<string, string>;
  environmentProperties?: Record<string, string>;
  overrideTasksPath?: string;
  defaultOverrideToolsVersion?: string;
}

export class Toolset {
  readonly toolsVersion: string;
  readonly toolsPath: string;
  readonly properties: PropertyDictionary;
  readonly subToolsets: PropertyDictionary<SubToolset>;
  readonly overrideTasksPath: string | undefined;
  readonly defaultOverrideToolsVersion: string | undefined;

  private readonly globalProperties: PropertyDictionary;
  private readonly environmentProperties: PropertyDictionary;
  private cachedDefaultSubToolsetVersion: string | undefined;

  constructor(init: ToolsetInit) {
    this.toolsVersion = init.toolsVersion;
    this.toolsPath = init.toolsPath;
    this.properties = new PropertyDictionary(init.properties);
    this.subToolsets = new PropertyDictionary<SubToolset>();
    for (const [version, properties] of Object.entries(init.subToolsets ?? {})) {
      this.subToolsets.set(version, new SubToolset(version, properties));
    }
    this.globalProperties = new PropertyDictionary(init.globalProperties);
    this.environmentProperties = new PropertyDictionary(init.environmentProperties);
    this.overrideTasksPath = init.overrideTasksPath;
    this.defaultOverrideToolsVersion = init.defaultOverrideToolsVersion;
  }

  /**
   * Sub-toolset property if defined there (an empty value included), else the
   * base property, else undefined
   */
  getProperty(name: string, subToolsetVersion?: string): string | undefined {
    if (subToolsetVersion !== undefined) {
      const overlay = this.subToolsets.get(subToolsetVersion)?.properties.get(name);
      if (overlay !== undefined) {
        return overlay;
      }
    }
    return this.properties.get(name);
  }

  /**
   * Highest sub-toolset version. Names that do not parse as versions are
   * ordered before all versioned names, in definition order.
   */
  get defaultSubToolsetVersion(): string | undefined {
    if (this.cachedDefaultSubToolsetVersion === undefined) {
      const unversioned: string[] = [];
      const versioned: Array<{ name: string; version: Version }> = [];

      for (const name of this.subToolsets.names()) {
        const version = convertToVersion(name);
        if (version) {
          versioned.push({ name, version });
        } else {
          unversioned.push(name);
        }
      }

      versioned.sort((a, b) => compareVersions(a.version, b.version));
      const ordered = [...unversioned, ...versioned.map((entry) => entry.name)];
      this.cachedDefaultSubToolsetVersion = ordered[ordered.length - 1];
    }
    return this.cachedDefaultSubToolsetVersion;
  }

  /**
   * Pick the sub-toolset version, highest precedence first:
   * 1. VisualStudioVersion in overrideGlobalProperties
   * 2. VisualStudioVersion among the toolset's global properties
   * 3. VisualStudioVersion among the toolset's environment properties
   * 4. solutionVersion - 1, when a sub-toolset with that version exists
   * 5. defaultSubToolsetVersion
   */
  generateSubToolsetVersion(
    overrideGlobalProperties?: Record<string, string>,
    solutionVersion?: number
  ): string | undefined {
    const explicit = overrideGlobalProperties
      ? new PropertyDictionary(overrideGlobalProperties).get(SUB_TOOLSET_VERSION_PROPERTY)
      : undefined;
    if (explicit !== undefined) return explicit;

    const global = this.globalProperties.get(SUB_TOOLSET_VERSION_PROPERTY);
    if (global !== undefined) return global;

    const environment = this.environmentProperties.get(SUB_TOOLSET_VERSION_PROPERTY);
    if (environment !== undefined) return environment;

    const visualStudioVersionFromSolution = (solutionVersion ?? 0) - 1;
    if (visualStudioVersionFromSolution > 0) {
      const wanted: Version = [visualStudioVersionFromSolution, 0];
      const match = this.subToolsets.names().find((name) => {
        const version = convertToVersion(name);
        return version !== undefined && versionsEqual(version, wanted);
      });
      if (match !== undefined) return match;
    }

    return this.defaultSubToolsetVersion;
  }
}
