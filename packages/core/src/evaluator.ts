/**
 * Evaluation of the cache-relevant parts of a project: SDK imports,
 * explicit imports and item includes.
 */

import * as path from 'path';
import { minimatch } from 'minimatch';
import { z } from 'zod';
import { InvalidProjectError } from './errors.js';
import type { EvaluationContext } from './evaluationContext.js';
import { isAbsolutePath, isGlobPattern, joinPath, normalizePath, resolvePath } from './pathNormalizer.js';
import type { SdkResultSuccess } from './types.js';

/** Files imported from every resolved SDK directory, when present */
export const SDK_IMPORT_FILENAMES = ['Sdk.props', 'Sdk.targets'] as const;

const sdkReferenceSchema = z.object({
  name: z.string().min(1),
  version: z.string().optional(),
  minimumVersion: z.string().optional(),
});

const itemDefinitionSchema = z.object({
  itemType: z.string().min(1),
  /** `;`-separated file specs, literal or wildcard */
  include: z.string(),
  exclude: z.string().optional(),
});

export const projectDefinitionSchema = z.object({
  fullPath: z.string().min(1).refine(isAbsolutePath, 'must be an absolute path'),
  sdks: z.array(sdkReferenceSchema).default([]),
  imports: z.array(z.string().min(1)).default([]),
  items: z.array(itemDefinitionSchema).default([]),
});

export type ProjectDefinition = z.input<typeof projectDefinitionSchema>;
export type ParsedProjectDefinition = z.output<typeof projectDefinitionSchema>;

export interface EvaluatedItem {
  itemType: string;
  evaluatedInclude: string;
}

export interface ProjectEvaluation {
  sdkResults: SdkResultSuccess[];
  /** Absolute paths, SDK imports first */
  imports: string[];
  items: EvaluatedItem[];
}

/**
 * @throws InvalidProjectError with every validation issue
 */
export function parseProjectDefinition(definition: unknown): ParsedProjectDefinition {
  const parsed = projectDefinitionSchema.safeParse(definition);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => (issue.path.length ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
      .join('; ');
    throw new InvalidProjectError(`Invalid project definition: ${details}`);
  }
  return parsed.data;
}

function splitSpecs(specs: string | undefined): string[] {
  if (!specs) return [];
  return specs
    .split(';')
    .map((spec) => spec.trim())
    .filter((spec) => spec.length > 0);
}

/**
 * Both sides are resolved against the project directory, so relative and
 * absolute spellings of one file compare equal
 */
function isExcluded(include: string, excludes: string[], directory: string): boolean {
  const candidate = resolvePath(directory, include);
  return excludes.some((exclude) => {
    const resolved = resolvePath(directory, exclude);
    return isGlobPattern(exclude) ? minimatch(candidate, resolved, { dot: true }) : candidate === resolved;
  });
}

async function evaluateSdks(
  definition: ParsedProjectDefinition,
  context: EvaluationContext
): Promise<{ sdkResults: SdkResultSuccess[]; imports: string[] }> {
  const sdkResults: SdkResultSuccess[] = [];
  const imports: string[] = [];

  for (const sdk of definition.sdks) {
    const result = await context.sdkResolverService.resolveSdk(sdk, { projectPath: definition.fullPath });
    if (!result.success) {
      const reasons = result.errors.length ? ` ${result.errors.join(' ')}` : '';
      throw new InvalidProjectError(`Could not resolve SDK "${sdk.name}".${reasons}`, definition.fullPath);
    }
    sdkResults.push(result);

    for (const sdkDirectory of [result.path, ...result.additionalPaths]) {
      for (const fileName of SDK_IMPORT_FILENAMES) {
        const candidate = joinPath(normalizePath(sdkDirectory), fileName);
        if (await context.existenceCache.fileExists(candidate)) {
          imports.push(candidate);
        }
      }
    }
  }

  return { sdkResults, imports };
}

async function evaluateImports(
  definition: ParsedProjectDefinition,
  directory: string,
  context: EvaluationContext
): Promise<string[]> {
  const imports: string[] = [];

  for (const spec of definition.imports) {
    if (isGlobPattern(spec)) {
      const matches = await context.globCache.expand(spec, directory);
      imports.push(...matches.map((match) => resolvePath(directory, match)));
      continue;
    }

    const importPath = resolvePath(directory, spec);
    if (!(await context.existenceCache.fileExists(importPath))) {
      throw new InvalidProjectError(`The imported project "${importPath}" was not found.`, definition.fullPath);
    }
    imports.push(importPath);
  }

  return imports;
}

async function evaluateItems(
  definition: ParsedProjectDefinition,
  directory: string,
  context: EvaluationContext
): Promise<EvaluatedItem[]> {
  const items: EvaluatedItem[] = [];

  for (const item of definition.items) {
    const excludes = splitSpecs(item.exclude);
    for (const spec of splitSpecs(item.include)) {
      // literal specs are kept whether or not the file exists
      const includes = isGlobPattern(spec) ? await context.globCache.expand(spec, directory) : [spec];
      for (const include of includes) {
        if (!isExcluded(include, excludes, directory)) {
          items.push({ itemType: item.itemType, evaluatedInclude: include });
        }
      }
    }
  }

  return items;
}

/**
 * Evaluate a project against the caches of context
 */
export async function evaluateProject(
  definition: ParsedProjectDefinition,
  context: EvaluationContext
): Promise<ProjectEvaluation> {
  const directory = path.posix.dirname(normalizePath(definition.fullPath));
  const sdks = await evaluateSdks(definition, context);
  const imports = await evaluateImports(definition, directory, context);
  const items = await evaluateItems(definition, directory, context);

  return {
    sdkResults: sdks.sdkResults,
    imports: [...sdks.imports, ...imports],
    items,
  };
}
