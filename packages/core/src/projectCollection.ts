/**
 * ProjectCollection - tracks loaded projects so reloading re-evaluates instead of starting over
 */

import type { EvaluationContext } from './evaluationContext.js';
import { parseProjectDefinition, type ProjectDefinition } from './evaluator.js';
import { normalizePath } from './pathNormalizer.js';
import { Project } from './project.js';
import type { Logger } from './types.js';

export interface ProjectCollectionOptions {
  /** Template for new projects; each one receives `context.contextForNewProject()` */
  context?: EvaluationContext;
  logger?: Logger;
}

export class ProjectCollection {
  private readonly projects = new Map<string, Promise<Project>>();

  constructor(private readonly options: ProjectCollectionOptions = {}) {}

  /**
   * Load a project, or re-evaluate it with its own context when already loaded.
   * A reload evaluates the definition passed in, not the one first loaded.
   */
  async loadProject(definition: ProjectDefinition): Promise<Project> {
    const parsed = parseProjectDefinition(definition);
    const key = normalizePath(parsed.fullPath);

    const loaded = this.projects.get(key);
    if (loaded) {
      const project = await loaded;
      project.updateDefinition(parsed);
      await project.reevaluate();
      return project;
    }

    const pending = Project.load(parsed, this.options);
    this.projects.set(key, pending);
    try {
      return await pending;
    } catch (err) {
      this.projects.delete(key);
      throw err;
    }
  }

  getLoadedProject(fullPath: string): Promise<Project> | undefined {
    return this.projects.get(normalizePath(fullPath));
  }

  /**
   * Forget a project; the next load starts with a new context
   */
  unloadProject(fullPath: string): boolean {
    return this.projects.delete(normalizePath(fullPath));
  }

  /** Normalized full paths of the loaded projects */
  get loadedProjects(): string[] {
    return [...this.projects.keys()];
  }
}
