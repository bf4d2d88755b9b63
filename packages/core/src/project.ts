/**
 * Project - an evaluation unit bound to the context it was last evaluated with
 */

import * as path from 'path';
import { EvaluationContext, SharingPolicy } from './evaluationContext.js';
import {
  evaluateProject,
  parseProjectDefinition,
  type EvaluatedItem,
  type ParsedProjectDefinition,
  type ProjectDefinition,
  type ProjectEvaluation,
} from './evaluator.js';
import { InvalidProjectError } from './errors.js';
import { normalizePath } from './pathNormalizer.js';
import type { Logger, SdkResultSuccess } from './types.js';

export interface ProjectOptions {
  /** A new project evaluates with `context.contextForNewProject()` */
  context?: EvaluationContext;
  /** Used by the Isolated context created when no context is given */
  logger?: Logger;
}

export class Project {
  private context: EvaluationContext;
  private parsedDefinition: ParsedProjectDefinition;
  private evaluation: ProjectEvaluation = { sdkResults: [], imports: [], items: [] };
  private evaluations = 0;

  private constructor(definition: ParsedProjectDefinition, context: EvaluationContext) {
    this.parsedDefinition = definition;
    this.context = context;
  }

  /**
   * Load and evaluate a project seen for the first time
   */
  static async load(definition: ProjectDefinition, options: ProjectOptions = {}): Promise<Project> {
    const parsed = parseProjectDefinition(definition);
    const context =
      options.context?.contextForNewProject() ??
      EvaluationContext.create({
        policy: SharingPolicy.Isolated,
        ...(options.logger ? { logger: options.logger } : {}),
      });

    const project = new Project(parsed, context);
    await project.evaluate();
    return project;
  }

  get definition(): ParsedProjectDefinition {
    return this.parsedDefinition;
  }

  get fullPath(): string {
    return normalizePath(this.parsedDefinition.fullPath);
  }

  get directoryPath(): string {
    return path.posix.dirname(this.fullPath);
  }

  /** Context used by the last evaluation */
  get evaluationContext(): EvaluationContext {
    return this.context;
  }

  get evaluationCount(): number {
    return this.evaluations;
  }

  get items(): readonly EvaluatedItem[] {
    return this.evaluation.items;
  }

  get imports(): readonly string[] {
    return this.evaluation.imports;
  }

  get sdkResults(): readonly SdkResultSuccess[] {
    return this.evaluation.sdkResults;
  }

  getItems(itemType: string): string[] {
    return this.evaluation.items
      .filter((item) => item.itemType.toLowerCase() === itemType.toLowerCase())
      .map((item) => item.evaluatedInclude);
  }

  /**
   * Evaluate again. A supplied context replaces the associated one; otherwise
   * the associated context is reused, whatever its policy.
   */
  async reevaluate(context?: EvaluationContext): Promise<void> {
    if (context) {
      this.context = context;
    }
    await this.evaluate();
  }

  /**
   * Replace the definition used by the next evaluation.
   * @throws InvalidProjectError when the definition names another project
   */
  updateDefinition(definition: ProjectDefinition): void {
    const parsed = parseProjectDefinition(definition);
    if (normalizePath(parsed.fullPath) !== this.fullPath) {
      throw new InvalidProjectError(
        `Cannot replace the definition of "${this.fullPath}" with one for "${normalizePath(parsed.fullPath)}"`,
        this.fullPath
      );
    }
    this.parsedDefinition = parsed;
  }

  private async evaluate(): Promise<void> {
    this.evaluation = await evaluateProject(this.parsedDefinition, this.context);
    this.evaluations++;
  }
}
