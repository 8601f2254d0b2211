/**
 * Task Decomposer
 *
 * Breaks an analysed task into subtasks:
 * - Domain strategies emit a fixed chain of phases, each depending on the previous one
 * - Other domains slice the analyser's requirement fragments into a chain
 * - Tasks that need no decomposition become a single root subtask
 *
 * The returned set never contains dangling dependency references.
 */

import phaseTemplateData from './data/phase-templates.json';
import { TaskComplexity } from '../models/enums';
import { createSubTask, type SubTask, type TaskAnalysis } from '../models/subtask';
import { GENERAL_DOMAIN } from './task-analyzer';
import { validateSubtasks } from './dependency-mapper';
import type { WorkflowLogger } from '../logging/workflow-logger';

export interface PhaseTemplate {
  title: string;
  domain: string;
}

export type PhaseTemplates = Readonly<Record<string, readonly PhaseTemplate[]>>;

export const DEFAULT_PHASE_TEMPLATES: PhaseTemplates = phaseTemplateData;

export const ROOT_TASK_ID = 'task_0';
export const DEFAULT_MAX_DEPTH = 3;
export const DEFAULT_MAX_GENERIC_SUBTASKS = 5;

/**
 * Output of a decomposition.
 * `taskTree` maps every id (root included) to its direct children by parentId.
 */
export interface Decomposition {
  rootTask: SubTask;
  subtasks: SubTask[];
  taskTree: Record<string, string[]>;
  /** Strategy that produced the subtasks */
  strategy: string;
}

/**
 * Anything able to turn an analysis into subtasks
 */
export interface ITaskDecomposer {
  decompose(analysis: TaskAnalysis, maxDepth?: number): Decomposition;
}

export interface TaskDecomposerOptions {
  templates?: PhaseTemplates;
  maxGenericSubtasks?: number;
  logger?: WorkflowLogger;
}

function taskId(index: number): string {
  return `task_${index}`;
}

export class TaskDecomposer implements ITaskDecomposer {
  private readonly templates: PhaseTemplates;
  private readonly maxGenericSubtasks: number;
  private readonly logger?: WorkflowLogger;

  constructor(options: TaskDecomposerOptions = {}) {
    this.templates = options.templates ?? DEFAULT_PHASE_TEMPLATES;
    this.maxGenericSubtasks = options.maxGenericSubtasks ?? DEFAULT_MAX_GENERIC_SUBTASKS;
    this.logger = options.logger;
  }

  decompose(analysis: TaskAnalysis, maxDepth: number = DEFAULT_MAX_DEPTH): Decomposition {
    const primaryDomain = analysis.domains[0] ?? GENERAL_DOMAIN;
    const rootTask = createSubTask({
      id: ROOT_TASK_ID,
      description: analysis.description,
      domain: primaryDomain,
      complexity: analysis.complexity,
    });

    // maxDepth counts tree levels below the root; built-in strategies use one
    if (!analysis.requiresDecomposition || maxDepth < 1) {
      this.logger?.info('DECOMPOSITION', 'Task kept as a single subtask', {
        details: { requiresDecomposition: analysis.requiresDecomposition, maxDepth },
      });
      return {
        rootTask,
        subtasks: [rootTask],
        taskTree: { [rootTask.id]: [] },
        strategy: 'single',
      };
    }

    const hasTemplate =
      primaryDomain !== GENERAL_DOMAIN &&
      Object.prototype.hasOwnProperty.call(this.templates, primaryDomain);
    const strategy = hasTemplate ? primaryDomain : GENERAL_DOMAIN;
    const subtasks = hasTemplate
      ? this.decomposeByPhases(analysis, this.templates[primaryDomain] ?? [], rootTask.id)
      : this.decomposeGeneric(analysis, rootTask.id);

    validateSubtasks(subtasks);

    this.logger?.info('DECOMPOSITION', `Decomposed into ${subtasks.length} subtask(s) using ${strategy} strategy`, {
      details: { strategy, primaryDomain, subtaskIds: subtasks.map((t) => t.id) },
    });

    return {
      rootTask,
      subtasks,
      taskTree: buildTaskTree([rootTask, ...subtasks]),
      strategy,
    };
  }

  private decomposeByPhases(
    analysis: TaskAnalysis,
    phases: readonly PhaseTemplate[],
    parentId: string
  ): SubTask[] {
    return phases.map((phase, index) =>
      createSubTask({
        id: taskId(index + 1),
        description: `${phase.title} for ${analysis.description}`,
        parentId,
        dependencies: index > 0 ? [taskId(index)] : [],
        domain: phase.domain,
        complexity: TaskComplexity.SIMPLE,
      })
    );
  }

  private decomposeGeneric(analysis: TaskAnalysis, parentId: string): SubTask[] {
    const fragments =
      analysis.requirements.length > 0
        ? analysis.requirements
        : (this.templates[GENERAL_DOMAIN] ?? []).map((phase) => phase.title);

    return fragments.slice(0, this.maxGenericSubtasks).map((fragment, index) =>
      createSubTask({
        id: taskId(index + 1),
        description: fragment,
        parentId,
        dependencies: index > 0 ? [taskId(index)] : [],
        domain: GENERAL_DOMAIN,
        complexity: TaskComplexity.SIMPLE,
      })
    );
  }
}

/**
 * Map each task id to the ids of its direct children
 */
export function buildTaskTree(tasks: readonly SubTask[]): Record<string, string[]> {
  const tree: Record<string, string[]> = {};

  for (const task of tasks) {
    tree[task.id] = [];
  }
  for (const task of tasks) {
    if (task.parentId !== undefined) {
      tree[task.parentId]?.push(task.id);
    }
  }

  return tree;
}
