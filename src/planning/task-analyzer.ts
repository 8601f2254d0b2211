/**
 * Task Analyzer
 *
 * Classifies a raw task description:
 * - Complexity tier from keyword markers and action verb count
 * - Ranked domain tags from per-domain vocabularies
 * - Requirement fragments for the generic decomposition strategy
 *
 * Analysis never fails. Ambiguous input resolves through the fallback
 * rules in determineComplexity(), empty input yields simple/general.
 */

import vocabularyData from './data/vocabulary.json';
import { TaskComplexity } from '../models/enums';
import type { TaskAnalysis } from '../models/subtask';
import type { WorkflowLogger } from '../logging/workflow-logger';

export interface AnalyzerVocabulary {
  complexityMarkers: {
    simple: readonly string[];
    medium: readonly string[];
    complex: readonly string[];
  };
  actionVerbs: readonly string[];
  /** Domain name -> keywords. Key order is the tie-break order. */
  domains: Readonly<Record<string, readonly string[]>>;
  /** Domains earning a half point when any of these keywords appears */
  priorityKeywords: Readonly<Record<string, readonly string[]>>;
}

export const DEFAULT_VOCABULARY: AnalyzerVocabulary = vocabularyData;

export const GENERAL_DOMAIN = 'general';

const MAX_REQUIREMENTS = 10;
const MIN_REQUIREMENT_LENGTH = 6;
const MAX_ESTIMATED_SUBTASKS = 10;
const PRIORITY_BONUS = 0.5;

const BASE_SUBTASK_COUNTS: Record<TaskComplexity, number> = {
  [TaskComplexity.SIMPLE]: 1,
  [TaskComplexity.MEDIUM]: 3,
  [TaskComplexity.COMPLEX]: 5,
};

function countMatches(text: string, keywords: readonly string[]): number {
  let count = 0;
  for (const keyword of keywords) {
    if (text.includes(keyword)) {
      count++;
    }
  }
  return count;
}

export class TaskAnalyzer {
  private readonly vocabulary: AnalyzerVocabulary;
  private readonly logger?: WorkflowLogger;

  constructor(options: { vocabulary?: AnalyzerVocabulary; logger?: WorkflowLogger } = {}) {
    this.vocabulary = options.vocabulary ?? DEFAULT_VOCABULARY;
    this.logger = options.logger;
  }

  analyze(description: string): TaskAnalysis {
    const raw = typeof description === 'string' ? description : '';
    const text = raw.toLowerCase();

    const actionCount = countMatches(text, this.vocabulary.actionVerbs);
    const complexity = this.determineComplexity(text, actionCount);
    const domainScores = this.scoreDomains(text);
    const domains = this.rankDomains(domainScores);
    const requirements = this.extractRequirements(raw);

    const analysis: TaskAnalysis = Object.freeze({
      description: raw,
      complexity,
      domains: Object.freeze(domains),
      domainScores: Object.freeze(domainScores),
      requiresDecomposition: complexity !== TaskComplexity.SIMPLE,
      estimatedSubtasks: Math.min(BASE_SUBTASK_COUNTS[complexity] + actionCount, MAX_ESTIMATED_SUBTASKS),
      requirements: Object.freeze(requirements),
    });

    this.logger?.info('ANALYSIS', `Classified task as ${complexity} (${domains.join(', ')})`, {
      details: {
        complexity,
        domains,
        actionCount,
        estimatedSubtasks: analysis.estimatedSubtasks,
        requirementCount: requirements.length,
      },
    });

    return analysis;
  }

  /**
   * Rules are checked in order:
   * 1. any complex marker, or more than 3 action verbs -> complex
   * 2. an action verb and no simple marker -> medium
   * 3. a simple marker and at most one action verb -> simple
   * 4. a medium marker, or more than one action verb -> medium
   * 5. otherwise simple
   */
  determineComplexity(text: string, actionCount: number): TaskComplexity {
    const markers = this.vocabulary.complexityMarkers;
    const complexScore = countMatches(text, markers.complex);
    const mediumScore = countMatches(text, markers.medium);
    const simpleScore = countMatches(text, markers.simple);

    if (complexScore > 0 || actionCount > 3) {
      return TaskComplexity.COMPLEX;
    }
    if (actionCount >= 1 && simpleScore === 0) {
      return TaskComplexity.MEDIUM;
    }
    if (simpleScore > 0 && actionCount <= 1) {
      return TaskComplexity.SIMPLE;
    }
    if (mediumScore > 0 || actionCount > 1) {
      return TaskComplexity.MEDIUM;
    }
    return TaskComplexity.SIMPLE;
  }

  private scoreDomains(text: string): Record<string, number> {
    const scores: Record<string, number> = {};

    for (const [domain, keywords] of Object.entries(this.vocabulary.domains)) {
      const score = countMatches(text, keywords);
      if (score > 0) {
        scores[domain] = score;
      }
    }

    for (const [domain, keywords] of Object.entries(this.vocabulary.priorityKeywords)) {
      const current = scores[domain];
      if (current !== undefined && keywords.some((kw) => text.includes(kw))) {
        scores[domain] = current + PRIORITY_BONUS;
      }
    }

    return scores;
  }

  private rankDomains(scores: Record<string, number>): string[] {
    const ranked = Object.keys(scores).sort((a, b) => (scores[b] ?? 0) - (scores[a] ?? 0));
    return ranked.length > 0 ? ranked : [GENERAL_DOMAIN];
  }

  private extractRequirements(description: string): string[] {
    return description
      .replace(/,/g, '\n')
      .split(' and ')
      .join('\n')
      .split('\n')
      .map((part) => part.trim())
      .filter((part) => part.length >= MIN_REQUIREMENT_LENGTH)
      .slice(0, MAX_REQUIREMENTS);
  }
}
