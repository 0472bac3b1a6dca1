import type { TaskSnapshot } from '../record_types';
import type { EngineConfig } from '../engine_config';
import { assertPresent, PreconditionError } from '../errors';
import { createLogger, type Logger } from '../logger';
import { daysUntil, isValidDate } from '../utils/date_utils';
import { round2 } from '../utils/number_utils';

/**
 * Component weights of the priority score. They sum to 0.8 on top of the
 * 0.2 base.
 */
export const PRIORITY_WEIGHTS = {
  base: 0.2,
  urgency: 0.35,
  originator: 0.25,
  keyword: 0.15,
  status: 0.05,
} as const;

/**
 * Urgency step function, nearest deadline first. Days past the last step
 * score URGENCY_FLOOR. The 3/7/14 day edges line up with the risk tiers.
 */
export const URGENCY_STEPS: ReadonlyArray<{ maxDays: number; score: number }> = [
  { maxDays: 0, score: 1.0 },
  { maxDays: 3, score: 0.85 },
  { maxDays: 7, score: 0.7 },
  { maxDays: 14, score: 0.5 },
];
export const URGENCY_FLOOR = 0.3;

export interface PriorityBreakdown {
  /** Whole days to suspense; null when the suspense date does not parse */
  daysRemaining: number | null;
  urgency: number;
  originator: number;
  keywordBoost: number;
  matchedKeywords: string[];
  status: number;
  score: number;
}

export function urgencyScore(daysRemaining: number): number {
  for (const step of URGENCY_STEPS) {
    if (daysRemaining <= step.maxDays) return step.score;
  }
  return URGENCY_FLOOR;
}

/**
 * PriorityScorer - maps a task snapshot to an urgency score in [0, 1].
 *
 * Pure and total: unknown statuses, unmatched originators and unparseable
 * suspense dates fall back to defaults. Only a missing task or an invalid
 * `today` is rejected.
 */
export class PriorityScorer {
  private readonly logger: Logger;

  constructor(
    private readonly config: EngineConfig,
    logger?: Logger
  ) {
    this.logger = logger ?? createLogger('[PriorityScorer] ');
  }

  score(task: TaskSnapshot, today: Date): number {
    return this.explain(task, today).score;
  }

  /**
   * Same computation as `score`, with each normalized sub-score exposed.
   */
  explain(task: TaskSnapshot, today: Date): PriorityBreakdown {
    assertPresent(task, 'PriorityScorer.score', 'task');
    if (!(today instanceof Date) || !isValidDate(today)) {
      throw new PreconditionError('PriorityScorer.score', 'today must be a valid Date');
    }

    const daysRemaining = daysUntil(task.suspenseDate, today);
    if (daysRemaining === null) {
      this.logger.warn(`Task ${task.id} has unparseable suspense date '${task.suspenseDate}'; treating as due today`);
    }
    const urgency = urgencyScore(daysRemaining ?? 0);
    const originator = this.originatorScore(task.originator);
    const matchedKeywords = this.matchKeywords(task.tags, task.description);
    const keywordBoost = matchedKeywords.length === 0
      ? 0
      : Math.min(0.2 + 0.1 * matchedKeywords.length, 0.4);
    const status = this.statusScore(task.status);

    const total = PRIORITY_WEIGHTS.base
      + PRIORITY_WEIGHTS.urgency * urgency
      + PRIORITY_WEIGHTS.originator * originator
      + PRIORITY_WEIGHTS.keyword * keywordBoost
      + PRIORITY_WEIGHTS.status * status;

    return {
      daysRemaining,
      urgency,
      originator,
      keywordBoost,
      matchedKeywords,
      status,
      score: round2(Math.min(total, 1.0)),
    };
  }

  private originatorScore(originator: string): number {
    const upper = (originator ?? '').toUpperCase();
    const row = this.config.originatorWeights.find(entry => upper.includes(entry.match.toUpperCase()));
    return row ? row.weight : this.config.defaultOriginatorWeight;
  }

  /**
   * Distinct table keywords present in tags + description, in table order.
   */
  private matchKeywords(tags: string[], description: string): string[] {
    const text = [...(tags ?? []), description ?? ''].join(' ').toLowerCase();
    const matched: string[] = [];
    for (const { keyword } of this.config.keywordSections) {
      if (!matched.includes(keyword) && text.includes(keyword)) {
        matched.push(keyword);
      }
    }
    return matched;
  }

  private statusScore(status: string): number {
    const weights = this.config.statusWeights;
    const weight = Object.hasOwn(weights, status) ? weights[status] : undefined;
    return weight ?? this.config.defaultStatusWeight;
  }
}
