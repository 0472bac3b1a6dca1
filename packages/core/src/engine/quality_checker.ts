import type { TaskSnapshot, QualityIssue, QualityCheckResult, IssueSeverity } from '../record_types';
import type { EngineConfig } from '../engine_config';
import { assertPresent } from '../errors';

export const SEVERITY_RANK: Record<IssueSeverity, number> = {
  low: 0,
  medium: 1,
  high: 2,
};

/** Issues at or above this severity fail the check */
export const BLOCKING_SEVERITY: IssueSeverity = 'medium';

export interface QualityRuleContext {
  descriptionMinLength: number;
}

/**
 * One completeness rule. `evaluate` returns the issue message, or null when
 * the task satisfies the rule.
 */
export interface QualityRule {
  code: string;
  severity: IssueSeverity;
  evaluate(task: TaskSnapshot, context: QualityRuleContext): string | null;
}

export const DESCRIPTION_LENGTH_RULE: QualityRule = {
  code: 'DESC_LEN',
  severity: 'medium',
  evaluate: (task, context) =>
    // counted in code points, not UTF-16 units
    Array.from(task.description ?? '').length < context.descriptionMinLength
      ? 'Description is brief; Army 25-50 recommends more context.'
      : null,
};

export const RECORD_SERIES_RULE: QualityRule = {
  code: 'ARIMS_TAG',
  severity: 'low',
  evaluate: (task) =>
    !task.recordSeriesId || task.recordSeriesId.trim() === ''
      ? 'ARIMS record series missing; add before final approval.'
      : null,
};

export const DEFAULT_QUALITY_RULES: readonly QualityRule[] = [DESCRIPTION_LENGTH_RULE, RECORD_SERIES_RULE];

export function isBlocking(severity: IssueSeverity): boolean {
  return SEVERITY_RANK[severity] >= SEVERITY_RANK[BLOCKING_SEVERITY];
}

/**
 * QualityChecker - runs every completeness rule against a task. Rules do not
 * short-circuit; `passed` depends only on issue severities.
 */
export class QualityChecker {
  constructor(
    private readonly config: Pick<EngineConfig, 'descriptionMinLength'>,
    private readonly rules: readonly QualityRule[] = DEFAULT_QUALITY_RULES
  ) { }

  check(task: TaskSnapshot): QualityCheckResult {
    assertPresent(task, 'QualityChecker.check', 'task');

    const context: QualityRuleContext = { descriptionMinLength: this.config.descriptionMinLength };
    const issues: QualityIssue[] = [];
    for (const rule of this.rules) {
      const message = rule.evaluate(task, context);
      if (message !== null) {
        issues.push({ code: rule.code, severity: rule.severity, message });
      }
    }

    return {
      taskId: task.id,
      issues,
      passed: !issues.some(issue => isBlocking(issue.severity)),
    };
  }
}
