import type { TaskSnapshot, RiskInsight, RiskLevel } from '../record_types';
import type { EngineConfig } from '../engine_config';
import { assertPresent } from '../errors';
import { round2 } from '../utils/number_utils';

/**
 * A snapshot that has already been through the PriorityScorer.
 */
export type ScoredTaskSnapshot = TaskSnapshot & { priorityScore: number };

/**
 * RiskAssessor - maps a scored task to a risk tier and a lateness
 * probability. The overdue rule is applied last and always wins.
 */
export class RiskAssessor {
  constructor(private readonly config: Pick<EngineConfig, 'recommendedActions' | 'riskThresholds'>) { }

  assess(task: ScoredTaskSnapshot): RiskInsight {
    assertPresent(task, 'RiskAssessor.assess', 'task');

    let riskLevel: RiskLevel = 'green';
    let lateProbability = 0.2;
    const drivers: string[] = [];

    const { red, amber } = this.config.riskThresholds;
    if (task.priorityScore >= red) {
      riskLevel = 'red';
      lateProbability = 0.75;
      drivers.push('High priority score indicates urgency');
    } else if (task.priorityScore >= amber) {
      riskLevel = 'amber';
      lateProbability = 0.5;
      drivers.push('Moderate urgency from suspense/prior history');
    }

    if (task.status === 'overdue') {
      riskLevel = 'red';
      lateProbability = 0.9;
      drivers.push('Task already overdue');
    }

    return {
      taskId: task.id,
      riskLevel,
      lateProbability: round2(lateProbability),
      drivers: drivers.length > 0 ? drivers : ['No major risk factors detected'],
      recommendedActions: [...this.config.recommendedActions],
    };
  }
}
