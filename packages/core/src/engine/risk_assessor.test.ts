import { RiskAssessor } from './risk_assessor';
import { getDefaultEngineConfig } from '../engine_config';
import { createTaskSnapshot } from './test_fixtures';

describe('RiskAssessor', () => {
  const assessor = new RiskAssessor(getDefaultEngineConfig());
  const scored = (priorityScore: number, status: string = 'open') =>
    ({ ...createTaskSnapshot({ status }), priorityScore });

  it('should report green with a default driver for low scores', () => {
    expect(assessor.assess(scored(0.49))).toEqual({
      taskId: 'T-26-000001',
      riskLevel: 'green',
      lateProbability: 0.2,
      drivers: ['No major risk factors detected'],
      recommendedActions: ['Confirm staffing plan', 'Send reminder via notification service'],
    });
  });

  it('should report amber from 0.6', () => {
    const insight = assessor.assess(scored(0.6));

    expect(insight.riskLevel).toBe('amber');
    expect(insight.lateProbability).toBe(0.5);
    expect(insight.drivers).toEqual(['Moderate urgency from suspense/prior history']);
  });

  it('should report red from 0.8', () => {
    const insight = assessor.assess(scored(0.8));

    expect(insight.riskLevel).toBe('red');
    expect(insight.lateProbability).toBe(0.75);
    expect(insight.drivers).toEqual(['High priority score indicates urgency']);
  });

  it('should keep 0.59 green and 0.79 amber', () => {
    expect(assessor.assess(scored(0.59)).riskLevel).toBe('green');
    expect(assessor.assess(scored(0.79)).riskLevel).toBe('amber');
  });

  it('should always report red at 0.9 for overdue tasks', () => {
    for (const score of [0, 0.3, 0.65, 0.95]) {
      const insight = assessor.assess(scored(score, 'overdue'));
      expect(insight.riskLevel).toBe('red');
      expect(insight.lateProbability).toBe(0.9);
    }
  });

  it('should keep the score driver ahead of the overdue driver', () => {
    expect(assessor.assess(scored(0.85, 'overdue')).drivers).toEqual([
      'High priority score indicates urgency',
      'Task already overdue',
    ]);
    expect(assessor.assess(scored(0.1, 'overdue')).drivers).toEqual(['Task already overdue']);
  });

  it('should use the configured thresholds', () => {
    const strict = new RiskAssessor({
      ...getDefaultEngineConfig(),
      riskThresholds: { red: 0.9, amber: 0.7 },
    });

    expect(strict.assess(scored(0.85)).riskLevel).toBe('amber');
    expect(strict.assess(scored(0.65)).riskLevel).toBe('green');
    expect(strict.assess(scored(0.9)).riskLevel).toBe('red');
  });

  it('should return a fresh actions array each time', () => {
    const first = assessor.assess(scored(0.5));
    first.recommendedActions.push('mutated');

    expect(assessor.assess(scored(0.5)).recommendedActions).toHaveLength(2);
  });
});
