import { QualityChecker, DEFAULT_QUALITY_RULES, isBlocking, type QualityRule } from './quality_checker';
import { getDefaultEngineConfig } from '../engine_config';
import { createTaskSnapshot } from './test_fixtures';

describe('QualityChecker', () => {
  const checker = new QualityChecker(getDefaultEngineConfig());

  it('should pass a complete task', () => {
    expect(checker.check(createTaskSnapshot())).toEqual({
      taskId: 'T-26-000001',
      issues: [],
      passed: true,
    });
  });

  it('should flag a short description and a missing record series together', () => {
    const task = createTaskSnapshot({
      description: 'Urgent',
      suspenseDate: '2026-03-12',
      status: 'open',
      recordSeriesId: undefined,
    });

    expect(checker.check(task)).toEqual({
      taskId: 'T-26-000001',
      issues: [
        { code: 'DESC_LEN', severity: 'medium', message: 'Description is brief; Army 25-50 recommends more context.' },
        { code: 'ARIMS_TAG', severity: 'low', message: 'ARIMS record series missing; add before final approval.' },
      ],
      passed: false,
    });
  });

  it('should still pass when only low-severity issues exist', () => {
    const result = checker.check(createTaskSnapshot({ recordSeriesId: '   ' }));

    expect(result.issues.map(issue => issue.code)).toEqual(['ARIMS_TAG']);
    expect(result.passed).toBe(true);
  });

  it('should treat exactly 30 characters as long enough', () => {
    expect(checker.check(createTaskSnapshot({ description: 'x'.repeat(30) })).passed).toBe(true);
    expect(checker.check(createTaskSnapshot({ description: 'x'.repeat(29) })).passed).toBe(false);
  });

  it('should count characters outside the BMP once each', () => {
    const script = '\u{1D4AF}'.repeat(20);
    const result = checker.check(createTaskSnapshot({ description: script }));

    expect(script.length).toBe(40);
    expect(result.issues.map(issue => issue.code)).toEqual(['DESC_LEN']);
    expect(result.passed).toBe(false);
    expect(checker.check(createTaskSnapshot({ description: '\u{1D4AF}'.repeat(30) })).passed).toBe(true);
  });

  it('should honour the configured minimum length', () => {
    const lenient = new QualityChecker({ descriptionMinLength: 5 });

    expect(lenient.check(createTaskSnapshot({ description: 'Urgent' })).issues).toEqual([]);
  });

  it('should decide pass/fail from severity for additional rules', () => {
    const classifiedRule: QualityRule = {
      code: 'CLASS_MARK',
      severity: 'high',
      evaluate: task => task.classification === 'unclassified' ? null : 'Classified tasks need a marking review.',
    };
    const strict = new QualityChecker(getDefaultEngineConfig(), [...DEFAULT_QUALITY_RULES, classifiedRule]);

    const result = strict.check(createTaskSnapshot({ classification: 'secret' }));
    expect(result.issues.map(issue => [issue.code, issue.severity])).toEqual([['CLASS_MARK', 'high']]);
    expect(result.passed).toBe(false);
  });

  it('should rank severities', () => {
    expect(isBlocking('low')).toBe(false);
    expect(isBlocking('medium')).toBe(true);
    expect(isBlocking('high')).toBe(true);
  });
});
