import { isTaskRecord, validateTaskRecordDetailed } from './task_validator';
import { TASK_CLASSIFICATIONS, TASK_STATUSES, type TaskRecord } from '../record_types';

function createTask(overrides: Partial<TaskRecord> = {}): TaskRecord {
  return {
    id: 'T-26-000001',
    title: 'Brief the readiness rollup',
    description: 'Prepare the monthly readiness rollup for the commander.',
    tags: ['readiness'],
    classification: 'unclassified',
    suspenseDate: '2026-03-12',
    originator: 'ACOM G-3',
    orgUnitId: 'OPS_G3',
    status: 'open',
    priorityScore: 0.62,
    createdAt: 1772323200000,
    updatedAt: 1772323200000,
    ...overrides,
  };
}

describe('validateTaskRecordDetailed', () => {
  it('should accept every classification and known status', () => {
    for (const classification of TASK_CLASSIFICATIONS) {
      expect(isTaskRecord(createTask({ classification }))).toBe(true);
    }
    for (const status of TASK_STATUSES) {
      expect(isTaskRecord(createTask({ status }))).toBe(true);
    }
  });

  it('should accept a complete task record', () => {
    expect(validateTaskRecordDetailed(createTask())).toEqual({ isValid: true, errors: [] });
    expect(isTaskRecord(createTask())).toBe(true);
  });

  it('should accept unrecognised status strings', () => {
    expect(validateTaskRecordDetailed(createTask({ status: 'on-hold' })).isValid).toBe(true);
  });

  it('should report an unknown classification by field', () => {
    const result = validateTaskRecordDetailed({ ...createTask(), classification: 'restricted' });

    expect(result.isValid).toBe(false);
    expect(result.errors).toEqual([
      {
        field: '/classification',
        message: 'must be equal to one of the allowed values',
        value: 'restricted',
      },
    ]);
  });

  it('should reject a priority score above 1', () => {
    const result = validateTaskRecordDetailed(createTask({ priorityScore: 1.5 }));

    expect(result.isValid).toBe(false);
    expect(result.errors.map(error => error.field)).toEqual(['/priorityScore']);
  });

  it('should reject non-object input', () => {
    expect(isTaskRecord(null)).toBe(false);
    expect(validateTaskRecordDetailed('task').isValid).toBe(false);
  });
});
