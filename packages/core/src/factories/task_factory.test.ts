import { createTaskRecord, createTaskRecordFromDocument } from './task_factory';
import { DetailedValidationError, RequiredFieldError } from '../errors';
import type { TaskPayload } from '../record_types';

describe('createTaskRecord', () => {
  const now = Date.UTC(2026, 2, 10);
  const payload: TaskPayload = {
    id: 'T-26-000001',
    title: 'Prepare readiness brief',
    suspenseDate: '2026-03-20',
    originator: 'ACOM G-3',
    orgUnitId: 'OPS_G3',
  };

  it('should fill defaults for optional fields', () => {
    expect(createTaskRecord(payload, now)).toEqual({
      id: 'T-26-000001',
      title: 'Prepare readiness brief',
      description: '',
      tags: [],
      classification: 'unclassified',
      suspenseDate: '2026-03-20',
      originator: 'ACOM G-3',
      orgUnitId: 'OPS_G3',
      status: 'draft',
      priorityScore: 0,
      createdAt: now,
      updatedAt: now,
    });
  });

  it('should preserve provided optional fields', () => {
    const task = createTaskRecord({
      ...payload,
      description: 'Full readiness brief for the monthly review.',
      tags: ['readiness'],
      classification: 'confidential',
      recordSeriesId: '1a',
      status: 'in-work',
    }, now);

    expect(task.classification).toBe('confidential');
    expect(task.recordSeriesId).toBe('1a');
    expect(task.status).toBe('in-work');
    expect(task.tags).toEqual(['readiness']);
  });

  it('should throw RequiredFieldError listing every missing field', () => {
    expect(() => createTaskRecord({ title: 'No deadline' }, now)).toThrow(
      new RequiredFieldError('TaskRecord', ['id', 'suspenseDate', 'originator', 'orgUnitId'])
    );
  });

  it('should throw DetailedValidationError for a malformed suspense date', () => {
    expect(() => createTaskRecord({ ...payload, suspenseDate: '20 March' }, now)).toThrow(DetailedValidationError);
  });
});

describe('createTaskRecordFromDocument', () => {
  const now = Date.UTC(2026, 2, 10);

  it('should fill defaults around a parsed task file', () => {
    const task = createTaskRecordFromDocument({
      id: 'T-26-000002',
      title: 'Publish training calendar',
      suspenseDate: '2026-03-31',
      originator: 'DRU staff',
      orgUnitId: 'OPS_G3',
      status: 'open',
    }, now);

    expect(task.status).toBe('open');
    expect(task.tags).toEqual([]);
    expect(task.priorityScore).toBe(0);
    expect(task.createdAt).toBe(now);
  });

  it('should reject a document that is not an object', () => {
    expect(() => createTaskRecordFromDocument(['T-26-000002'], now)).toThrow(
      'TaskRecord validation failed: /: must be object'
    );
  });

  it('should report unknown fields', () => {
    let caught: unknown;
    try {
      createTaskRecordFromDocument({
        id: 'T-26-000002',
        title: 'Publish training calendar',
        suspenseDate: '2026-03-31',
        originator: 'DRU staff',
        orgUnitId: 'OPS_G3',
        owner: 'someone',
      }, now);
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(DetailedValidationError);
    expect(caught instanceof DetailedValidationError && caught.errors[0]?.message).toBe('must NOT have additional properties');
  });
});
