import type { TaskRecord, TaskPayload } from "../record_types";
import { isTaskRecord, validateTaskRecordDetailed } from "../validation";
import { DetailedValidationError, RequiredFieldError } from "../errors";

const REQUIRED_FIELDS = ['id', 'title', 'suspenseDate', 'originator', 'orgUnitId'] as const;

/**
 * Creates a new, fully-formed TaskRecord with validation.
 *
 * Defaults: status 'draft', classification 'unclassified', empty tags and
 * description, priorityScore 0 (the workflow layer stamps the real score).
 */
export function createTaskRecord(payload: TaskPayload, now: number = Date.now()): TaskRecord {
  const missing = REQUIRED_FIELDS.filter(field => !payload[field]);
  if (missing.length > 0) {
    throw new RequiredFieldError('TaskRecord', missing);
  }

  const task: TaskRecord = {
    id: payload.id ?? '',
    title: payload.title ?? '',
    description: payload.description ?? '',
    tags: payload.tags ?? [],
    classification: payload.classification ?? 'unclassified',
    suspenseDate: payload.suspenseDate ?? '',
    originator: payload.originator ?? '',
    orgUnitId: payload.orgUnitId ?? '',
    status: payload.status ?? 'draft',
    priorityScore: payload.priorityScore ?? 0,
    createdAt: payload.createdAt ?? now,
    updatedAt: payload.updatedAt ?? now,
    ...(payload.recordSeriesId !== undefined ? { recordSeriesId: payload.recordSeriesId } : {}),
  };

  const validation = validateTaskRecordDetailed(task);
  if (!validation.isValid) {
    throw new DetailedValidationError('TaskRecord', validation.errors);
  }

  return task;
}

/**
 * Builds a TaskRecord from an untyped document (a parsed YAML or JSON task
 * file). Missing optional fields get the same defaults as createTaskRecord;
 * everything else must already match the schema.
 */
export function createTaskRecordFromDocument(document: unknown, now: number = Date.now()): TaskRecord {
  if (typeof document !== 'object' || document === null || Array.isArray(document)) {
    throw new DetailedValidationError('TaskRecord', [
      { field: '/', message: 'must be object', value: document },
    ]);
  }

  const candidate = {
    description: '',
    tags: [],
    classification: 'unclassified',
    status: 'draft',
    priorityScore: 0,
    createdAt: now,
    updatedAt: now,
    ...document,
  };
  if (!isTaskRecord(candidate)) {
    throw new DetailedValidationError('TaskRecord', validateTaskRecordDetailed(candidate).errors);
  }
  return candidate;
}
