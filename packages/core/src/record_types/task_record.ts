/**
 * Security classification carried by every task.
 */
export type TaskClassification = 'unclassified' | 'confidential' | 'secret' | 'top-secret';

export const TASK_CLASSIFICATIONS: readonly TaskClassification[] = [
  'unclassified',
  'confidential',
  'secret',
  'top-secret',
];

/**
 * Known workflow states. Stored records may carry other strings written by
 * older clients; the engine scores those with its documented defaults.
 */
export type KnownTaskStatus = 'draft' | 'open' | 'in-work' | 'overdue' | 'closed';

export const TASK_STATUSES: readonly KnownTaskStatus[] = ['draft', 'open', 'in-work', 'overdue', 'closed'];

/**
 * Task status as seen by the engine. Keeps autocomplete for the known
 * values while still accepting unrecognised ones.
 */
export type TaskStatus = KnownTaskStatus | (string & {});

/**
 * The fields the engine reads. Never mutated by engine components.
 */
export interface TaskSnapshot {
  id: string;
  title: string;
  description: string;
  /** Ordered keyword tags */
  tags: string[];
  classification: TaskClassification;
  /** Deadline as an ISO calendar date (YYYY-MM-DD) */
  suspenseDate: string;
  /** Free text naming the requesting entity, e.g. "HQDA DCS G-3/5/7" */
  originator: string;
  orgUnitId: string;
  status: TaskStatus;
  /** Records-management series identifier (ARIMS tag) */
  recordSeriesId?: string;
  /** Stamped by the workflow layer; absent until first scored */
  priorityScore?: number;
}

/**
 * A persisted task: the snapshot plus bookkeeping stamped by the workflow layer.
 */
export interface TaskRecord extends TaskSnapshot {
  priorityScore: number;
  /** Epoch milliseconds */
  createdAt: number;
  /** Epoch milliseconds */
  updatedAt: number;
}

export type TaskPayload = Partial<TaskRecord>;
