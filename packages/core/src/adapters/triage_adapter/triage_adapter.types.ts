import type { RecordStores } from '../../record_store';
import type { TaskEngine } from '../../engine';
import type { Logger } from '../../logger';
import type {
  TaskRecord,
  TaskPayload,
  AssignmentRecord,
  CommentRecord,
  AuthoritySuggestion,
  RiskInsight,
  QualityCheckResult,
  TaskSummary,
} from '../../record_types';

/**
 * TriageAdapter Dependencies - Facade + Dependency Injection Pattern
 */
export type TriageAdapterDependencies = {
  // Data Layer
  stores: Pick<RecordStores, 'tasks' | 'assignments' | 'comments'>;

  // Scoring engine, already bound to the hierarchy and authority lookups
  engine: TaskEngine;

  // Infrastructure Layer (Optional)
  clock?: () => Date;
  logger?: Logger;
};

/**
 * Fields a caller may supply when creating a task. Status, score and
 * timestamps are stamped by the adapter.
 */
export type TaskCreatePayload = Omit<TaskPayload, 'status' | 'priorityScore' | 'createdAt' | 'updatedAt'>;

/**
 * Fields a caller may change on an existing task.
 */
export type TaskUpdatePayload = Partial<Omit<TaskRecord, 'id' | 'priorityScore' | 'createdAt' | 'updatedAt'>>;

export type TaskListFilters = {
  status?: string;
  /** Inclusive YYYY-MM-DD bound on the suspense date */
  dueBefore?: string;
  orgUnitId?: string;
};

export type AssignmentCreatePayload = Omit<AssignmentRecord, 'taskId'>;

export type CommentCreatePayload = Pick<CommentRecord, 'authorId' | 'body'> & { parentCommentId?: string };

export type CreatedTask = {
  task: TaskRecord;
  assignment: AssignmentRecord;
};

/**
 * TriageAdapter Interface - task workflow around the scoring engine
 */
export interface ITriageAdapter {
  createTask(payload: TaskCreatePayload): Promise<CreatedTask>;
  updateTask(taskId: string, patch: TaskUpdatePayload): Promise<TaskRecord>;
  getTask(taskId: string): Promise<TaskRecord | null>;
  listTasks(filters?: TaskListFilters): Promise<TaskRecord[]>;

  addAssignment(taskId: string, payload: AssignmentCreatePayload): Promise<AssignmentRecord>;
  listAssignments(taskId: string): Promise<AssignmentRecord[]>;
  addComment(taskId: string, payload: CommentCreatePayload): Promise<CommentRecord>;
  listComments(taskId: string): Promise<CommentRecord[]>;

  // Read-only insights; never mutate state
  getAuthoritySuggestions(taskId: string, limit?: number): Promise<AuthoritySuggestion[]>;
  getRisk(taskId: string): Promise<RiskInsight>;
  getQualityCheck(taskId: string): Promise<QualityCheckResult>;
  getSummary(taskId: string): Promise<TaskSummary>;
}
