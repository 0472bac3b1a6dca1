import type { RecordStore } from '../../record_store';
import type { TaskEngine } from '../../engine';
import type {
  TaskRecord,
  AssignmentRecord,
  CommentRecord,
  AuthoritySuggestion,
  RiskInsight,
  QualityCheckResult,
  TaskSummary,
} from '../../record_types';
import { createTaskRecord } from '../../factories';
import { createLogger, type Logger } from '../../logger';
import { DuplicateRecordError, PreconditionError, RecordNotFoundError } from '../../errors';
import { generateAssignmentKey, generateCommentId, generateTaskId } from '../../utils/id_generator';
import { parseIsoDate } from '../../utils/date_utils';
import type {
  ITriageAdapter,
  TriageAdapterDependencies,
  TaskCreatePayload,
  TaskUpdatePayload,
  TaskListFilters,
  AssignmentCreatePayload,
  CommentCreatePayload,
  CreatedTask,
} from './triage_adapter.types';

export type {
  ITriageAdapter,
  TriageAdapterDependencies,
  TaskCreatePayload,
  TaskUpdatePayload,
  TaskListFilters,
  AssignmentCreatePayload,
  CommentCreatePayload,
  CreatedTask,
} from './triage_adapter.types';

/**
 * TriageAdapter - task workflow around the scoring engine
 *
 * Creation scores the task as a draft, opens it and stores exactly one
 * generated owner assignment. Updates restamp the score. Insight reads load
 * the stored task and hand it to the engine without writing anything.
 */
export class TriageAdapter implements ITriageAdapter {
  private readonly taskStore: RecordStore<TaskRecord>;
  private readonly assignmentStore: RecordStore<AssignmentRecord>;
  private readonly commentStore: RecordStore<CommentRecord>;
  private readonly engine: TaskEngine;
  private readonly clock: () => Date;
  private readonly logger: Logger;

  constructor(dependencies: TriageAdapterDependencies) {
    this.taskStore = dependencies.stores.tasks;
    this.assignmentStore = dependencies.stores.assignments;
    this.commentStore = dependencies.stores.comments;
    this.engine = dependencies.engine;
    this.clock = dependencies.clock ?? (() => new Date());
    this.logger = dependencies.logger ?? createLogger('[TriageAdapter] ');
  }

  // ===== TASKS =====

  /**
   * Creates an open task, stamps its priority and stores the generated
   * owner assignment with it.
   */
  async createTask(payload: TaskCreatePayload): Promise<CreatedTask> {
    const now = this.clock();
    const taskId = payload.id ?? await this.nextTaskId(now);
    if (await this.taskStore.exists(taskId)) {
      throw new DuplicateRecordError('TaskRecord', taskId);
    }

    // 1. Build, validate and score the record while it is still a draft
    const task = createTaskRecord({ ...payload, id: taskId, status: 'draft' }, now.getTime());
    task.priorityScore = this.engine.score(task, now);

    // 2. Open it
    task.status = 'open';

    // 3. Persist task, then its generated owner assignment
    await this.taskStore.put(task.id, task);
    const assignment = await this.engine.generateAssignment(task);
    await this.assignmentStore.put(generateAssignmentKey(task.id, 1), assignment);

    this.logger.info(`Created task ${task.id} (priority ${task.priorityScore}) routed to ${assignment.assigneeId}`);
    return { task, assignment };
  }

  /**
   * Applies a partial update and restamps the priority score.
   */
  async updateTask(taskId: string, patch: TaskUpdatePayload): Promise<TaskRecord> {
    const existing = await this.requireTask(taskId);
    const now = this.clock();

    const updated = createTaskRecord({
      ...existing,
      ...patch,
      id: existing.id,
      createdAt: existing.createdAt,
      updatedAt: now.getTime(),
    }, now.getTime());
    updated.priorityScore = this.engine.score(updated, now);

    await this.taskStore.put(updated.id, updated);
    this.logger.debug(`Updated task ${updated.id} (priority ${existing.priorityScore} -> ${updated.priorityScore})`);
    return updated;
  }

  async getTask(taskId: string): Promise<TaskRecord | null> {
    return this.taskStore.get(taskId);
  }

  async listTasks(filters: TaskListFilters = {}): Promise<TaskRecord[]> {
    const dueBefore = filters.dueBefore !== undefined ? parseIsoDate(filters.dueBefore) : null;
    if (filters.dueBefore !== undefined && dueBefore === null) {
      throw new PreconditionError('TriageAdapter.listTasks', `dueBefore must be a YYYY-MM-DD date, got '${filters.dueBefore}'`);
    }
    const tasks: TaskRecord[] = [];
    for (const id of await this.taskStore.list()) {
      const task = await this.taskStore.get(id);
      if (!task) continue;
      if (filters.status !== undefined && task.status !== filters.status) continue;
      if (filters.orgUnitId !== undefined && task.orgUnitId !== filters.orgUnitId) continue;
      if (dueBefore !== null) {
        const suspense = parseIsoDate(task.suspenseDate);
        if (suspense === null || suspense > dueBefore) continue;
      }
      tasks.push(task);
    }
    return tasks;
  }

  // ===== ASSIGNMENTS & COMMENTS =====

  async addAssignment(taskId: string, payload: AssignmentCreatePayload): Promise<AssignmentRecord> {
    await this.requireTask(taskId);
    const existing = await this.listAssignments(taskId);
    const assignment: AssignmentRecord = { ...payload, taskId };
    await this.assignmentStore.put(generateAssignmentKey(taskId, existing.length + 1), assignment);
    return assignment;
  }

  async listAssignments(taskId: string): Promise<AssignmentRecord[]> {
    return this.listWhere(this.assignmentStore, record => record.taskId === taskId);
  }

  async addComment(taskId: string, payload: CommentCreatePayload): Promise<CommentRecord> {
    await this.requireTask(taskId);
    const existing = await this.listComments(taskId);
    if (payload.parentCommentId !== undefined && !existing.some(comment => comment.id === payload.parentCommentId)) {
      throw new RecordNotFoundError('CommentRecord', payload.parentCommentId);
    }

    const comment: CommentRecord = {
      id: generateCommentId(taskId, existing.length + 1),
      taskId,
      authorId: payload.authorId,
      body: payload.body,
      createdAt: this.clock().getTime(),
      ...(payload.parentCommentId !== undefined ? { parentCommentId: payload.parentCommentId } : {}),
    };
    await this.commentStore.put(comment.id, comment);
    return comment;
  }

  async listComments(taskId: string): Promise<CommentRecord[]> {
    return this.listWhere(this.commentStore, record => record.taskId === taskId);
  }

  // ===== INSIGHTS (read-only) =====

  async getAuthoritySuggestions(taskId: string, limit?: number): Promise<AuthoritySuggestion[]> {
    const task = await this.requireTask(taskId);
    return this.engine.suggestAuthorities(task, limit);
  }

  async getRisk(taskId: string): Promise<RiskInsight> {
    return this.engine.assessRisk(await this.requireTask(taskId));
  }

  async getQualityCheck(taskId: string): Promise<QualityCheckResult> {
    return this.engine.checkQuality(await this.requireTask(taskId));
  }

  async getSummary(taskId: string): Promise<TaskSummary> {
    const task = await this.requireTask(taskId);
    const comments = await this.listComments(taskId);
    return this.engine.summarize(task, comments.map(comment => comment.body));
  }

  // ===== PRIVATE HELPERS =====

  private async requireTask(taskId: string): Promise<TaskRecord> {
    const task = await this.taskStore.get(taskId);
    if (!task) {
      throw new RecordNotFoundError('TaskRecord', taskId);
    }
    return task;
  }

  private async nextTaskId(now: Date): Promise<string> {
    let sequence = (await this.taskStore.list()).length + 1;
    let id = generateTaskId(sequence, now);
    while (await this.taskStore.exists(id)) {
      sequence++;
      id = generateTaskId(sequence, now);
    }
    return id;
  }

  private async listWhere<V>(store: RecordStore<V>, predicate: (record: V) => boolean): Promise<V[]> {
    const records: V[] = [];
    for (const id of await store.list()) {
      const record = await store.get(id);
      if (record && predicate(record)) {
        records.push(record);
      }
    }
    return records;
  }
}
