export type AssigneeType = 'organization' | 'user';

export type AssignmentState = 'pending' | 'accepted' | 'declined' | 'completed';

export interface AssignmentRecord {
  taskId: string;
  assigneeType: AssigneeType;
  assigneeId: string;
  role: string;
  state: AssignmentState;
  rationale: string;
  /** Optional per-assignment deadline (YYYY-MM-DD) overriding the task suspense */
  dueOverrideDate?: string;
}
