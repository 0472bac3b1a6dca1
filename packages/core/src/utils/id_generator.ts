/**
 * Generates a Task ID from the creation year and a per-store sequence
 * (e.g., 'T-26-000042').
 */
export function generateTaskId(sequence: number, createdAt: Date): string {
  const year = String(createdAt.getUTCFullYear() % 100).padStart(2, '0');
  return `T-${year}-${String(sequence).padStart(6, '0')}`;
}

/**
 * Generates a Comment ID scoped to its task (e.g., 'T-26-000042-C003').
 */
export function generateCommentId(taskId: string, sequence: number): string {
  return `${taskId}-C${String(sequence).padStart(3, '0')}`;
}

/**
 * Generates the storage key of an assignment (e.g., 'T-26-000042-A001').
 */
export function generateAssignmentKey(taskId: string, sequence: number): string {
  return `${taskId}-A${String(sequence).padStart(3, '0')}`;
}
