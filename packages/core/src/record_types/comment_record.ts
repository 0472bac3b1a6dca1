export interface CommentRecord {
  id: string;
  taskId: string;
  authorId: string;
  body: string;
  parentCommentId?: string;
  /** Epoch milliseconds */
  createdAt: number;
}
