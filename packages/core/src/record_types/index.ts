export * from './task_record';
export type { OrgUnitRecord } from './org_unit_record';
export type { AuthorityRecord } from './authority_record';
export type { AssignmentRecord, AssigneeType, AssignmentState } from './assignment_record';
export type { CommentRecord } from './comment_record';
export type {
  AuthoritySuggestion,
  RiskLevel,
  RiskInsight,
  IssueSeverity,
  QualityIssue,
  QualityCheckResult,
  TaskSummary,
  RoutingRecommendation
} from './insight.types';
