export { TaskEngine, createTaskEngine } from './task_engine';
export type { TaskEngineDependencies } from './task_engine';
export { PriorityScorer, PRIORITY_WEIGHTS, URGENCY_STEPS, URGENCY_FLOOR, urgencyScore } from './priority_scorer';
export type { PriorityBreakdown } from './priority_scorer';
export { RoutingRecommender } from './routing_recommender';
export {
  AuthorityResolver,
  DEFAULT_SUGGESTION_LIMIT,
  FALLBACK_AUTHORITY_ID,
  tierConfidence
} from './authority_resolver';
export { RiskAssessor } from './risk_assessor';
export type { ScoredTaskSnapshot } from './risk_assessor';
export {
  QualityChecker,
  DEFAULT_QUALITY_RULES,
  DESCRIPTION_LENGTH_RULE,
  RECORD_SERIES_RULE,
  SEVERITY_RANK,
  BLOCKING_SEVERITY,
  isBlocking
} from './quality_checker';
export type { QualityRule, QualityRuleContext } from './quality_checker';
export { AssignmentGenerator, GENERATED_ASSIGNMENT_ROLE } from './assignment_generator';
export { TaskSummarizer } from './task_summarizer';
