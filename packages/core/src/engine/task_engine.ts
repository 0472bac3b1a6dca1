import type {
  TaskSnapshot,
  AssignmentRecord,
  AuthoritySuggestion,
  QualityCheckResult,
  RiskInsight,
  RoutingRecommendation,
  TaskSummary
} from '../record_types';
import type { OrgHierarchyReader, AuthorityLookup } from '../hierarchy';
import { getDefaultEngineConfig, type EngineConfig } from '../engine_config';
import { createLogger, type Logger } from '../logger';
import { PriorityScorer, type PriorityBreakdown } from './priority_scorer';
import { RoutingRecommender } from './routing_recommender';
import { AuthorityResolver, DEFAULT_SUGGESTION_LIMIT } from './authority_resolver';
import { RiskAssessor, type ScoredTaskSnapshot } from './risk_assessor';
import { QualityChecker, DEFAULT_QUALITY_RULES, type QualityRule } from './quality_checker';
import { AssignmentGenerator } from './assignment_generator';
import { TaskSummarizer } from './task_summarizer';

/**
 * TaskEngine Dependencies - read-only organizational data plus the tables
 * every component is bound to.
 */
export type TaskEngineDependencies = {
  hierarchy: OrgHierarchyReader;
  authorities: AuthorityLookup;
  config?: EngineConfig;
  qualityRules?: readonly QualityRule[];
  logger?: Logger;
};

/**
 * TaskEngine - one configuration, all components.
 *
 * Holds no mutable state; every call works from the task it is given and
 * the hierarchy/authority reads made during that call.
 */
export class TaskEngine {
  readonly config: EngineConfig;
  private readonly hierarchy: OrgHierarchyReader;
  private readonly authorities: AuthorityLookup;
  private readonly scorer: PriorityScorer;
  private readonly recommender: RoutingRecommender;
  private readonly resolver: AuthorityResolver;
  private readonly riskAssessor: RiskAssessor;
  private readonly qualityChecker: QualityChecker;
  private readonly assignmentGenerator: AssignmentGenerator;
  private readonly summarizer: TaskSummarizer;

  constructor(dependencies: TaskEngineDependencies) {
    const logger = dependencies.logger ?? createLogger('[TaskEngine] ');
    this.config = dependencies.config ?? getDefaultEngineConfig();
    this.hierarchy = dependencies.hierarchy;
    this.authorities = dependencies.authorities;

    this.scorer = new PriorityScorer(this.config, logger);
    this.recommender = new RoutingRecommender(this.config, logger);
    this.resolver = new AuthorityResolver(this.config, logger);
    this.riskAssessor = new RiskAssessor(this.config);
    this.qualityChecker = new QualityChecker(this.config, dependencies.qualityRules ?? DEFAULT_QUALITY_RULES);
    this.assignmentGenerator = new AssignmentGenerator(this.recommender);
    this.summarizer = new TaskSummarizer();
  }

  score(task: TaskSnapshot, today: Date): number {
    return this.scorer.score(task, today);
  }

  explainScore(task: TaskSnapshot, today: Date): PriorityBreakdown {
    return this.scorer.explain(task, today);
  }

  recommendOrgUnit(task: TaskSnapshot): Promise<RoutingRecommendation> {
    return this.recommender.recommend(task, this.hierarchy);
  }

  suggestAuthorities(task: TaskSnapshot, limit: number = DEFAULT_SUGGESTION_LIMIT): Promise<AuthoritySuggestion[]> {
    return this.resolver.suggest(task, this.hierarchy, this.authorities, limit);
  }

  assessRisk(task: ScoredTaskSnapshot): RiskInsight {
    return this.riskAssessor.assess(task);
  }

  checkQuality(task: TaskSnapshot): QualityCheckResult {
    return this.qualityChecker.check(task);
  }

  generateAssignment(task: TaskSnapshot): Promise<AssignmentRecord> {
    return this.assignmentGenerator.generate(task, this.hierarchy);
  }

  summarize(task: ScoredTaskSnapshot, comments: string[] = []): TaskSummary {
    return this.summarizer.summarize(task, comments);
  }
}

export function createTaskEngine(dependencies: TaskEngineDependencies): TaskEngine {
  return new TaskEngine(dependencies);
}
