/**
 * Read-only values derived from a stored task. All are plain serializable
 * objects; callers surface them directly as read responses.
 */

export interface AuthoritySuggestion {
  authorityId: string;
  title: string;
  orgUnitId: string;
  grade: string;
  /** 0.4 - 0.9, non-increasing with ancestor distance */
  confidence: number;
  rationale: string;
}

export type RiskLevel = 'green' | 'amber' | 'red';

export interface RiskInsight {
  taskId: string;
  riskLevel: RiskLevel;
  lateProbability: number;
  drivers: string[];
  recommendedActions: string[];
}

export type IssueSeverity = 'low' | 'medium' | 'high';

export interface QualityIssue {
  code: string;
  severity: IssueSeverity;
  message: string;
}

export interface QualityCheckResult {
  taskId: string;
  issues: QualityIssue[];
  passed: boolean;
}

export interface TaskSummary {
  taskId: string;
  summary: string;
  riskLevel: RiskLevel;
  keyPoints: string[];
}

export interface RoutingRecommendation {
  orgUnitId: string;
  rationale: string;
}
