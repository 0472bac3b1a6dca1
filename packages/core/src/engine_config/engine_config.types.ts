/**
 * One row of the keyword → owning section table.
 */
export interface KeywordSection {
  keyword: string;
  orgUnitId: string;
}

/**
 * One row of the originator weight table. `match` is compared
 * case-insensitively as a substring of the task originator.
 */
export interface OriginatorWeight {
  match: string;
  weight: number;
}

/**
 * Priority-score cut-offs for the RiskAssessor tiers; `red` must not be below
 * `amber`.
 */
export interface RiskThresholds {
  red: number;
  amber: number;
}

/**
 * Tables and thresholds bound into every engine component.
 *
 * The two tables are ordered: scans stop at the first matching row, so
 * reordering rows changes results.
 */
export interface EngineConfig {
  keywordSections: KeywordSection[];
  originatorWeights: OriginatorWeight[];
  defaultOriginatorWeight: number;
  statusWeights: Record<string, number>;
  defaultStatusWeight: number;
  riskThresholds: RiskThresholds;
  /** Attached to every RiskInsight */
  recommendedActions: string[];
  /** Upper bound on ancestor tiers walked by the authority resolver */
  maxHierarchyDepth: number;
  /** Descriptions shorter than this raise DESC_LEN */
  descriptionMinLength: number;
}

/**
 * Shape of a config file on disk. Optional keys fall back to built-ins.
 */
export type EngineConfigDocument =
  Pick<EngineConfig, 'keywordSections' | 'originatorWeights' | 'defaultOriginatorWeight' | 'statusWeights' | 'defaultStatusWeight'>
  & Partial<Pick<EngineConfig, 'riskThresholds' | 'recommendedActions' | 'maxHierarchyDepth' | 'descriptionMinLength'>>;
