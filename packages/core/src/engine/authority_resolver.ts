import type { TaskSnapshot, AuthoritySuggestion } from '../record_types';
import type { EngineConfig } from '../engine_config';
import type { OrgHierarchyReader, AuthorityLookup } from '../hierarchy';
import { assertPresent, PreconditionError } from '../errors';
import { createLogger, type Logger } from '../logger';
import { round2 } from '../utils/number_utils';
import { guardedLookup } from './lookup_guard';

export const DEFAULT_SUGGESTION_LIMIT = 3;

export const FALLBACK_AUTHORITY_ID = 'DEFAULT';

const MAX_CONFIDENCE = 0.9;
const MIN_CONFIDENCE = 0.4;
const CONFIDENCE_DECAY = 0.1;

/**
 * Confidence for a match found `tier` steps above the task's unit.
 */
export function tierConfidence(tier: number): number {
  return round2(Math.max(MAX_CONFIDENCE - CONFIDENCE_DECAY * tier, MIN_CONFIDENCE));
}

/**
 * AuthorityResolver - ranks approving authorities for a task.
 *
 * Walks from the task's unit up through its ancestors, one tier at a time,
 * collecting the authorities owned by each tier. Closer tiers rank first and
 * keep listing order within a tier. The walk stops at a root, at
 * `maxHierarchyDepth` tiers, on a revisited unit, or once `limit`
 * suggestions are collected. The result is never empty.
 */
export class AuthorityResolver {
  private readonly logger: Logger;

  constructor(
    private readonly config: EngineConfig,
    logger?: Logger
  ) {
    this.logger = logger ?? createLogger('[AuthorityResolver] ');
  }

  async suggest(
    task: TaskSnapshot,
    hierarchy: OrgHierarchyReader,
    authorities: AuthorityLookup,
    limit: number = DEFAULT_SUGGESTION_LIMIT
  ): Promise<AuthoritySuggestion[]> {
    assertPresent(task, 'AuthorityResolver.suggest', 'task');
    assertPresent(hierarchy, 'AuthorityResolver.suggest', 'hierarchy');
    assertPresent(authorities, 'AuthorityResolver.suggest', 'authorities');
    if (!Number.isInteger(limit) || limit < 1) {
      throw new PreconditionError('AuthorityResolver.suggest', `limit must be a positive integer, got ${limit}`);
    }

    const suggestions: AuthoritySuggestion[] = [];
    const emitted = new Set<string>();
    const visited = new Set<string>();
    let current: string | null = task.orgUnitId;
    let tier = 0;

    while (current && tier < this.config.maxHierarchyDepth) {
      visited.add(current);
      const orgUnitId: string = current;

      const listed = await guardedLookup(
        () => authorities.listByOrgUnit(orgUnitId),
        [],
        this.logger,
        `listByOrgUnit(${orgUnitId})`
      );
      for (const authority of listed) {
        if (emitted.has(authority.id)) continue;
        emitted.add(authority.id);
        suggestions.push({
          authorityId: authority.id,
          title: authority.title,
          orgUnitId: authority.orgUnitId,
          grade: authority.grade,
          confidence: tierConfidence(tier),
          rationale: `Authority aligned with org ${authority.orgUnitId} (tier ${tier + 1})`,
        });
        if (suggestions.length >= limit) {
          return suggestions;
        }
      }

      const parent = await guardedLookup(
        () => hierarchy.getParent(orgUnitId),
        null,
        this.logger,
        `getParent(${orgUnitId})`
      );
      if (parent && visited.has(parent)) {
        this.logger.warn(`Cycle detected in org hierarchy at ${parent}; stopping ancestor walk`);
        break;
      }
      current = parent;
      tier++;
    }

    if (suggestions.length === 0) {
      suggestions.push({
        authorityId: FALLBACK_AUTHORITY_ID,
        title: 'Org Chief',
        orgUnitId: task.orgUnitId,
        grade: 'GS-15',
        confidence: MIN_CONFIDENCE,
        rationale: 'No authority records available; defaulting to org chief.',
      });
    }
    return suggestions;
  }
}
