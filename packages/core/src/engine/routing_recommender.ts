import type { TaskSnapshot, RoutingRecommendation } from '../record_types';
import type { EngineConfig } from '../engine_config';
import type { OrgHierarchyReader } from '../hierarchy';
import { assertPresent } from '../errors';
import { createLogger, type Logger } from '../logger';
import { guardedLookup } from './lookup_guard';

/**
 * RoutingRecommender - picks the org unit that should own a task.
 *
 * Scans the keyword table in order against tags + title + description. The
 * first keyword found decides: its mapped unit when the hierarchy knows it,
 * otherwise the task stays with its originating unit. Never throws for
 * missing data or failed lookups.
 */
export class RoutingRecommender {
  private readonly logger: Logger;

  constructor(
    private readonly config: EngineConfig,
    logger?: Logger
  ) {
    this.logger = logger ?? createLogger('[RoutingRecommender] ');
  }

  async recommend(task: TaskSnapshot, hierarchy: OrgHierarchyReader): Promise<RoutingRecommendation> {
    assertPresent(task, 'RoutingRecommender.recommend', 'task');
    assertPresent(hierarchy, 'RoutingRecommender.recommend', 'hierarchy');

    const text = [...(task.tags ?? []), task.title ?? '', task.description ?? ''].join(' ').toLowerCase();

    const hit = this.config.keywordSections.find(({ keyword }) => text.includes(keyword));
    if (hit) {
      const unit = await guardedLookup(
        () => hierarchy.getUnit(hit.orgUnitId),
        null,
        this.logger,
        `getUnit(${hit.orgUnitId})`
      );
      if (unit) {
        return {
          orgUnitId: unit.id,
          rationale: `Matched keyword '${hit.keyword}' with org ${unit.name}`,
        };
      }
      this.logger.debug(`Keyword '${hit.keyword}' maps to unknown org ${hit.orgUnitId}; using originating org`);
    }

    const origin = await guardedLookup(
      () => hierarchy.getUnit(task.orgUnitId),
      null,
      this.logger,
      `getUnit(${task.orgUnitId})`
    );
    if (origin) {
      return { orgUnitId: origin.id, rationale: 'Defaulted to originating org' };
    }

    return {
      orgUnitId: task.orgUnitId,
      rationale: 'No org metadata available; used provided org unit id',
    };
  }
}
