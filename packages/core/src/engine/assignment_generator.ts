import type { TaskSnapshot, AssignmentRecord } from '../record_types';
import type { OrgHierarchyReader } from '../hierarchy';
import { assertPresent } from '../errors';
import type { RoutingRecommender } from './routing_recommender';

export const GENERATED_ASSIGNMENT_ROLE = 'owner';

/**
 * AssignmentGenerator - turns a routing recommendation into the pending
 * owner assignment created alongside every new task. The caller persists it.
 */
export class AssignmentGenerator {
  constructor(private readonly recommender: RoutingRecommender) { }

  async generate(task: TaskSnapshot, hierarchy: OrgHierarchyReader): Promise<AssignmentRecord> {
    assertPresent(task, 'AssignmentGenerator.generate', 'task');

    const { orgUnitId, rationale } = await this.recommender.recommend(task, hierarchy);
    return {
      taskId: task.id,
      assigneeType: 'organization',
      assigneeId: orgUnitId,
      role: GENERATED_ASSIGNMENT_ROLE,
      state: 'pending',
      rationale,
    };
  }
}
