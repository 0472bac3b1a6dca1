import { RoutingRecommender } from './routing_recommender';
import { getDefaultEngineConfig } from '../engine_config';
import type { OrgHierarchyReader } from '../hierarchy';
import { createHierarchy, createTaskSnapshot } from './test_fixtures';

describe('RoutingRecommender', () => {
  const recommender = new RoutingRecommender(getDefaultEngineConfig());
  const hierarchy = createHierarchy();

  it('should route on the first matching keyword in table order', async () => {
    const task = createTaskSnapshot({ tags: ['legal'], description: 'Intel annex needs a legal review before release.' });

    expect(await recommender.recommend(task, hierarchy)).toEqual({
      orgUnitId: 'INTEL_G2',
      rationale: "Matched keyword 'intel' with org G-2 Intelligence",
    });
  });

  it('should match keywords in the title', async () => {
    const task = createTaskSnapshot({ title: 'Communications plan for exercise' });

    expect(await recommender.recommend(task, hierarchy)).toEqual({
      orgUnitId: 'G6_CIO',
      rationale: "Matched keyword 'communications' with org G-6 / CIO",
    });
  });

  it('should match case-insensitively and on substrings', async () => {
    const task = createTaskSnapshot({ tags: ['PERSONNEL-actions'] });

    expect((await recommender.recommend(task, hierarchy)).orgUnitId).toBe('PERS_G1');
  });

  it('should fall back on the first hit even when a later keyword resolves', async () => {
    // logistics → LOG_G4 is not in the fixture hierarchy
    const task = createTaskSnapshot({ tags: ['logistics', 'legal'] });

    expect(await recommender.recommend(task, hierarchy)).toEqual({
      orgUnitId: 'BDE_S3',
      rationale: 'Defaulted to originating org',
    });
  });

  it('should default to the originating org when nothing matches', async () => {
    expect(await recommender.recommend(createTaskSnapshot(), hierarchy)).toEqual({
      orgUnitId: 'BDE_S3',
      rationale: 'Defaulted to originating org',
    });
  });

  it('should default to the originating org when the only matched section is missing', async () => {
    const task = createTaskSnapshot({ tags: ['chaplain'] });

    expect((await recommender.recommend(task, hierarchy)).rationale).toBe('Defaulted to originating org');
  });

  it('should return the raw org id when even the originating org is unknown', async () => {
    const task = createTaskSnapshot({ orgUnitId: 'GHOST' });

    expect(await recommender.recommend(task, hierarchy)).toEqual({
      orgUnitId: 'GHOST',
      rationale: 'No org metadata available; used provided org unit id',
    });
  });

  it('should degrade to the raw org id when every lookup fails', async () => {
    const failing: OrgHierarchyReader = {
      getUnit: jest.fn().mockRejectedValue(new Error('connection reset')),
      getParent: jest.fn().mockRejectedValue(new Error('connection reset')),
    };
    const task = createTaskSnapshot({ tags: ['readiness'] });

    expect(await recommender.recommend(task, failing)).toEqual({
      orgUnitId: 'BDE_S3',
      rationale: 'No org metadata available; used provided org unit id',
    });
    expect(failing.getUnit).toHaveBeenCalledWith('OPS_G3');
    expect(failing.getUnit).toHaveBeenCalledWith('BDE_S3');
  });

  it('should return identical results for identical inputs', async () => {
    const task = createTaskSnapshot({ tags: ['training'] });

    expect(await recommender.recommend(task, hierarchy)).toEqual(await recommender.recommend(task, hierarchy));
  });
});
