import type { RecordStore } from '../record_store';
import type { OrgUnitRecord, AuthorityRecord } from '../record_types';
import type { OrgHierarchyReader, AuthorityLookup } from './hierarchy.types';

/**
 * OrgHierarchyReader over a RecordStore of org units.
 */
export class RecordStoreOrgHierarchy implements OrgHierarchyReader {
  constructor(private readonly orgUnits: RecordStore<OrgUnitRecord>) { }

  async getUnit(orgUnitId: string): Promise<OrgUnitRecord | null> {
    return this.orgUnits.get(orgUnitId);
  }

  async getParent(orgUnitId: string): Promise<string | null> {
    const unit = await this.orgUnits.get(orgUnitId);
    return unit?.parentId || null;
  }
}

/**
 * AuthorityLookup over a RecordStore of authorities. Listing order follows
 * the store's `list()` order.
 */
export class RecordStoreAuthorityLookup implements AuthorityLookup {
  constructor(private readonly authorities: RecordStore<AuthorityRecord>) { }

  async listByOrgUnit(orgUnitId: string): Promise<AuthorityRecord[]> {
    const ids = await this.authorities.list();
    const result: AuthorityRecord[] = [];
    for (const id of ids) {
      const authority = await this.authorities.get(id);
      if (authority && authority.orgUnitId === orgUnitId) {
        result.push(authority);
      }
    }
    return result;
  }
}
