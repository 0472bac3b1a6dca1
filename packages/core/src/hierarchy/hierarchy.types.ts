import type { OrgUnitRecord, AuthorityRecord } from '../record_types';

/**
 * Read-only view of the organizational hierarchy.
 *
 * Implementations may be backed by any store; the engine calls them once
 * per ancestor tier and never writes.
 */
export interface OrgHierarchyReader {
  /** Parent of `orgUnitId`, or null at a root or for an unknown unit */
  getParent(orgUnitId: string): Promise<string | null>;
  /** The unit itself, or null when unknown */
  getUnit(orgUnitId: string): Promise<OrgUnitRecord | null>;
}

/**
 * Read-only view of authority records.
 */
export interface AuthorityLookup {
  /** Authorities owned by `orgUnitId`, in stable listing order */
  listByOrgUnit(orgUnitId: string): Promise<AuthorityRecord[]>;
}
