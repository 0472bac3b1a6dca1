/**
 * A node of the organizational hierarchy. Absence of `parentId` marks a root.
 */
export interface OrgUnitRecord {
  id: string;
  name: string;
  /** Tier label, e.g. "HQ", "Corps", "Division", "Staff Section" */
  echelon: string;
  parentId?: string;
}
