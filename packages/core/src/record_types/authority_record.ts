/**
 * A position with approval power over tasks in its scope. Several
 * authorities may belong to the same org unit.
 */
export interface AuthorityRecord {
  id: string;
  title: string;
  orgUnitId: string;
  grade: string;
  /** Policy-area keywords */
  scope: string[];
}
