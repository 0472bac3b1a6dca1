import type { RecordStore } from './record_store';
import type {
  TaskRecord,
  AssignmentRecord,
  CommentRecord,
  OrgUnitRecord,
  AuthorityRecord,
} from '../record_types';

/**
 * RecordStores - Typed container for all stores
 *
 * Modules pick the stores they need with `Pick<RecordStores, ...>`.
 */
export type RecordStores = {
  tasks: RecordStore<TaskRecord>;
  assignments: RecordStore<AssignmentRecord>;
  comments: RecordStore<CommentRecord>;
  orgUnits: RecordStore<OrgUnitRecord>;
  authorities: RecordStore<AuthorityRecord>;
};
