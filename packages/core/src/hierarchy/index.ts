export type { OrgHierarchyReader, AuthorityLookup } from './hierarchy.types';
export { RecordStoreOrgHierarchy, RecordStoreAuthorityLookup } from './record_store_hierarchy';
