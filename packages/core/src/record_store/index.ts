// Core interfaces - backend-agnostic
export type { RecordStore } from './record_store';
export type { RecordStores } from './record_store.types';
export { MemoryRecordStore } from './memory';
export type { MemoryRecordStoreOptions } from './memory';
