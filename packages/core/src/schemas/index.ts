export { SchemaValidationCache, SCHEMA_DIR } from './schema_cache';
export type { SchemaName } from './schema_cache';
