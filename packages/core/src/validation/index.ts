export { isTaskRecord, validateTaskRecordDetailed } from './task_validator';
export { validateOrgDirectoryDetailed, parseOrgDirectory } from './org_directory_validator';
export type { OrgDirectory } from './org_directory_validator';
export { formatAjvErrors } from './common';
