export { createTaskRecord, createTaskRecordFromDocument } from './task_factory';
