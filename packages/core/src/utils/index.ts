export { generateTaskId, generateCommentId, generateAssignmentKey } from './id_generator';
export { parseIsoDate, daysUntil, formatIsoDate, startOfUtcDay, isValidDate } from './date_utils';
export { round2 } from './number_utils';
