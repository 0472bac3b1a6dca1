export {
  TaskingError,
  PreconditionError,
  DetailedValidationError,
  RequiredFieldError,
  RecordNotFoundError,
  DuplicateRecordError,
  assertPresent
} from './errors';
export type { ValidationResult } from './errors';
