/**
 * Error types for the tasking core.
 *
 * The scoring engine itself is total: unknown enum values, missing units and
 * missing authorities degrade to defaults. Only caller-contract violations
 * (PreconditionError) escape it. The remaining errors belong to the record
 * factories and the triage adapter.
 */

/**
 * Base class for all tasking errors. `code` is stable and machine readable.
 */
export class TaskingError extends Error {
  constructor(message: string, public readonly code: string) {
    super(message);
    this.name = this.constructor.name;
  }
}

/**
 * Raised when a caller breaks an operation's contract (null snapshot,
 * non-positive limit, ...). Never raised for data that merely looks odd.
 */
export class PreconditionError extends TaskingError {
  constructor(operation: string, detail: string) {
    super(`${operation}: precondition failed - ${detail}`, 'PRECONDITION_FAILED');
  }
}

/**
 * A record failed schema validation. `errors` carries one entry per field.
 */
export class DetailedValidationError extends TaskingError {
  constructor(
    recordType: string,
    public readonly errors: ValidationResult['errors']
  ) {
    const summary = errors.map(error => `${error.field}: ${error.message}`).join('; ');
    super(`${recordType} validation failed: ${summary}`, 'VALIDATION_FAILED');
  }
}

/**
 * Error for when required fields are missing during record creation.
 */
export class RequiredFieldError extends TaskingError {
  constructor(recordType: string, public readonly missingFields: string[]) {
    super(`${recordType} requires ${missingFields.join(', ')}`, 'REQUIRED_FIELD');
  }
}

/**
 * Error for when a record is not found during operations.
 */
export class RecordNotFoundError extends TaskingError {
  constructor(recordType: string, recordId: string) {
    super(`${recordType} with id ${recordId} not found`, 'RECORD_NOT_FOUND');
  }
}

/**
 * Error for when a create would overwrite an existing record.
 */
export class DuplicateRecordError extends TaskingError {
  constructor(recordType: string, recordId: string) {
    super(`${recordType} with id ${recordId} already exists`, 'DUPLICATE_RECORD');
  }
}

/**
 * Standard validation result shared by every validateXDetailed function.
 */
export interface ValidationResult {
  isValid: boolean;
  errors: Array<{
    field: string;
    message: string;
    value: unknown;
  }>;
}

/**
 * Throws PreconditionError when `value` is null or undefined.
 */
export function assertPresent<T>(
  value: T | null | undefined,
  operation: string,
  name: string
): asserts value is T {
  if (value === null || value === undefined) {
    throw new PreconditionError(operation, `${name} is required`);
  }
}
