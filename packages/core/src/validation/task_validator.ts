import type { TaskRecord } from "../record_types";
import type { ValidationResult } from "../errors";
import { SchemaValidationCache } from "../schemas";
import { formatAjvErrors } from "./common";

/**
 * Type guard to check if data is a valid TaskRecord.
 */
export function isTaskRecord(data: unknown): data is TaskRecord {
  const validateSchema = SchemaValidationCache.getBundledValidator<TaskRecord>("task_record_schema");
  return validateSchema(data);
}

/**
 * Validates a TaskRecord and returns detailed validation result.
 * Use this in factories and adapters for comprehensive error reporting.
 */
export function validateTaskRecordDetailed(data: unknown): ValidationResult {
  const validateSchema = SchemaValidationCache.getBundledValidator<TaskRecord>("task_record_schema");
  const isValid = validateSchema(data);

  return {
    isValid,
    errors: isValid ? [] : formatAjvErrors(validateSchema.errors)
  };
}
