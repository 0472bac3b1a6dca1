import type { ErrorObject } from "ajv";
import type { ValidationResult } from "../errors";

/**
 * Maps AJV errors to the field/message/value triples used in every
 * ValidationResult.
 */
export function formatAjvErrors(
  ajvErrors: ErrorObject[] | null | undefined
): ValidationResult['errors'] {
  return ajvErrors ? ajvErrors.map(error => ({
    field: error.instancePath || error.schemaPath || 'root',
    message: error.message || 'Validation failed',
    value: error.data
  })) : [];
}
