import type { OrgUnitRecord, AuthorityRecord } from "../record_types";
import { DetailedValidationError, type ValidationResult } from "../errors";
import { SchemaValidationCache } from "../schemas";
import { formatAjvErrors } from "./common";

/**
 * A read-only snapshot of the organizational hierarchy and its authorities,
 * as loaded from a directory file.
 */
export interface OrgDirectory {
  orgUnits: OrgUnitRecord[];
  authorities?: Array<Omit<AuthorityRecord, 'scope'> & { scope?: string[] }>;
}

/**
 * Validates an org directory document. Besides the schema, checks that ids
 * are unique and that every parent and owning unit reference resolves.
 */
export function validateOrgDirectoryDetailed(data: unknown): ValidationResult {
  const validateSchema = SchemaValidationCache.getBundledValidator<OrgDirectory>("org_directory_schema");
  if (!validateSchema(data)) {
    return { isValid: false, errors: formatAjvErrors(validateSchema.errors) };
  }

  const errors = referenceErrors(data);
  return { isValid: errors.length === 0, errors };
}

/**
 * Narrows a parsed directory file to an OrgDirectory.
 * @throws DetailedValidationError when validateOrgDirectoryDetailed would fail
 */
export function parseOrgDirectory(data: unknown): OrgDirectory {
  const validateSchema = SchemaValidationCache.getBundledValidator<OrgDirectory>("org_directory_schema");
  if (!validateSchema(data)) {
    throw new DetailedValidationError('OrgDirectory', formatAjvErrors(validateSchema.errors));
  }

  const errors = referenceErrors(data);
  if (errors.length > 0) {
    throw new DetailedValidationError('OrgDirectory', errors);
  }
  return data;
}

function referenceErrors(data: OrgDirectory): ValidationResult['errors'] {
  const errors: ValidationResult['errors'] = [];
  const unitIds = new Set<string>();
  data.orgUnits.forEach((unit, index) => {
    if (unitIds.has(unit.id)) {
      errors.push({ field: `/orgUnits/${index}/id`, message: 'duplicate org unit id', value: unit.id });
    }
    unitIds.add(unit.id);
  });

  data.orgUnits.forEach((unit, index) => {
    if (unit.parentId !== undefined && !unitIds.has(unit.parentId)) {
      errors.push({ field: `/orgUnits/${index}/parentId`, message: 'unknown parent org unit', value: unit.parentId });
    }
  });

  const authorityIds = new Set<string>();
  (data.authorities ?? []).forEach((authority, index) => {
    if (authorityIds.has(authority.id)) {
      errors.push({ field: `/authorities/${index}/id`, message: 'duplicate authority id', value: authority.id });
    }
    authorityIds.add(authority.id);
    if (!unitIds.has(authority.orgUnitId)) {
      errors.push({ field: `/authorities/${index}/orgUnitId`, message: 'unknown org unit', value: authority.orgUnitId });
    }
  });

  return errors;
}
