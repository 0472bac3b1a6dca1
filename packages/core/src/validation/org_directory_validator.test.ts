import { validateOrgDirectoryDetailed, parseOrgDirectory } from './org_directory_validator';
import { DetailedValidationError } from '../errors';

describe('validateOrgDirectoryDetailed', () => {
  const orgUnits = [
    { id: 'HQ', name: 'Headquarters', echelon: 'HQ' },
    { id: 'OPS_G3', name: 'G-3 Operations', echelon: 'Staff', parentId: 'HQ' },
  ];

  it('should accept a consistent directory', () => {
    const result = validateOrgDirectoryDetailed({
      orgUnits,
      authorities: [{ id: 'A-1', title: 'Chief of Staff', orgUnitId: 'HQ', grade: 'O-6', scope: ['ops'] }],
    });

    expect(result).toEqual({ isValid: true, errors: [] });
  });

  it('should accept a directory without authorities', () => {
    expect(validateOrgDirectoryDetailed({ orgUnits }).isValid).toBe(true);
  });

  it('should report schema violations before reference checks', () => {
    const result = validateOrgDirectoryDetailed({ orgUnits: [{ id: 'HQ', echelon: 'HQ' }] });

    expect(result.isValid).toBe(false);
    expect(result.errors[0]?.message).toBe("must have required property 'name'");
  });

  it('should flag duplicate ids and dangling references', () => {
    const result = validateOrgDirectoryDetailed({
      orgUnits: [
        ...orgUnits,
        { id: 'HQ', name: 'Duplicate', echelon: 'HQ' },
        { id: 'LOG_G4', name: 'G-4 Logistics', echelon: 'Staff', parentId: 'CORPS' },
      ],
      authorities: [{ id: 'A-9', title: 'Director', orgUnitId: 'NOWHERE', grade: 'SES' }],
    });

    expect(result.isValid).toBe(false);
    expect(result.errors).toEqual([
      { field: '/orgUnits/2/id', message: 'duplicate org unit id', value: 'HQ' },
      { field: '/orgUnits/3/parentId', message: 'unknown parent org unit', value: 'CORPS' },
      { field: '/authorities/0/orgUnitId', message: 'unknown org unit', value: 'NOWHERE' },
    ]);
  });
});

describe('parseOrgDirectory', () => {
  it('should return the directory when it is consistent', () => {
    const document = { orgUnits: [{ id: 'HQ', name: 'Headquarters', echelon: 'HQ' }] };

    expect(parseOrgDirectory(document)).toEqual(document);
  });

  it('should throw DetailedValidationError for a dangling parent', () => {
    expect(() => parseOrgDirectory({
      orgUnits: [{ id: 'DIV', name: '1st Division', echelon: 'Division', parentId: 'CORPS' }],
    })).toThrow(new DetailedValidationError('OrgDirectory', [
      { field: '/orgUnits/0/parentId', message: 'unknown parent org unit', value: 'CORPS' },
    ]));
  });
});
