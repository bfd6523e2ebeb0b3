import { QueryFailedError } from 'typeorm';
import { isUniqueViolation, isUnstorableValue } from './database.errors';

describe('isUniqueViolation', () => {
  const violation = (constraint: string) =>
    new QueryFailedError(
      'INSERT INTO "networks" ...',
      [],
      Object.assign(new Error('duplicate key value'), { code: '23505', constraint }),
    );

  it('should match a unique violation on any constraint', () => {
    expect(isUniqueViolation(violation('UQ_networks_name_version'))).toBe(true);
  });

  it('should match only the named constraint when one is given', () => {
    const err = violation('UQ_networks_report_id');

    expect(isUniqueViolation(err, 'UQ_networks_report_id')).toBe(true);
    expect(isUniqueViolation(err, 'UQ_networks_name_version')).toBe(false);
  });

  it('should reject other driver errors', () => {
    const err = new QueryFailedError(
      'SELECT 1',
      [],
      Object.assign(new Error('connection reset'), { code: '08006' }),
    );

    expect(isUniqueViolation(err)).toBe(false);
  });

  it('should reject plain errors', () => {
    expect(isUniqueViolation(new Error('23505'))).toBe(false);
  });
});

describe('isUnstorableValue', () => {
  const failure = (code: string) =>
    new QueryFailedError(
      'INSERT INTO "edges" ...',
      [],
      Object.assign(new Error('value rejected'), { code }),
    );

  it('should match a value too long for its column', () => {
    expect(isUnstorableValue(failure('22001'))).toBe(true);
  });

  it('should match text the database encoding cannot hold', () => {
    expect(isUnstorableValue(failure('22P05'))).toBe(true);
  });

  it('should reject unique violations and plain errors', () => {
    expect(isUnstorableValue(failure('23505'))).toBe(false);
    expect(isUnstorableValue(new Error('22001'))).toBe(false);
  });
});
