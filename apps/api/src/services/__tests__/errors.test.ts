import {countries} from '@theater/database/schema';
import {describe, expect, it} from 'vitest';
import {createTestDatabase} from '../../__tests__/helpers/test-database';
import {isUniqueConstraintViolation} from '../errors';

describe('isUniqueConstraintViolation', () => {
  it('should recognise a violation raised by the database', async () => {
    const {database, cleanup} = await createTestDatabase();
    let caught: unknown;
    try {
      await database.insert(countries).values({code: 'US'});
      await database.insert(countries).values({code: 'US'});
    } catch (error) {
      caught = error;
    } finally {
      await cleanup();
    }

    expect(caught).toBeInstanceOf(Error);
    expect(isUniqueConstraintViolation(caught)).toBe(true);
  });

  it('should look through the error cause chain', () => {
    const error = new Error('Failed query', {
      cause: new Error('UNIQUE constraint failed: movies.name, movies.date'),
    });

    expect(isUniqueConstraintViolation(error)).toBe(true);
  });

  it('should recognise the extended result code', () => {
    const error = Object.assign(new Error('constraint failed'), {
      code: 'SQLITE_CONSTRAINT_UNIQUE',
    });

    expect(isUniqueConstraintViolation(error)).toBe(true);
  });

  it('should ignore other failures', () => {
    expect(
      isUniqueConstraintViolation(new Error('FOREIGN KEY constraint failed')),
    ).toBe(false);
    expect(isUniqueConstraintViolation('UNIQUE constraint failed')).toBe(false);
    expect(isUniqueConstraintViolation(undefined)).toBe(false);
  });
});
