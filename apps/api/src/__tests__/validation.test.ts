import {describe, expect, it} from 'vitest';
import {
  latestAllowedReleaseDate,
  parseJsonBody,
  validateMovieCreate,
  validateMovieId,
  validateMovieListQuery,
  validateMovieUpdate,
} from '../middleware/validation';
import {buildMovie} from './helpers/test-database';

describe('latestAllowedReleaseDate', () => {
  it('should be 365 days after the current UTC date', () => {
    expect(latestAllowedReleaseDate(new Date('2026-03-01T12:00:00Z'))).toBe(
      '2027-03-01',
    );
  });

  it('should count the leap day when one falls inside the window', () => {
    expect(latestAllowedReleaseDate(new Date('2027-12-31T23:30:00Z'))).toBe(
      '2028-12-30',
    );
  });
});

describe('validateMovieCreate', () => {
  it('should accept a complete payload', () => {
    const payload = buildMovie({country: 'FRA'});

    expect(validateMovieCreate(payload)).toEqual({
      success: true,
      data: payload,
    });
  });

  it('should list every missing field', () => {
    const result = validateMovieCreate({});

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.errors.map(error => error.field)).toEqual([
        'name',
        'date',
        'score',
        'overview',
        'status',
        'budget',
        'revenue',
        'country',
        'genres',
        'actors',
        'languages',
      ]);
    }
  });

  it('should reject names longer than 255 characters', () => {
    expect(validateMovieCreate(buildMovie({name: 'x'.repeat(256)}))).toEqual({
      success: false,
      errors: [
        {field: 'name', message: 'Name must be at most 255 characters'},
      ],
    });
  });

  it('should reject a country code with four letters', () => {
    expect(validateMovieCreate(buildMovie({country: 'FRAN'}))).toEqual({
      success: false,
      errors: [
        {
          field: 'country',
          message: 'Country code must be 2 or 3 uppercase letters',
        },
      ],
    });
  });

  it('should keep lookup names as sent and reject empty ones', () => {
    const padded = validateMovieCreate(buildMovie({genres: [' Drama']}));
    const empty = validateMovieCreate(buildMovie({actors: ['Ada', '']}));

    expect(padded.success && padded.data.genres).toEqual([' Drama']);
    expect(empty).toEqual({
      success: false,
      errors: [{field: 'actors.1', message: 'Name is required'}],
    });
  });

  it('should reject an infinite budget', () => {
    expect(
      validateMovieCreate(buildMovie({budget: Number.POSITIVE_INFINITY})),
    ).toEqual({
      success: false,
      errors: [{field: 'budget', message: 'Must be a finite number'}],
    });
  });
});

describe('validateMovieUpdate', () => {
  it('should keep only the supplied fields', () => {
    expect(validateMovieUpdate({score: 50, country: 'US'})).toEqual({
      success: true,
      data: {score: 50},
    });
  });

  it('should reject an infinite revenue', () => {
    expect(
      validateMovieUpdate({revenue: Number.POSITIVE_INFINITY}),
    ).toEqual({
      success: false,
      errors: [{field: 'revenue', message: 'Must be a finite number'}],
    });
  });

  it('should reject an unknown status', () => {
    const result = validateMovieUpdate({status: 'Cancelled'});

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.errors.map(error => error.field)).toEqual(['status']);
    }
  });
});

describe('validateMovieListQuery', () => {
  it('should default to page 1 and 10 per page', () => {
    expect(validateMovieListQuery({})).toEqual({
      success: true,
      data: {page: 1, per_page: 10},
    });
  });

  it('should coerce query strings', () => {
    expect(validateMovieListQuery({page: '4', per_page: '20'})).toEqual({
      success: true,
      data: {page: 4, per_page: 20},
    });
  });

  it('should reject a fractional per_page', () => {
    const result = validateMovieListQuery({per_page: '1.5'});

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.errors.map(error => error.field)).toEqual(['per_page']);
    }
  });
});

describe('validateMovieId', () => {
  it('should parse a numeric path segment', () => {
    expect(validateMovieId('17')).toEqual({success: true, data: 17});
  });

  it('should report zero against the id field', () => {
    expect(validateMovieId('0')).toEqual({
      success: false,
      errors: [{field: 'id', message: 'Movie id must be a positive integer'}],
    });
  });
});

describe('parseJsonBody', () => {
  it('should report a body that is not JSON', async () => {
    const result = await parseJsonBody({
      json: async () => JSON.parse('{'),
    });

    expect(result).toEqual({
      success: false,
      errors: [{field: 'body', message: 'Request body must be valid JSON'}],
    });
  });
});
