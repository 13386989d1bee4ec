import { QueryFailedError } from 'typeorm';
import { getUniqueViolation, isViolationOf } from './database-errors';

function queryFailed(message: string, fields: Record<string, string> = {}): QueryFailedError {
  return new QueryFailedError('INSERT INTO ...', [], Object.assign(new Error(message), fields));
}

describe('database errors', () => {
  describe('getUniqueViolation', () => {
    it('should read constraint, column and value from a postgres error', () => {
      const error = queryFailed('duplicate key value violates unique constraint "uq_users_email"', {
        code: '23505',
        constraint: 'uq_users_email',
        detail: 'Key (email)=(jane@example.com) already exists.',
      });

      expect(getUniqueViolation(error)).toEqual({
        constraint: 'uq_users_email',
        column: 'email',
        value: 'jane@example.com',
        message: 'duplicate key value violates unique constraint "uq_users_email"',
      });
    });

    it('should fall back to the constraint named in the message', () => {
      const error = queryFailed('duplicate key value violates unique constraint "uq_tags_slug"');

      expect(getUniqueViolation(error)).toEqual({
        constraint: 'uq_tags_slug',
        column: undefined,
        value: undefined,
        message: 'duplicate key value violates unique constraint "uq_tags_slug"',
      });
    });

    it('should ignore other database errors', () => {
      const error = queryFailed('null value in column "title" violates not-null constraint', {
        code: '23502',
      });

      expect(getUniqueViolation(error)).toBeNull();
    });

    it('should ignore errors that did not come from a query', () => {
      expect(getUniqueViolation(new Error('duplicate key'))).toBeNull();
      expect(getUniqueViolation('duplicate key')).toBeNull();
    });
  });

  describe('isViolationOf', () => {
    it('should match on the index name', () => {
      const violation = { constraint: 'uq_articles_slug', column: 'title', message: '' };

      expect(isViolationOf(violation, 'uq_articles_slug', 'slug')).toBe(true);
      expect(isViolationOf(violation, 'uq_tags_slug', 'slug')).toBe(false);
    });

    it('should match on the column when the driver names the index differently', () => {
      const violation = { constraint: 'articles_pkey', column: 'slug', message: '' };

      expect(isViolationOf(violation, 'uq_articles_slug', 'slug')).toBe(true);
      expect(isViolationOf(violation, 'uq_articles_slug', 'name')).toBe(false);
    });

    it('should compare the column when the index is unknown', () => {
      expect(isViolationOf({ column: 'slug', message: '' }, 'uq_tags_slug', 'slug')).toBe(true);
      expect(isViolationOf({ column: 'name', message: '' }, 'uq_tags_slug', 'slug')).toBe(false);
    });

    it('should search the message when nothing else is reported', () => {
      const message = 'duplicate key value violates unique constraint "uq_tags_slug"';

      expect(isViolationOf({ message }, 'uq_tags_slug', 'slug')).toBe(true);
      expect(isViolationOf({ message }, 'uq_tags_name', 'name')).toBe(false);
    });
  });

  it('should read the key from the message when the driver sends no detail', () => {
    const error = queryFailed(
      'duplicate key value violates unique constraint "articles_pkey" DETAIL: Key (slug)=(same) already exists',
      { code: '23505' },
    );

    expect(getUniqueViolation(error)).toMatchObject({
      constraint: 'articles_pkey',
      column: 'slug',
      value: 'same',
    });
  });
});
