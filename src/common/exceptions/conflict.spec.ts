import { ConflictException } from '@nestjs/common';
import { QueryFailedError } from 'typeorm';
import { fieldConflict, toConflict } from './conflict';
import { ReferentialViolationException } from './referential-violation.exception';

describe('conflict exceptions', () => {
  it('should describe the conflicting field', () => {
    expect(fieldConflict('tag', 'name', 'News').getResponse()).toEqual({
      message: 'A tag with this name already exists',
      error: 'Conflict',
      details: { field: 'name', value: 'News' },
    });
  });

  it('should map a unique violation to a conflict on its column', () => {
    const error = new QueryFailedError(
      'INSERT INTO ...',
      [],
      Object.assign(new Error('duplicate key value violates unique constraint "uq_users_username"'), {
        code: '23505',
        constraint: 'uq_users_username',
        detail: 'Key (username)=(jane) already exists.',
      }),
    );

    const mapped = toConflict(error, 'user');

    expect(mapped).toBeInstanceOf(ConflictException);
    expect(mapped instanceof ConflictException && mapped.getResponse()).toEqual({
      message: 'A user with this username already exists',
      error: 'Conflict',
      details: { field: 'username', value: 'jane' },
    });
  });

  it('should return other errors unchanged', () => {
    const error = new Error('boom');
    expect(toConflict(error, 'user')).toBe(error);
  });

  it('should report referential violations as 409', () => {
    const exception = new ReferentialViolationException('user', 'u1', 'articles');

    expect(exception.getStatus()).toBe(409);
    expect(exception.getResponse()).toEqual({
      message: 'Cannot delete user u1: it is still referenced by articles',
      error: 'Referential Violation',
      details: { entity: 'user', id: 'u1', referencedBy: 'articles' },
    });
  });
});
