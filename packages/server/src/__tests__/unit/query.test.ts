import { describe, it, expect } from 'vitest';
import { isUniqueViolation, runQuery } from '../../storage/query.js';
import { abortedSignal } from '../fixtures.js';

describe('storage query helpers', () => {
  describe('isUniqueViolation', () => {
    it('should recognise the PostgreSQL unique violation code', () => {
      expect(isUniqueViolation({ code: '23505' })).toBe(true);
      expect(isUniqueViolation({ code: '23503' })).toBe(false);
    });

    it('should look through wrapped driver errors', () => {
      const driverError = Object.assign(new Error('duplicate key'), { code: '23505' });

      expect(isUniqueViolation(new Error('Failed query', { cause: driverError }))).toBe(true);
    });

    it('should ignore values that are not errors', () => {
      expect(isUniqueViolation(null)).toBe(false);
      expect(isUniqueViolation('23505')).toBe(false);
    });
  });

  describe('runQuery', () => {
    it('should return the query result', async () => {
      await expect(runQuery('users.get', undefined, async () => [1, 2])).resolves.toEqual([1, 2]);
    });

    it('should not run the query after the deadline', async () => {
      let ran = false;

      await expect(
        runQuery('users.get', { signal: abortedSignal() }, async () => {
          ran = true;
        })
      ).rejects.toMatchObject({ code: 'deadline_exceeded', operation: 'users.get' });
      expect(ran).toBe(false);
    });

    it('should wrap driver failures without exposing their message', async () => {
      const failure = new Error('relation "users" does not exist');

      const error = await runQuery('users.get', undefined, async () => {
        throw failure;
      }).catch((e: unknown) => e);

      expect(error).toMatchObject({
        code: 'internal_error',
        operation: 'users.get',
        message: 'The server encountered an unexpected condition.',
        cause: failure,
      });
    });
  });
});
