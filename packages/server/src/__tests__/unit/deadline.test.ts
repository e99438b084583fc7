import { describe, it, expect } from 'vitest';
import { ensureActive, withDeadline } from '../../services/deadline.js';
import { AuthError } from '../../errors/auth-error.js';
import { abortedSignal } from '../fixtures.js';

describe('deadlines', () => {
  describe('ensureActive', () => {
    it('should pass without a signal or with a live one', () => {
      expect(() => ensureActive(undefined, 'op')).not.toThrow();
      expect(() => ensureActive(new AbortController().signal, 'op')).not.toThrow();
    });

    it('should throw deadline_exceeded once aborted', () => {
      expect(() => ensureActive(abortedSignal(), 'op')).toThrow(AuthError);
    });
  });

  describe('withDeadline', () => {
    it('should resolve with the task result', async () => {
      await expect(withDeadline(new AbortController().signal, 'op', async () => 42)).resolves.toBe(42);
      await expect(withDeadline(undefined, 'op', async () => 'ok')).resolves.toBe('ok');
    });

    it('should not start the task when already aborted', async () => {
      let started = false;

      await expect(
        withDeadline(abortedSignal(), 'op', async () => {
          started = true;
        })
      ).rejects.toMatchObject({ code: 'deadline_exceeded', operation: 'op' });
      expect(started).toBe(false);
    });

    it('should reject as soon as the signal aborts', async () => {
      const controller = new AbortController();
      const pending = withDeadline(controller.signal, 'slow', () => new Promise<never>(() => {}));

      controller.abort();

      await expect(pending).rejects.toMatchObject({ code: 'deadline_exceeded', operation: 'slow' });
    });

    it('should hand the signal to the task', async () => {
      const controller = new AbortController();

      await withDeadline(controller.signal, 'op', async (signal) => {
        expect(signal).toBe(controller.signal);
      });
    });

    it('should see a committed task through even if the signal aborts', async () => {
      const controller = new AbortController();
      let finishWrite: (value: string) => void = () => {};
      const write = new Promise<string>((resolve) => {
        finishWrite = resolve;
      });

      const pending = withDeadline(controller.signal, 'write', async (_signal, commit) => {
        commit();
        return write;
      });

      controller.abort();
      finishWrite('saved');

      await expect(pending).resolves.toBe('saved');
    });

    it('should refuse to commit once the signal has aborted', async () => {
      const controller = new AbortController();
      let wrote = false;
      let release: () => void = () => {};
      const read = new Promise<void>((resolve) => {
        release = resolve;
      });

      const pending = withDeadline(controller.signal, 'write', async (_signal, commit) => {
        await read;
        commit();
        wrote = true;
      });

      controller.abort();
      await expect(pending).rejects.toMatchObject({ code: 'deadline_exceeded', operation: 'write' });

      release();
      await new Promise((resolve) => setImmediate(resolve));
      expect(wrote).toBe(false);
    });

    it('should pass AuthErrors through unchanged', async () => {
      const error = AuthError.invalidCredentials();

      await expect(
        withDeadline(new AbortController().signal, 'op', async () => {
          throw error;
        })
      ).rejects.toBe(error);
    });

    it('should wrap other failures as internal errors', async () => {
      const cause = new Error('socket hang up');

      await expect(
        withDeadline(new AbortController().signal, 'op', async () => {
          throw cause;
        })
      ).rejects.toMatchObject({ code: 'internal_error', operation: 'op', cause });
    });
  });
});
