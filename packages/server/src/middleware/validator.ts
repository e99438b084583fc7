import type { ZodError } from 'zod';

/**
 * zValidator hook: hand validation failures to the global error handler so
 * they render as invalid_request
 */
export function rejectInvalid(result: { success: boolean; error?: ZodError }): void {
  if (!result.success && result.error) {
    throw result.error;
  }
}
