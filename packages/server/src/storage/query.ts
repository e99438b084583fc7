import { AuthError } from '../errors/auth-error.js';
import { PG_UNIQUE_VIOLATION } from '../config/constants.js';
import { ensureActive } from '../services/deadline.js';
import type { OperationOptions } from '../types/index.js';

function sqlState(error: unknown): string | undefined {
  if (typeof error !== 'object' || error === null) {
    return undefined;
  }
  if ('code' in error && typeof error.code === 'string') {
    return error.code;
  }
  // Newer drizzle releases wrap driver errors
  if ('cause' in error) {
    return sqlState(error.cause);
  }
  return undefined;
}

export function isUniqueViolation(error: unknown): boolean {
  return sqlState(error) === PG_UNIQUE_VIOLATION;
}

/**
 * Run a query under the caller's deadline, mapping driver failures to
 * internal errors that carry the operation name but no SQL
 */
export async function runQuery<T>(
  operation: string,
  options: OperationOptions | undefined,
  query: () => Promise<T>
): Promise<T> {
  ensureActive(options?.signal, operation);
  try {
    return await query();
  } catch (error) {
    throw AuthError.wrap(operation, error);
  }
}
