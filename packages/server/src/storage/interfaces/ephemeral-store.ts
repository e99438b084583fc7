import type { OperationOptions } from '../../types/index.js';

/**
 * Key-value store with per-key expiry for short-lived markers
 */
export interface EphemeralStore {
  /**
   * Set `key` only if it does not exist; resolves true for the one caller
   * that created it
   */
  setIfAbsent(key: string, value: string, ttlMs: number, options?: OperationOptions): Promise<boolean>;

  set(key: string, value: string, ttlMs: number, options?: OperationOptions): Promise<void>;

  get(key: string, options?: OperationOptions): Promise<string | null>;

  delete(key: string, options?: OperationOptions): Promise<void>;
}
