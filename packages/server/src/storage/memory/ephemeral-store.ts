import type { Clock, OperationOptions } from '../../types/index.js';
import { systemClock } from '../../types/index.js';
import type { EphemeralStore } from '../interfaces/ephemeral-store.js';
import { ensureActive } from '../../services/deadline.js';

interface Entry {
  value: string;
  expiresAt: number;
}

/**
 * In-memory ephemeral store with lazy expiry
 */
export class MemoryEphemeralStore implements EphemeralStore {
  private entries = new Map<string, Entry>();

  constructor(private readonly clock: Clock = systemClock) {}

  async setIfAbsent(
    key: string,
    value: string,
    ttlMs: number,
    options?: OperationOptions
  ): Promise<boolean> {
    ensureActive(options?.signal, 'ephemeral.setIfAbsent');
    if (this.read(key) !== null) {
      return false;
    }
    this.write(key, value, ttlMs);
    return true;
  }

  async set(key: string, value: string, ttlMs: number, options?: OperationOptions): Promise<void> {
    ensureActive(options?.signal, 'ephemeral.set');
    this.write(key, value, ttlMs);
  }

  async get(key: string, options?: OperationOptions): Promise<string | null> {
    ensureActive(options?.signal, 'ephemeral.get');
    return this.read(key);
  }

  async delete(key: string, options?: OperationOptions): Promise<void> {
    ensureActive(options?.signal, 'ephemeral.delete');
    this.entries.delete(key);
  }

  private read(key: string): string | null {
    const entry = this.entries.get(key);
    if (!entry) return null;
    if (entry.expiresAt <= this.clock().getTime()) {
      this.entries.delete(key);
      return null;
    }
    return entry.value;
  }

  private write(key: string, value: string, ttlMs: number): void {
    this.entries.set(key, { value, expiresAt: this.clock().getTime() + Math.max(ttlMs, 1) });
  }
}
