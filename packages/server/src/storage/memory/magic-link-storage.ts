import type { MagicLink, CreateMagicLinkInput, OperationOptions } from '../../types/index.js';
import { isMagicLinkActive } from '../../types/index.js';
import type { MagicLinkStorage } from '../interfaces/magic-link-storage.js';
import { AuthError } from '../../errors/auth-error.js';
import { ensureActive } from '../../services/deadline.js';

/**
 * In-memory magic link storage implementation
 */
export class MemoryMagicLinkStorage implements MagicLinkStorage {
  private links = new Map<number, MagicLink>();
  private hashIndex = new Map<string, number>(); // token hash -> id
  private nextId = 1;

  async create(
    input: CreateMagicLinkInput,
    limits: { maxActive: number; now: Date },
    options?: OperationOptions
  ): Promise<MagicLink> {
    ensureActive(options?.signal, 'magicLinks.create');

    if (this.hashIndex.has(input.tokenHash)) {
      throw AuthError.alreadyExists('A magic link with this token already exists.');
    }

    // Evict the oldest active links so the new one keeps the user at the cap
    const active = this.activeFor(input.userId, limits.now);
    const excess = active.length - limits.maxActive + 1;
    for (const link of active.slice(0, Math.max(excess, 0))) {
      this.links.delete(link.id);
      this.hashIndex.delete(link.tokenHash);
    }

    const link: MagicLink = {
      id: this.nextId++,
      userId: input.userId,
      appId: input.appId,
      tokenHash: input.tokenHash,
      sessionId: input.sessionId,
      ipAddress: input.ipAddress,
      userAgent: input.userAgent,
      used: false,
      expiresAt: input.expiresAt,
      createdAt: limits.now,
    };
    this.links.set(link.id, link);
    this.hashIndex.set(link.tokenHash, link.id);

    return { ...link };
  }

  async getByTokenHash(tokenHash: string, options?: OperationOptions): Promise<MagicLink | null> {
    ensureActive(options?.signal, 'magicLinks.getByTokenHash');
    const id = this.hashIndex.get(tokenHash);
    if (id === undefined) return null;
    const link = this.links.get(id);
    return link ? { ...link } : null;
  }

  async markUsed(id: number, usedAt: Date, options?: OperationOptions): Promise<boolean> {
    ensureActive(options?.signal, 'magicLinks.markUsed');
    const link = this.links.get(id);
    if (!link || link.used) return false;
    this.links.set(id, { ...link, used: true, usedAt });
    return true;
  }

  async listActiveByUser(userId: number, now: Date, options?: OperationOptions): Promise<MagicLink[]> {
    ensureActive(options?.signal, 'magicLinks.listActiveByUser');
    return this.activeFor(userId, now).map((link) => ({ ...link }));
  }

  async invalidateByUser(userId: number, now: Date, options?: OperationOptions): Promise<string[]> {
    ensureActive(options?.signal, 'magicLinks.invalidateByUser');
    return this.invalidateWhere((link) => link.userId === userId, now);
  }

  async invalidateByHashes(
    tokenHashes: string[],
    now: Date,
    options?: OperationOptions
  ): Promise<string[]> {
    ensureActive(options?.signal, 'magicLinks.invalidateByHashes');
    const wanted = new Set(tokenHashes);
    return this.invalidateWhere((link) => wanted.has(link.tokenHash), now);
  }

  async cleanupExpired(expiredBefore: Date, options?: OperationOptions): Promise<number> {
    ensureActive(options?.signal, 'magicLinks.cleanupExpired');
    let deleted = 0;

    for (const [id, link] of this.links) {
      if (!link.used && link.expiresAt.getTime() < expiredBefore.getTime()) {
        this.links.delete(id);
        this.hashIndex.delete(link.tokenHash);
        deleted++;
      }
    }

    return deleted;
  }

  private activeFor(userId: number, now: Date): MagicLink[] {
    return [...this.links.values()]
      .filter((link) => link.userId === userId && isMagicLinkActive(link, now))
      .sort((a, b) => a.createdAt.getTime() - b.createdAt.getTime() || a.id - b.id);
  }

  private invalidateWhere(predicate: (link: MagicLink) => boolean, now: Date): string[] {
    const hashes: string[] = [];

    for (const [id, link] of this.links) {
      if (!link.used && predicate(link)) {
        this.links.set(id, { ...link, used: true, usedAt: now });
        hashes.push(link.tokenHash);
      }
    }

    return hashes;
  }
}
