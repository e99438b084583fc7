import { and, asc, eq, gt, inArray, lt, sql } from 'drizzle-orm';
import type { MagicLink, CreateMagicLinkInput, OperationOptions } from '../../../types/index.js';
import type { MagicLinkStorage } from '../../interfaces/magic-link-storage.js';
import type { Database } from '../client.js';
import { magicLinks, type MagicLinkRow } from '../schema.js';
import { runQuery, isUniqueViolation } from '../../query.js';
import { AuthError } from '../../../errors/auth-error.js';
import { ensureActive } from '../../../services/deadline.js';

function rowToMagicLink(row: MagicLinkRow): MagicLink {
  return {
    id: row.id,
    userId: row.userId,
    appId: row.appId,
    tokenHash: row.tokenHash,
    sessionId: row.sessionId,
    ipAddress: row.ipAddress ?? undefined,
    userAgent: row.userAgent ?? undefined,
    used: row.used,
    usedAt: row.usedAt ?? undefined,
    expiresAt: row.expiresAt,
    createdAt: row.createdAt,
  };
}

/**
 * PostgreSQL magic link storage implementation
 */
export class PostgresMagicLinkStorage implements MagicLinkStorage {
  constructor(private readonly db: Database) {}

  async create(
    input: CreateMagicLinkInput,
    limits: { maxActive: number; now: Date },
    options?: OperationOptions
  ): Promise<MagicLink> {
    const { maxActive, now } = limits;

    const row = await runQuery('magicLinks.create', options, async () => {
      try {
        return await this.db.transaction(async (tx) => {
          // Serialize inserts per user so the cap holds under concurrency
          await tx.execute(sql`SELECT pg_advisory_xact_lock(${input.userId}::bigint)`);

          const active = await tx
            .select({ id: magicLinks.id })
            .from(magicLinks)
            .where(
              and(
                eq(magicLinks.userId, input.userId),
                eq(magicLinks.used, false),
                gt(magicLinks.expiresAt, now)
              )
            )
            .orderBy(asc(magicLinks.createdAt), asc(magicLinks.id));

          const excess = active.length - maxActive + 1;
          if (excess > 0) {
            const evicted = active.slice(0, excess).map((link) => link.id);
            await tx.delete(magicLinks).where(inArray(magicLinks.id, evicted));
          }

          ensureActive(options?.signal, 'magicLinks.create');

          const inserted = await tx
            .insert(magicLinks)
            .values({
              userId: input.userId,
              appId: input.appId,
              tokenHash: input.tokenHash,
              sessionId: input.sessionId,
              ipAddress: input.ipAddress ?? null,
              userAgent: input.userAgent ?? null,
              expiresAt: input.expiresAt,
              createdAt: now,
            })
            .returning();

          return inserted[0];
        });
      } catch (error) {
        if (isUniqueViolation(error)) {
          throw AuthError.alreadyExists('A magic link with this token already exists.');
        }
        throw error;
      }
    });

    if (!row) {
      throw AuthError.internal('magicLinks.create', new Error('Insert returned no row'));
    }
    return rowToMagicLink(row);
  }

  async getByTokenHash(tokenHash: string, options?: OperationOptions): Promise<MagicLink | null> {
    const rows = await runQuery('magicLinks.getByTokenHash', options, () =>
      this.db.select().from(magicLinks).where(eq(magicLinks.tokenHash, tokenHash)).limit(1)
    );
    const row = rows[0];
    return row ? rowToMagicLink(row) : null;
  }

  async markUsed(id: number, usedAt: Date, options?: OperationOptions): Promise<boolean> {
    const rows = await runQuery('magicLinks.markUsed', options, () =>
      this.db
        .update(magicLinks)
        .set({ used: true, usedAt })
        .where(and(eq(magicLinks.id, id), eq(magicLinks.used, false)))
        .returning({ id: magicLinks.id })
    );
    return rows.length > 0;
  }

  async listActiveByUser(userId: number, now: Date, options?: OperationOptions): Promise<MagicLink[]> {
    const rows = await runQuery('magicLinks.listActiveByUser', options, () =>
      this.db
        .select()
        .from(magicLinks)
        .where(
          and(eq(magicLinks.userId, userId), eq(magicLinks.used, false), gt(magicLinks.expiresAt, now))
        )
        .orderBy(asc(magicLinks.createdAt), asc(magicLinks.id))
    );
    return rows.map(rowToMagicLink);
  }

  async invalidateByUser(userId: number, now: Date, options?: OperationOptions): Promise<string[]> {
    const rows = await runQuery('magicLinks.invalidateByUser', options, () =>
      this.db
        .update(magicLinks)
        .set({ used: true, usedAt: now })
        .where(and(eq(magicLinks.userId, userId), eq(magicLinks.used, false)))
        .returning({ tokenHash: magicLinks.tokenHash })
    );
    return rows.map((row) => row.tokenHash);
  }

  async invalidateByHashes(
    tokenHashes: string[],
    now: Date,
    options?: OperationOptions
  ): Promise<string[]> {
    if (tokenHashes.length === 0) {
      return [];
    }

    const rows = await runQuery('magicLinks.invalidateByHashes', options, () =>
      this.db
        .update(magicLinks)
        .set({ used: true, usedAt: now })
        .where(and(inArray(magicLinks.tokenHash, tokenHashes), eq(magicLinks.used, false)))
        .returning({ tokenHash: magicLinks.tokenHash })
    );
    return rows.map((row) => row.tokenHash);
  }

  async cleanupExpired(expiredBefore: Date, options?: OperationOptions): Promise<number> {
    const rows = await runQuery('magicLinks.cleanupExpired', options, () =>
      this.db
        .delete(magicLinks)
        .where(and(eq(magicLinks.used, false), lt(magicLinks.expiresAt, expiredBefore)))
        .returning({ id: magicLinks.id })
    );
    return rows.length;
  }
}
