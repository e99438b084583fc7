import { and, asc, eq, gt } from 'drizzle-orm';
import type {
  User,
  CreateUserInput,
  App,
  RefreshTokenRecord,
  CreateRefreshTokenInput,
  OperationOptions,
} from '../../../types/index.js';
import type { CredentialStorage } from '../../interfaces/credential-storage.js';
import type { Database } from '../client.js';
import { users, apps, refreshTokens, type UserRow, type RefreshTokenRow } from '../schema.js';
import { runQuery, isUniqueViolation } from '../../query.js';
import { AuthError } from '../../../errors/auth-error.js';
import { REFRESH_TOKEN_SCAN_BATCH } from '../../../config/constants.js';

function rowToUser(row: UserRow): User {
  return {
    id: row.id,
    email: row.email,
    username: row.username,
    passwordHash: row.passwordHash,
    isVerified: row.isVerified,
    createdAt: row.createdAt,
  };
}

function rowToRefreshToken(row: RefreshTokenRow): RefreshTokenRecord {
  return {
    id: row.id,
    userId: row.userId,
    appId: row.appId,
    tokenHash: row.tokenHash,
    expiresAt: row.expiresAt,
    createdAt: row.createdAt,
  };
}

/**
 * PostgreSQL credential storage implementation
 */
export class PostgresCredentialStorage implements CredentialStorage {
  constructor(private readonly db: Database) {}

  async getUserByEmail(email: string, options?: OperationOptions): Promise<User | null> {
    const rows = await runQuery('credentials.getUserByEmail', options, () =>
      this.db.select().from(users).where(eq(users.email, email)).limit(1)
    );
    const row = rows[0];
    return row ? rowToUser(row) : null;
  }

  async getUserById(id: number, options?: OperationOptions): Promise<User | null> {
    const rows = await runQuery('credentials.getUserById', options, () =>
      this.db.select().from(users).where(eq(users.id, id)).limit(1)
    );
    const row = rows[0];
    return row ? rowToUser(row) : null;
  }

  async getApp(appId: number, options?: OperationOptions): Promise<App | null> {
    const rows = await runQuery('credentials.getApp', options, () =>
      this.db.select().from(apps).where(eq(apps.id, appId)).limit(1)
    );
    const row = rows[0];
    return row ? { id: row.id, name: row.name, secret: row.secret } : null;
  }

  async *findRefreshTokenCandidates(
    now: Date,
    options?: OperationOptions
  ): AsyncIterable<RefreshTokenRecord> {
    let lastId = 0;

    for (;;) {
      const after = lastId;
      const page = await runQuery('credentials.findRefreshTokenCandidates', options, () =>
        this.db
          .select()
          .from(refreshTokens)
          .where(and(gt(refreshTokens.expiresAt, now), gt(refreshTokens.id, after)))
          .orderBy(asc(refreshTokens.id))
          .limit(REFRESH_TOKEN_SCAN_BATCH)
      );

      for (const row of page) {
        lastId = row.id;
        yield rowToRefreshToken(row);
      }

      if (page.length < REFRESH_TOKEN_SCAN_BATCH) {
        return;
      }
    }
  }

  async saveUser(input: CreateUserInput, options?: OperationOptions): Promise<number> {
    const rows = await runQuery('credentials.saveUser', options, async () => {
      try {
        return await this.db
          .insert(users)
          .values({
            email: input.email,
            username: input.username,
            passwordHash: input.passwordHash,
          })
          .returning({ id: users.id });
      } catch (error) {
        if (isUniqueViolation(error)) {
          throw AuthError.alreadyExists();
        }
        throw error;
      }
    });

    const row = rows[0];
    if (!row) {
      throw AuthError.internal('credentials.saveUser', new Error('Insert returned no row'));
    }
    return row.id;
  }

  async setEmailVerified(userId: number, options?: OperationOptions): Promise<boolean> {
    const rows = await runQuery('credentials.setEmailVerified', options, () =>
      this.db
        .update(users)
        .set({ isVerified: true })
        .where(eq(users.id, userId))
        .returning({ id: users.id })
    );
    return rows.length > 0;
  }

  async saveRefreshToken(
    input: CreateRefreshTokenInput,
    options?: OperationOptions
  ): Promise<RefreshTokenRecord> {
    const rows = await runQuery('credentials.saveRefreshToken', options, () =>
      this.db
        .insert(refreshTokens)
        .values({
          userId: input.userId,
          appId: input.appId,
          tokenHash: input.tokenHash,
          expiresAt: input.expiresAt,
        })
        .returning()
    );

    const row = rows[0];
    if (!row) {
      throw AuthError.internal('credentials.saveRefreshToken', new Error('Insert returned no row'));
    }
    return rowToRefreshToken(row);
  }

  async rotateRefreshToken(
    userId: number,
    oldHash: string,
    newHash: string,
    expiresAt: Date,
    options?: OperationOptions
  ): Promise<boolean> {
    // Single conditional statement: a racer that lost sees zero rows
    const rows = await runQuery('credentials.rotateRefreshToken', options, () =>
      this.db
        .update(refreshTokens)
        .set({ tokenHash: newHash, expiresAt })
        .where(and(eq(refreshTokens.userId, userId), eq(refreshTokens.tokenHash, oldHash)))
        .returning({ id: refreshTokens.id })
    );
    return rows.length > 0;
  }

  async deleteRefreshToken(tokenHash: string, options?: OperationOptions): Promise<boolean> {
    const rows = await runQuery('credentials.deleteRefreshToken', options, () =>
      this.db
        .delete(refreshTokens)
        .where(eq(refreshTokens.tokenHash, tokenHash))
        .returning({ id: refreshTokens.id })
    );
    return rows.length > 0;
  }
}
