import type {
  User,
  CreateUserInput,
  App,
  RefreshTokenRecord,
  CreateRefreshTokenInput,
  OperationOptions,
} from '../../types/index.js';
import type { CredentialStorage } from '../interfaces/credential-storage.js';
import { AuthError } from '../../errors/auth-error.js';
import { ensureActive } from '../../services/deadline.js';

/**
 * In-memory credential storage implementation
 */
export class MemoryCredentialStorage implements CredentialStorage {
  private users = new Map<number, User>();
  private emailIndex = new Map<string, number>(); // email -> user id
  private usernameIndex = new Map<string, number>(); // username -> user id
  private apps = new Map<number, App>();
  private refreshTokens = new Map<number, RefreshTokenRecord>();
  private nextUserId = 1;
  private nextTokenId = 1;

  constructor(apps: App[] = []) {
    for (const app of apps) {
      this.apps.set(app.id, { ...app });
    }
  }

  /**
   * Register an application (apps are provisioned out of band)
   */
  addApp(app: App): void {
    this.apps.set(app.id, { ...app });
  }

  async getUserByEmail(email: string, options?: OperationOptions): Promise<User | null> {
    ensureActive(options?.signal, 'credentials.getUserByEmail');
    const id = this.emailIndex.get(email);
    if (id === undefined) return null;
    return this.copyUser(id);
  }

  async getUserById(id: number, options?: OperationOptions): Promise<User | null> {
    ensureActive(options?.signal, 'credentials.getUserById');
    return this.copyUser(id);
  }

  async getApp(appId: number, options?: OperationOptions): Promise<App | null> {
    ensureActive(options?.signal, 'credentials.getApp');
    const app = this.apps.get(appId);
    return app ? { ...app } : null;
  }

  async *findRefreshTokenCandidates(
    now: Date,
    options?: OperationOptions
  ): AsyncIterable<RefreshTokenRecord> {
    ensureActive(options?.signal, 'credentials.findRefreshTokenCandidates');
    // Snapshot so concurrent rotation does not disturb iteration
    const candidates = [...this.refreshTokens.values()].filter(
      (token) => token.expiresAt.getTime() > now.getTime()
    );
    for (const token of candidates) {
      ensureActive(options?.signal, 'credentials.findRefreshTokenCandidates');
      yield { ...token };
    }
  }

  async saveUser(input: CreateUserInput, options?: OperationOptions): Promise<number> {
    ensureActive(options?.signal, 'credentials.saveUser');

    if (this.emailIndex.has(input.email) || this.usernameIndex.has(input.username)) {
      throw AuthError.alreadyExists();
    }

    const id = this.nextUserId++;
    this.users.set(id, {
      id,
      email: input.email,
      username: input.username,
      passwordHash: input.passwordHash,
      isVerified: false,
      createdAt: new Date(),
    });
    this.emailIndex.set(input.email, id);
    this.usernameIndex.set(input.username, id);

    return id;
  }

  async setEmailVerified(userId: number, options?: OperationOptions): Promise<boolean> {
    ensureActive(options?.signal, 'credentials.setEmailVerified');
    const user = this.users.get(userId);
    if (!user) return false;
    this.users.set(userId, { ...user, isVerified: true });
    return true;
  }

  async saveRefreshToken(
    input: CreateRefreshTokenInput,
    options?: OperationOptions
  ): Promise<RefreshTokenRecord> {
    ensureActive(options?.signal, 'credentials.saveRefreshToken');

    const record: RefreshTokenRecord = {
      id: this.nextTokenId++,
      userId: input.userId,
      appId: input.appId,
      tokenHash: input.tokenHash,
      expiresAt: input.expiresAt,
      createdAt: new Date(),
    };
    this.refreshTokens.set(record.id, record);

    return { ...record };
  }

  async rotateRefreshToken(
    userId: number,
    oldHash: string,
    newHash: string,
    expiresAt: Date,
    options?: OperationOptions
  ): Promise<boolean> {
    ensureActive(options?.signal, 'credentials.rotateRefreshToken');

    for (const [id, token] of this.refreshTokens) {
      if (token.userId === userId && token.tokenHash === oldHash) {
        this.refreshTokens.set(id, { ...token, tokenHash: newHash, expiresAt });
        return true;
      }
    }
    return false;
  }

  async deleteRefreshToken(tokenHash: string, options?: OperationOptions): Promise<boolean> {
    ensureActive(options?.signal, 'credentials.deleteRefreshToken');

    for (const [id, token] of this.refreshTokens) {
      if (token.tokenHash === tokenHash) {
        this.refreshTokens.delete(id);
        return true;
      }
    }
    return false;
  }

  private copyUser(id: number): User | null {
    const user = this.users.get(id);
    return user ? { ...user } : null;
  }
}
