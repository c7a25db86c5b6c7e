import type { UserClaims } from '@opcore/shared';
import type { IUserStorage } from '../interfaces/user-storage.js';
import { hashClientSecret, verifyClientSecret } from '../../crypto/hash.js';

interface StoredUser {
  claims: UserClaims;
  passwordHash?: string;
}

/**
 * In-memory user directory
 */
export class MemoryUserStorage implements IUserStorage {
  private users = new Map<string, StoredUser>();

  /**
   * Add or replace a user
   */
  async upsert(userId: string, claims: UserClaims, password?: string): Promise<void> {
    this.users.set(userId, {
      claims: { ...claims },
      passwordHash: password === undefined ? undefined : await hashClientSecret(password),
    });
  }

  async getClaims(userId: string): Promise<UserClaims | null> {
    const user = this.users.get(userId);
    return user ? { ...user.claims } : null;
  }

  async verifyPassword(userId: string, password: string): Promise<boolean> {
    const user = this.users.get(userId);
    if (!user?.passwordHash) {
      return false;
    }
    return verifyClientSecret(password, user.passwordHash);
  }
}
