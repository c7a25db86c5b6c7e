import type { UserClaims } from '@opcore/shared';

/**
 * End-user directory consulted by password authentication and the claims resolver
 */
export interface IUserStorage {
  /**
   * Claims held for a user, or null for an unknown user
   */
  getClaims(userId: string): Promise<UserClaims | null>;

  /**
   * Check a username/password pair
   */
  verifyPassword(userId: string, password: string): Promise<boolean>;
}
