import type { SubjectType } from '@opcore/shared';
import { sha256 } from '../crypto/hash.js';

/**
 * Subject identifier derivation, keyed by `subject_type`
 * OpenID Connect Core 1.0 Section 8
 */
export type SubjectDeriver = (userId: string, salt: string, sectorIdentifier?: string) => string;

// Fields are hashed as a JSON list so that no field can run into the next
function hashFields(...fields: string[]): string {
  return sha256(JSON.stringify(fields));
}

export const SUBJECT_DERIVERS: Record<SubjectType, SubjectDeriver> = {
  public: (userId, salt) => hashFields(userId, salt),
  pairwise: (userId, salt, sectorIdentifier = '') => hashFields(sectorIdentifier, userId, salt),
};

/**
 * Host of a sector identifier URI, or of the single redirect URI when
 * the client registered none
 */
export function sectorIdentifierFor(sectorIdentifierUri: string | undefined, redirectUris: string[]): string | undefined {
  const source = sectorIdentifierUri ?? (redirectUris.length === 1 ? redirectUris[0] : undefined);
  if (!source) {
    return undefined;
  }
  try {
    return new URL(source).host;
  } catch {
    return undefined;
  }
}
