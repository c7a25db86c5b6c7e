import { SESSION_KEY_SEPARATOR } from '../config/constants.js';
import { InvalidSessionKey } from '../errors/session-errors.js';

/**
 * Path into the session store: user, user+client or user+client+grant
 */
export type SessionPath = [userId: string] | [userId: string, clientId: string] | [userId: string, clientId: string, grantId: string];

/**
 * Serialize a session path. Each part is percent-encoded so the
 * separator can never occur inside a part.
 */
export function sessionKey(...parts: SessionPath): string {
  return parts.map((part) => encodeURIComponent(part)).join(SESSION_KEY_SEPARATOR);
}

/**
 * Inverse of `sessionKey`
 */
export function unpackSessionKey(key: string): SessionPath {
  const parts = key.split(SESSION_KEY_SEPARATOR).map((part) => {
    try {
      return decodeURIComponent(part);
    } catch {
      throw new InvalidSessionKey(`Malformed session key part: ${part}`);
    }
  });

  const [userId, clientId, grantId] = parts;
  if (parts.length > 3 || !userId) {
    throw new InvalidSessionKey('Session key must have one to three parts');
  }
  if (clientId === undefined) {
    return [userId];
  }
  if (grantId === undefined) {
    return [userId, clientId];
  }
  return [userId, clientId, grantId];
}

/**
 * Unpack a key that must address a grant
 */
export function unpackGrantKey(key: string): { userId: string; clientId: string; grantId: string } {
  const path = unpackSessionKey(key);
  if (path.length !== 3) {
    throw new InvalidSessionKey(`Not a grant session key: ${key}`);
  }
  const [userId, clientId, grantId] = path;
  return { userId, clientId, grantId };
}
