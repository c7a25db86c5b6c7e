import { decrypt, encryptDeterministic } from '../crypto/encrypt.js';
import { UnknownToken } from '../errors/session-errors.js';

/**
 * AEAD encryption of session ids for the `sid` claim. Deterministic, so
 * every ID Token and logout token for one session carries the same sid.
 */
export class SessionIdCipher {
  constructor(private readonly key: Buffer) {}

  encrypt(sessionId: string): string {
    return encryptDeterministic(this.key, sessionId);
  }

  decrypt(sid: string): string {
    try {
      return decrypt(this.key, sid);
    } catch {
      throw new UnknownToken('Undecipherable sid');
    }
  }
}
