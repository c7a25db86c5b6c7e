import { z } from 'zod';
import type { CookieValue } from '../cookie/cookie-dealer.js';
import { InvalidSessionKey, ToOld } from '../errors/session-errors.js';
import { unpackSessionKey } from '../session/session-key.js';

/**
 * Who an OP session cookie says the browser is
 */
export interface AuthenticatedIdentity {
  uid: string;
  /** Session id the cookie is bound to */
  sid?: string;
}

export interface AuthenticationResult {
  identity: AuthenticatedIdentity;
  /** When the cookie was issued, epoch seconds */
  timestamp: number;
}

/**
 * What an authentication method gets when the flow hands off to it
 */
export interface AuthenticationArgs {
  /** Authorization request parameters to resume with */
  request: Record<string, string>;
  clientId: string;
  loginHint?: string;
}

export type AuthenticationChallenge =
  | { kind: 'html'; body: string }
  | { kind: 'authenticated'; userId: string };

/**
 * Capability every authentication method provides to the authorization flow
 */
export interface AuthenticationMethod {
  readonly id: string;
  readonly acr: string;

  /**
   * Identity carried by an OP session cookie. Throws `ToOld` when the
   * cookie is older than `maxAge` seconds; a `maxAge` of 0 always does.
   */
  authenticatedAs(cookie: CookieValue | null, options: { now: number; maxAge?: number }): AuthenticationResult | null;

  /**
   * Start authenticating the end-user
   */
  challenge(args: AuthenticationArgs): Promise<AuthenticationChallenge>;
}

const cookiePayloadSchema = z.object({ sid: z.string().min(1) });

/**
 * Payload of the OP session cookie
 */
export function sessionCookiePayload(sid: string): string {
  return JSON.stringify({ sid });
}

/**
 * Cookie handling shared by all methods
 */
export abstract class BaseAuthenticationMethod implements AuthenticationMethod {
  constructor(
    public readonly id: string,
    public readonly acr: string
  ) {}

  authenticatedAs(cookie: CookieValue | null, options: { now: number; maxAge?: number }): AuthenticationResult | null {
    if (!cookie) {
      return null;
    }

    let payload: unknown;
    try {
      payload = JSON.parse(cookie.payload);
    } catch {
      return null;
    }
    const parsed = cookiePayloadSchema.safeParse(payload);
    if (!parsed.success) {
      return null;
    }

    const { maxAge } = options;
    if (maxAge !== undefined && (maxAge === 0 || options.now > cookie.timestamp + maxAge)) {
      throw new ToOld('Authentication is older than max_age');
    }

    let uid: string;
    try {
      [uid] = unpackSessionKey(parsed.data.sid);
    } catch (error) {
      if (error instanceof InvalidSessionKey) {
        return null;
      }
      throw error;
    }
    return { identity: { uid, sid: parsed.data.sid }, timestamp: cookie.timestamp };
  }

  abstract challenge(args: AuthenticationArgs): Promise<AuthenticationChallenge>;
}
