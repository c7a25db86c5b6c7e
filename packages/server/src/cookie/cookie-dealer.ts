import type { Clock } from '../session/clock.js';
import { constantTimeCompare, hmacSha256 } from '../crypto/hash.js';

export type SameSite = 'Strict' | 'Lax' | 'None';

/**
 * A cookie ready to be set with hono's `setCookie`
 */
export interface CookieSpec {
  name: string;
  value: string;
  options: {
    path: string;
    httpOnly: boolean;
    secure: boolean;
    sameSite: SameSite;
    maxAge?: number;
  };
}

export interface CreateCookieOptions {
  ttl?: number;
  sameSite?: SameSite;
  httpOnly?: boolean;
}

export interface CookieValue {
  payload: string;
  timestamp: number;
  type: string;
}

const SEPARATOR = '|';

/**
 * Signs and checks provider cookies. A value is
 * `base64url(payload)|timestamp|type|mac`.
 */
export class CookieDealer {
  private readonly secure: boolean;

  constructor(
    private readonly key: Buffer,
    private readonly clock: Clock,
    options: { secure?: boolean } = {}
  ) {
    this.secure = options.secure ?? true;
  }

  createCookie(payload: string, type: string, name: string, options: CreateCookieOptions = {}): CookieSpec {
    const timestamp = String(this.clock.now());
    const body = [Buffer.from(payload, 'utf8').toString('base64url'), timestamp, type].join(SEPARATOR);
    const mac = this.mac(name, body);

    const spec: CookieSpec = {
      name,
      value: `${body}${SEPARATOR}${mac}`,
      options: {
        path: '/',
        httpOnly: options.httpOnly ?? true,
        secure: this.secure,
        sameSite: options.sameSite ?? 'Lax',
      },
    };
    if (options.ttl !== undefined) {
      spec.options.maxAge = options.ttl;
    }
    return spec;
  }

  /**
   * Parts of a cookie this dealer signed under `name`, or null when the
   * value is malformed or its signature does not hold
   */
  getCookieValue(value: string | undefined, name: string): CookieValue | null {
    if (!value) {
      return null;
    }

    const parts = value.split(SEPARATOR);
    if (parts.length !== 4) {
      return null;
    }
    const [encoded = '', timestamp = '', type = '', mac = ''] = parts;

    const expected = this.mac(name, [encoded, timestamp, type].join(SEPARATOR));
    if (!constantTimeCompare(mac, expected)) {
      return null;
    }

    const issuedAt = parseInt(timestamp, 10);
    if (!Number.isFinite(issuedAt)) {
      return null;
    }

    return {
      payload: Buffer.from(encoded, 'base64url').toString('utf8'),
      timestamp: issuedAt,
      type,
    };
  }

  /**
   * Expired cookies that overwrite the named ones in the browser
   */
  killCookies(names: readonly string[]): CookieSpec[] {
    return names.map((name) => ({
      name,
      value: '',
      options: {
        path: '/',
        httpOnly: true,
        secure: this.secure,
        sameSite: 'Lax',
        maxAge: 0,
      },
    }));
  }

  private mac(name: string, body: string): string {
    return hmacSha256(this.key, `${name}${SEPARATOR}${body}`).toString('base64url');
  }
}
