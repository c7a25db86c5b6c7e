import * as jose from 'jose';
import type { TokenType } from '@opcore/shared';
import type { DecodedToken, TokenCodec } from './codec.js';
import type { Clock } from '../session/clock.js';
import type { KeyMaterial } from '../crypto/jwt.js';
import type { SessionIdCipher } from './sid.js';
import { generateJti } from '../crypto/random.js';
import { ToOld, UnknownToken } from '../errors/session-errors.js';
import { TOKEN_TYPE_TAGS } from '../config/constants.js';

/**
 * Signed JWT token values that resource servers can verify with the
 * provider's published keys. The session id travels encrypted in `sid`.
 */
export class JwtTokenCodec implements TokenCodec {
  constructor(
    public readonly tokenType: TokenType,
    private readonly keys: KeyMaterial,
    private readonly issuer: string,
    public readonly lifetime: number,
    private readonly clock: Clock,
    private readonly sidCipher: SessionIdCipher,
    private readonly algorithm?: string
  ) {}

  async encode(sessionId: string, typeTag: string, extra: Record<string, unknown> = {}): Promise<string> {
    const iat = this.clock.now();
    return this.keys.sign(
      {
        ...extra,
        iss: this.issuer,
        sid: this.sidCipher.encrypt(sessionId),
        ttype: typeTag,
        iat,
        exp: typeof extra['exp'] === 'number' ? extra['exp'] : iat + this.lifetime,
        jti: generateJti(),
      },
      { algorithm: this.algorithm, typ: 'at+jwt' }
    );
  }

  async decode(value: string): Promise<DecodedToken> {
    let payload: jose.JWTPayload;
    try {
      payload = await this.keys.verify(value, {
        issuer: this.issuer,
        clockTolerance: 0,
        currentDate: new Date(this.clock.now() * 1000),
      });
    } catch (error) {
      if (error instanceof jose.errors.JWTExpired) {
        throw new ToOld(`Expired ${this.tokenType}`);
      }
      throw new UnknownToken('Unverifiable token');
    }

    const { sid, ttype, iat } = payload;
    if (typeof sid !== 'string' || ttype !== TOKEN_TYPE_TAGS[this.tokenType] || typeof iat !== 'number') {
      throw new UnknownToken(`Not a ${this.tokenType}`);
    }

    return { ...payload, sid: this.sidCipher.decrypt(sid), iat, type: this.tokenType };
  }
}
