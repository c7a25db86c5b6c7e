import { z } from 'zod';
import type { TokenType } from '@opcore/shared';
import type { DecodedToken, TokenCodec } from './codec.js';
import type { Clock } from '../session/clock.js';
import { decrypt, encrypt } from '../crypto/encrypt.js';
import { generateJti } from '../crypto/random.js';
import { ToOld, UnknownToken } from '../errors/session-errors.js';
import { TOKEN_TYPE_TAGS } from '../config/constants.js';

const payloadSchema = z
  .object({
    sid: z.string(),
    ttype: z.string(),
    iat: z.number(),
    exp: z.number().optional(),
  })
  .passthrough();

/**
 * Encrypted JSON token values. Nothing outside the provider can read them.
 */
export class OpaqueTokenCodec implements TokenCodec {
  constructor(
    public readonly tokenType: TokenType,
    private readonly key: Buffer,
    public readonly lifetime: number,
    private readonly clock: Clock
  ) {}

  async encode(sessionId: string, typeTag: string, extra: Record<string, unknown> = {}): Promise<string> {
    const iat = this.clock.now();
    const payload = {
      ...extra,
      sid: sessionId,
      ttype: typeTag,
      iat,
      exp: typeof extra['exp'] === 'number' ? extra['exp'] : iat + this.lifetime,
      jti: generateJti(),
    };
    return encrypt(this.key, JSON.stringify(payload));
  }

  async decode(value: string): Promise<DecodedToken> {
    let parsed: unknown;
    try {
      parsed = JSON.parse(decrypt(this.key, value));
    } catch {
      throw new UnknownToken('Undecipherable token');
    }

    const result = payloadSchema.safeParse(parsed);
    if (!result.success || result.data.ttype !== TOKEN_TYPE_TAGS[this.tokenType]) {
      throw new UnknownToken(`Not a ${this.tokenType}`);
    }

    const { ttype: _ttype, ...claims } = result.data;
    if (claims.exp !== undefined && this.clock.now() >= claims.exp) {
      throw new ToOld(`Expired ${this.tokenType}`);
    }

    return { ...claims, type: this.tokenType };
  }
}
