import type { TokenType } from '@opcore/shared';
import type { DecodedToken, TokenCodec } from './codec.js';
import { UnknownToken } from '../errors/session-errors.js';

/**
 * The codecs of a provider, one per token type
 */
export class TokenHandler {
  constructor(private readonly codecs: Partial<Record<TokenType, TokenCodec>>) {}

  codec(type: TokenType): TokenCodec {
    const codec = this.codecs[type];
    if (!codec) {
      throw new Error(`No codec configured for ${type}`);
    }
    return codec;
  }

  has(type: TokenType): boolean {
    return this.codecs[type] !== undefined;
  }

  /**
   * Decode a value with whichever codec accepts it.
   * Expiry errors from the accepting codec propagate.
   */
  async info(value: string): Promise<DecodedToken> {
    for (const codec of Object.values(this.codecs)) {
      if (!codec) {
        continue;
      }
      try {
        return await codec.decode(value);
      } catch (error) {
        if (error instanceof UnknownToken) {
          continue;
        }
        throw error;
      }
    }
    throw new UnknownToken('No codec recognizes the token');
  }

  async sid(value: string): Promise<string> {
    return (await this.info(value)).sid;
  }

  async type(value: string): Promise<TokenType> {
    return (await this.info(value)).type;
  }
}
