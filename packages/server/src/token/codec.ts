import type { TokenType } from '@opcore/shared';

/**
 * Metadata recovered from a token value without consulting the store
 */
export interface DecodedToken {
  sid: string;
  type: TokenType;
  iat: number;
  exp?: number;
  [claim: string]: unknown;
}

/**
 * Turns a session id plus metadata into a credential value and back.
 * `extra.exp`, when given, overrides the codec's own lifetime.
 */
export interface TokenCodec {
  readonly tokenType: TokenType;
  /** Default lifetime in seconds */
  readonly lifetime: number;
  encode(sessionId: string, typeTag: string, extra?: Record<string, unknown>): Promise<string>;
  decode(value: string): Promise<DecodedToken>;
}
