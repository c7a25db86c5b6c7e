import * as jose from 'jose';
import type { IdTokenPayload } from '@opcore/shared';
import type { DecodedToken, TokenCodec } from './codec.js';
import type { SessionIdCipher } from './sid.js';
import type { Clock } from '../session/clock.js';
import type { KeyMaterial } from '../crypto/jwt.js';
import type { Grant } from '../session/grant.js';
import { leftHalfHash } from '../crypto/hash.js';
import { unpackGrantKey } from '../session/session-key.js';
import { ToOld, UnknownToken } from '../errors/session-errors.js';
import { ID_TOKEN_JWT_TYPE, TOKEN_TYPE_ID_TOKEN } from '../config/constants.js';

/**
 * Resolves the JWS algorithm an ID Token for the client is signed with
 */
export type IdTokenAlgorithmResolver = (clientId: string) => Promise<string>;

export interface IdTokenClaimsInput {
  grant: Grant;
  code?: string;
  accessToken?: string;
  userClaims?: Record<string, unknown>;
  algorithm: string;
}

/**
 * Claims of an ID Token apart from iss, aud, iat, exp and sid, which the
 * codec adds when signing
 * OpenID Connect Core 1.0 Section 2, 3.1.3.6, 3.3.2.11
 */
export function buildIdTokenClaims(input: IdTokenClaimsInput): Record<string, unknown> {
  const { grant } = input;
  const event = grant.authenticationEvent;

  const claims: Record<string, unknown> = {
    ...input.userClaims,
    sub: grant.sub,
    acr: event.authnInfo,
  };

  if (event.authnTime !== undefined) {
    claims['auth_time'] = event.authnTime;
  }
  if (grant.authorizationRequest.nonce) {
    claims['nonce'] = grant.authorizationRequest.nonce;
  }
  if (input.code) {
    claims['c_hash'] = leftHalfHash(input.code, input.algorithm);
  }
  if (input.accessToken) {
    claims['at_hash'] = leftHalfHash(input.accessToken, input.algorithm);
  }

  return claims;
}

/**
 * ID Tokens as grant tokens. Encoding signs for the client addressed by
 * the session id; decoding recovers the session id from the encrypted
 * `sid` claim.
 */
export class IdTokenCodec implements TokenCodec {
  readonly tokenType = TOKEN_TYPE_ID_TOKEN;

  constructor(
    private readonly keys: KeyMaterial,
    private readonly issuer: string,
    public readonly lifetime: number,
    private readonly clock: Clock,
    private readonly sidCipher: SessionIdCipher,
    private readonly resolveAlgorithm: IdTokenAlgorithmResolver
  ) {}

  async algorithmFor(clientId: string): Promise<string> {
    return this.resolveAlgorithm(clientId);
  }

  async encode(sessionId: string, _typeTag: string, extra: Record<string, unknown> = {}): Promise<string> {
    const { clientId } = unpackGrantKey(sessionId);
    const iat = this.clock.now();

    const { exp, sub } = extra;
    if (typeof sub !== 'string') {
      throw new TypeError('An ID Token needs a sub claim');
    }

    const payload: IdTokenPayload = {
      ...extra,
      iss: this.issuer,
      sub,
      aud: [clientId],
      iat,
      exp: typeof exp === 'number' ? exp : iat + this.lifetime,
      sid: this.sidCipher.encrypt(sessionId),
    };

    return this.keys.sign(payload, { algorithm: await this.resolveAlgorithm(clientId), typ: ID_TOKEN_JWT_TYPE });
  }

  /**
   * Verify an ID Token issued by this provider.
   * `allowExpired` accepts expired tokens, as an id_token_hint may be.
   * Other JWTs this provider signs, such as logout tokens, are refused.
   */
  async verify(
    value: string,
    options: { allowExpired?: boolean; audience?: string } = {}
  ): Promise<{ payload: jose.JWTPayload; sessionId: string }> {
    let payload: jose.JWTPayload;
    try {
      payload = await this.keys.verify(value, {
        issuer: this.issuer,
        typ: ID_TOKEN_JWT_TYPE,
        audience: options.audience,
        clockTolerance: options.allowExpired ? Number.MAX_SAFE_INTEGER : 0,
        currentDate: new Date(this.clock.now() * 1000),
      });
    } catch (error) {
      if (error instanceof jose.errors.JWTExpired) {
        throw new ToOld('Expired id_token');
      }
      throw new UnknownToken('Unverifiable id_token');
    }

    if (typeof payload.sid !== 'string') {
      throw new UnknownToken('id_token carries no sid');
    }

    return { payload, sessionId: this.sidCipher.decrypt(payload.sid) };
  }

  async decode(value: string): Promise<DecodedToken> {
    const { payload, sessionId } = await this.verify(value);
    const iat = typeof payload.iat === 'number' ? payload.iat : 0;
    return { ...payload, sid: sessionId, iat, type: this.tokenType };
  }
}
