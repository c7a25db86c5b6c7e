import * as jose from 'jose';
import { deriveKey } from './encrypt.js';
import { generateRandomBase64Url } from './random.js';
import { DEFAULT_SIGNING_ALGORITHM, SUPPORTED_SIGNING_ALGORITHMS } from '../config/constants.js';

/**
 * JWT signing and verification utilities using jose library
 */

export type SigningAlgorithm = (typeof SUPPORTED_SIGNING_ALGORITHMS)[number];

export function isSigningAlgorithm(value: string): value is SigningAlgorithm {
  return SUPPORTED_SIGNING_ALGORITHMS.some((alg) => alg === value);
}

interface SigningKey {
  kid: string;
  algorithm: SigningAlgorithm;
  privateKey: jose.KeyLike;
  publicJwk: jose.JWK;
}

export interface VerifyOptions {
  issuer?: string;
  audience?: string | string[];
  algorithms?: string[];
  clockTolerance?: number;
  currentDate?: Date;
  typ?: string;
}

/**
 * Provider key material: one asymmetric signing key per supported
 * algorithm plus the symmetric key used for session id encryption,
 * opaque tokens and cookies.
 */
export class KeyMaterial {
  private readonly keys: Map<SigningAlgorithm, SigningKey>;

  private constructor(
    keys: SigningKey[],
    public readonly symKey: Buffer,
    public readonly defaultAlgorithm: SigningAlgorithm
  ) {
    this.keys = new Map(keys.map((key) => [key.algorithm, key]));
  }

  /**
   * Create key material with freshly generated signing keys.
   * A PEM encoded PKCS#8 key, when given, is used for its algorithm instead.
   */
  static async create(options: {
    symKey: string;
    algorithms?: readonly SigningAlgorithm[];
    defaultAlgorithm?: SigningAlgorithm;
    privateKeyPem?: { pem: string; algorithm: SigningAlgorithm };
  }): Promise<KeyMaterial> {
    const algorithms = options.algorithms ?? SUPPORTED_SIGNING_ALGORITHMS;
    const keys: SigningKey[] = [];

    for (const algorithm of algorithms) {
      let privateKey: jose.KeyLike;
      let publicKey: jose.KeyLike;

      if (options.privateKeyPem && options.privateKeyPem.algorithm === algorithm) {
        privateKey = await jose.importPKCS8(options.privateKeyPem.pem, algorithm, { extractable: true });
        const jwk = await jose.exportJWK(privateKey);
        // Drop private members to get the public half
        const { d: _d, p: _p, q: _q, dp: _dp, dq: _dq, qi: _qi, ...publicMembers } = jwk;
        const imported = await jose.importJWK(publicMembers, algorithm);
        if (imported instanceof Uint8Array) {
          throw new Error(`Expected an asymmetric key for ${algorithm}`);
        }
        publicKey = imported;
      } else {
        const pair = await jose.generateKeyPair(algorithm, { extractable: true });
        privateKey = pair.privateKey;
        publicKey = pair.publicKey;
      }

      const publicJwk = await jose.exportJWK(publicKey);
      keys.push({
        kid: generateRandomBase64Url(12),
        algorithm,
        privateKey,
        publicJwk: { ...publicJwk, alg: algorithm, use: 'sig' },
      });
    }

    const defaultAlgorithm = options.defaultAlgorithm ?? DEFAULT_SIGNING_ALGORITHM;
    if (!algorithms.includes(defaultAlgorithm)) {
      throw new Error(`No signing key for default algorithm ${defaultAlgorithm}`);
    }

    return new KeyMaterial(keys, deriveKey(options.symKey), defaultAlgorithm);
  }

  supports(algorithm: string): algorithm is SigningAlgorithm {
    return isSigningAlgorithm(algorithm) && this.keys.has(algorithm);
  }

  /**
   * Sign a JWT payload with the key for the given algorithm
   */
  async sign(
    payload: jose.JWTPayload,
    options: { algorithm?: string; typ?: string } = {}
  ): Promise<string> {
    const algorithm = options.algorithm ?? this.defaultAlgorithm;
    if (!this.supports(algorithm)) {
      throw new Error(`No signing key for algorithm ${algorithm}`);
    }
    const key = this.keys.get(algorithm);
    if (!key) {
      throw new Error(`No signing key for algorithm ${algorithm}`);
    }

    return new jose.SignJWT(payload)
      .setProtectedHeader({
        alg: key.algorithm,
        kid: key.kid,
        typ: options.typ ?? 'JWT',
      })
      .sign(key.privateKey);
  }

  /**
   * Verify a JWT signed by this provider and return its payload
   */
  async verify(token: string, options: VerifyOptions = {}): Promise<jose.JWTPayload> {
    const jwks = jose.createLocalJWKSet(this.jwks());

    const verifyOptions: jose.JWTVerifyOptions = {
      clockTolerance: options.clockTolerance ?? 5,
    };

    if (options.issuer) {
      verifyOptions.issuer = options.issuer;
    }

    if (options.audience) {
      verifyOptions.audience = options.audience;
    }

    if (options.algorithms) {
      verifyOptions.algorithms = options.algorithms;
    }

    if (options.currentDate) {
      verifyOptions.currentDate = options.currentDate;
    }

    if (options.typ) {
      verifyOptions.typ = options.typ;
    }

    const { payload } = await jose.jwtVerify(token, jwks, verifyOptions);

    return payload;
  }

  /**
   * Public keys as a JSON Web Key Set
   */
  jwks(): { keys: jose.JWK[] } {
    return {
      keys: Array.from(this.keys.values()).map((key) => ({ ...key.publicJwk, kid: key.kid })),
    };
  }
}

/**
 * Verify a JWT signed by a client with one of its registered keys
 */
export async function verifyClientJwt(
  token: string,
  clientJwks: jose.JSONWebKeySet,
  options: { algorithms?: string[]; audience?: string; currentDate?: Date }
): Promise<jose.JWTPayload> {
  const jwks = jose.createLocalJWKSet(clientJwks);

  const verifyOptions: jose.JWTVerifyOptions = {};
  if (options.algorithms) {
    verifyOptions.algorithms = options.algorithms;
  }
  if (options.audience) {
    verifyOptions.audience = options.audience;
  }
  if (options.currentDate) {
    verifyOptions.currentDate = options.currentDate;
  }

  const { payload } = await jose.jwtVerify(token, jwks, verifyOptions);

  return payload;
}
