import { createHash, createHmac, timingSafeEqual, randomBytes, scrypt as scryptCallback } from 'node:crypto';

/**
 * Promisified scrypt function
 */
function scryptAsync(
  password: string,
  salt: Buffer,
  keyLength: number,
  options: { N: number; r: number; p: number }
): Promise<Buffer> {
  return new Promise((resolve, reject) => {
    scryptCallback(password, salt, keyLength, options, (err, derivedKey) => {
      if (err) reject(err);
      else resolve(derivedKey);
    });
  });
}

/**
 * Hash a value using SHA-256, hex encoded
 */
export function sha256(value: string): string {
  return createHash('sha256').update(value, 'utf8').digest('hex');
}

/**
 * Hash algorithm matching a JWS algorithm's digest size
 */
function digestFor(alg: string): 'sha256' | 'sha384' | 'sha512' {
  if (alg.endsWith('384')) return 'sha384';
  if (alg.endsWith('512')) return 'sha512';
  return 'sha256';
}

/**
 * Left-most half of the hash of a value, base64url encoded
 * OpenID Connect Core 1.0 Section 3.3.2.11 (c_hash, at_hash)
 */
export function leftHalfHash(value: string, alg: string): string {
  const digest = createHash(digestFor(alg)).update(value, 'ascii').digest();
  return digest.subarray(0, digest.length / 2).toString('base64url');
}

/**
 * HMAC-SHA256 of a value
 */
export function hmacSha256(key: Buffer | string, value: string): Buffer {
  return createHmac('sha256', key).update(value, 'utf8').digest();
}

/**
 * Compare two strings in constant time to prevent timing attacks
 */
export function constantTimeCompare(a: string, b: string): boolean {
  if (a.length !== b.length) {
    return false;
  }

  const bufA = Buffer.from(a, 'utf8');
  const bufB = Buffer.from(b, 'utf8');

  return timingSafeEqual(bufA, bufB);
}

/**
 * Hash a client secret or password using scrypt
 * Returns format: $scrypt$N$r$p$salt$hash
 */
export async function hashClientSecret(secret: string): Promise<string> {
  const salt = randomBytes(16);
  const N = 16384; // CPU/memory cost
  const r = 8; // Block size
  const p = 1; // Parallelization
  const keyLength = 64;

  const hash = await scryptAsync(secret, salt, keyLength, { N, r, p });

  return `$scrypt$${N}$${r}$${p}$${salt.toString('base64')}$${hash.toString('base64')}`;
}

/**
 * Verify a client secret or password against its hash
 */
export async function verifyClientSecret(secret: string, hash: string): Promise<boolean> {
  // Expected format: $scrypt$N$r$p$salt$hash
  const [, scheme, n, r, p, salt, stored] = hash.split('$');

  if (scheme !== 'scrypt' || !n || !r || !p || !salt || !stored) {
    return false;
  }

  const storedHash = Buffer.from(stored, 'base64');
  const derivedHash = await scryptAsync(secret, Buffer.from(salt, 'base64'), storedHash.length, {
    N: parseInt(n, 10),
    r: parseInt(r, 10),
    p: parseInt(p, 10),
  });

  return timingSafeEqual(storedHash, derivedHash);
}
