import { createCipheriv, createDecipheriv, randomBytes, scryptSync } from 'node:crypto';
import { hmacSha256 } from './hash.js';

const ALGORITHM = 'aes-256-gcm';
const IV_LENGTH = 12;
const AUTH_TAG_LENGTH = 16;
const KEY_LENGTH = 32;
const KEY_SALT = 'opcore-symmetric-key';
const NONCE_KEY_LABEL = 'opcore-deterministic-nonce';

/**
 * Derive an AES-256 key from a configured secret using scrypt
 */
export function deriveKey(secret: string, salt: string = KEY_SALT): Buffer {
  return scryptSync(secret, salt, KEY_LENGTH);
}

function seal(key: Buffer, iv: Buffer, plaintext: string): string {
  const cipher = createCipheriv(ALGORITHM, key, iv);
  const encrypted = Buffer.concat([cipher.update(plaintext, 'utf8'), cipher.final()]);
  const authTag = cipher.getAuthTag();

  // Combine: iv + authTag + ciphertext
  return Buffer.concat([iv, authTag, encrypted]).toString('base64url');
}

/**
 * Encrypt a plaintext string with a random nonce
 * Returns format: base64url(iv + authTag + ciphertext)
 */
export function encrypt(key: Buffer, plaintext: string): string {
  return seal(key, randomBytes(IV_LENGTH), plaintext);
}

/**
 * Key for the nonce HMAC, kept apart from the encryption key
 */
export function nonceKey(key: Buffer): Buffer {
  return hmacSha256(key, NONCE_KEY_LABEL);
}

/**
 * Encrypt so that equal plaintexts give equal ciphertexts.
 * The nonce is a keyed hash of the plaintext under `nonceKey(key)`.
 */
export function encryptDeterministic(key: Buffer, plaintext: string): string {
  return seal(key, hmacSha256(nonceKey(key), plaintext).subarray(0, IV_LENGTH), plaintext);
}

/**
 * Decrypt a value produced by `encrypt` or `encryptDeterministic`.
 * Throws when the value was altered or sealed with another key.
 */
export function decrypt(key: Buffer, encrypted: string): string {
  const combined = Buffer.from(encrypted, 'base64url');
  if (combined.length < IV_LENGTH + AUTH_TAG_LENGTH) {
    throw new Error('Ciphertext too short');
  }

  // Extract parts
  const iv = combined.subarray(0, IV_LENGTH);
  const authTag = combined.subarray(IV_LENGTH, IV_LENGTH + AUTH_TAG_LENGTH);
  const ciphertext = combined.subarray(IV_LENGTH + AUTH_TAG_LENGTH);

  const decipher = createDecipheriv(ALGORITHM, key, iv);
  decipher.setAuthTag(authTag);

  const decrypted = Buffer.concat([decipher.update(ciphertext), decipher.final()]);

  return decrypted.toString('utf8');
}
