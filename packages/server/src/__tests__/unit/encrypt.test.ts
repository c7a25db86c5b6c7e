import { describe, it, expect } from 'vitest';
import { decrypt, deriveKey, encrypt, encryptDeterministic, nonceKey } from '../../crypto/encrypt.js';
import { hmacSha256 } from '../../crypto/hash.js';

const key = deriveKey('test-secret');

describe('symmetric encryption', () => {
  it('should decrypt what it encrypted', () => {
    expect(decrypt(key, encrypt(key, 'alice;;rp;;g1'))).toBe('alice;;rp;;g1');
    expect(decrypt(key, encryptDeterministic(key, 'alice;;rp;;g1'))).toBe('alice;;rp;;g1');
  });

  it('should give equal ciphertexts for equal plaintexts only when deterministic', () => {
    expect(encryptDeterministic(key, 'alice')).toBe(encryptDeterministic(key, 'alice'));
    expect(encryptDeterministic(key, 'alice')).not.toBe(encryptDeterministic(key, 'bob'));
    expect(encrypt(key, 'alice')).not.toBe(encrypt(key, 'alice'));
  });

  it('should derive the nonce with a key of its own', () => {
    const iv = Buffer.from(encryptDeterministic(key, 'alice'), 'base64url').subarray(0, 12);

    expect(nonceKey(key).equals(key)).toBe(false);
    expect(iv.equals(hmacSha256(nonceKey(key), 'alice').subarray(0, 12))).toBe(true);
    expect(iv.equals(hmacSha256(key, 'alice').subarray(0, 12))).toBe(false);
  });

  it('should refuse a value sealed with another key', () => {
    const value = encryptDeterministic(deriveKey('other-secret'), 'alice');

    expect(() => decrypt(key, value)).toThrow();
  });
});
