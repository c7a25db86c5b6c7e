import { randomBytes, randomUUID } from 'node:crypto';

/**
 * Generate cryptographically secure random bytes as hex string
 */
export function generateRandomHex(length: number): string {
  return randomBytes(length).toString('hex');
}

/**
 * Generate cryptographically secure random bytes as base64url string
 */
export function generateRandomBase64Url(length: number): string {
  return randomBytes(length).toString('base64url');
}

/**
 * Generate a unique JWT ID (jti)
 */
export function generateJti(): string {
  return generateRandomBase64Url(16);
}

/**
 * Generate a unique ID for grants and other records
 */
export function generateId(): string {
  return generateRandomHex(16);
}

/**
 * Generate a salt for subject identifiers and session state
 */
export function generateSalt(length: number = 8): string {
  return generateRandomHex(length);
}

/**
 * Generate a random version 4 UUID
 */
export function generateUuid(): string {
  return randomUUID();
}

/**
 * Generate a secure random client secret
 */
export function generateClientSecret(length: number = 32): string {
  return generateRandomBase64Url(length);
}
