import { randomBytes, randomUUID } from 'crypto';

export function generateId(): string {
  return randomUUID();
}

export function now(): number {
  return Date.now();
}

/**
 * URL-safe random key. `bytes` of entropy, base64url encoded.
 */
export function generateKey(bytes = 48): string {
  return randomBytes(bytes).toString('base64url');
}

