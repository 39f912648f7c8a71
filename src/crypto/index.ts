/**
 * warden-jwt - Crypto Utilities
 * Native Node.js crypto implementation of the compact HMAC primitives
 */

import * as crypto from 'crypto';
import type { WardenAlgorithm } from '../types';
import {
  ALGORITHM_CONFIG,
  DEFAULT_GENERATED_SECRET_LENGTH,
  MIN_GENERATED_SECRET_LENGTH,
} from './AlgorithmConfig';

export * from './AlgorithmConfig';

// ============================================================================
// BASE64URL UTILITIES
// ============================================================================

/**
 * Encode buffer to base64url
 */
export function base64urlEncode(data: Buffer | string): string {
  const buffer = typeof data === 'string' ? Buffer.from(data, 'utf8') : data;
  return buffer
    .toString('base64')
    .replace(/\+/g, '-')
    .replace(/\//g, '_')
    .replace(/=/g, '');
}

/**
 * Decode base64url to buffer.
 *
 * Throws on characters outside the base64url alphabet; Node's own decoder
 * would silently skip them.
 */
export function base64urlDecode(str: string): Buffer {
  if (!/^[A-Za-z0-9_-]*$/.test(str)) {
    throw new Error('Invalid base64url input');
  }
  // Add padding if needed
  let padded = str.replace(/-/g, '+').replace(/_/g, '/');
  const padding = padded.length % 4;
  if (padding === 2) {
    padded += '==';
  } else if (padding === 3) {
    padded += '=';
  } else if (padding === 1) {
    throw new Error('Invalid base64url length');
  }
  return Buffer.from(padded, 'base64');
}

/**
 * Encode object to base64url JSON
 */
export function encodeJSON(obj: unknown): string {
  return base64urlEncode(JSON.stringify(obj));
}

/**
 * Decode base64url JSON. The result is left as `unknown` for the caller to
 * validate.
 */
export function decodeJSON(str: string): unknown {
  return JSON.parse(base64urlDecode(str).toString('utf8'));
}

// ============================================================================
// SIGNING
// ============================================================================

function toKeyBuffer(secret: string | Buffer): Buffer {
  return typeof secret === 'string' ? Buffer.from(secret, 'utf8') : secret;
}

/**
 * Compute the HMAC of `data` with the given secret and algorithm.
 */
export function sign(
  data: string | Buffer,
  secret: string | Buffer,
  algorithm: WardenAlgorithm
): Buffer {
  const config = ALGORITHM_CONFIG[algorithm];
  return crypto.createHmac(config.hash, toKeyBuffer(secret)).update(data).digest();
}

/**
 * Check an HMAC signature in constant time.
 */
export function verify(
  data: string | Buffer,
  signature: Buffer,
  secret: string | Buffer,
  algorithm: WardenAlgorithm
): boolean {
  const expected = sign(data, secret, algorithm);
  if (signature.length !== expected.length) {
    return false;
  }
  return crypto.timingSafeEqual(signature, expected);
}

// ============================================================================
// RANDOM GENERATION
// ============================================================================

/**
 * Generate a token id (`jti`): a random UUID v4.
 */
export function generateTokenId(): string {
  return crypto.randomUUID();
}

/**
 * Generate a signing secret of exactly `length` base64url characters.
 *
 * @throws {RangeError} when `length` is not an integer of at least 32
 */
export function generateSecret(length: number = DEFAULT_GENERATED_SECRET_LENGTH): string {
  if (!Number.isInteger(length) || length < MIN_GENERATED_SECRET_LENGTH) {
    throw new RangeError(
      `The secret should be at least ${MIN_GENERATED_SECRET_LENGTH} characters long`
    );
  }
  return base64urlEncode(crypto.randomBytes(length)).slice(0, length);
}
