/**
 * warden-jwt CLI - argument parsing and formatting helpers
 */

import { InvalidArgumentError } from 'commander';
import { MIN_GENERATED_SECRET_LENGTH } from '../crypto';
import {
  ClaimMap,
  INFINITE_TTL,
  isWardenAlgorithm,
  Ttl,
  WardenAlgorithm,
  WardenError,
  WARDEN_ERRORS,
} from '../types';

// ============================================================================
// ARGUMENT PARSERS
// ============================================================================

/**
 * Parse `--ttl <n|infinity>`.
 */
export function parseTtl(value: string): Ttl {
  if (value === INFINITE_TTL) return INFINITE_TTL;
  if (!/^-?\d+$/.test(value)) {
    throw new InvalidArgumentError('TTL must be a whole number of seconds or "infinity".');
  }
  return Number(value);
}

/**
 * Parse `--scopes a,b` into a list, dropping empty entries.
 */
export function parseScopes(value: string): string[] {
  return value
    .split(',')
    .map((scope) => scope.trim())
    .filter((scope) => scope.length > 0);
}

/**
 * Parse `--alg <alg>`.
 */
export function parseAlgorithm(value: string): WardenAlgorithm {
  if (!isWardenAlgorithm(value)) {
    throw new InvalidArgumentError('Algorithm must be one of HS256, HS384, HS512.');
  }
  return value;
}

/**
 * Parse the `gen-secret` length argument.
 */
export function parseSecretLength(value: string): number {
  const length = Number(value);
  if (!Number.isInteger(length) || length < MIN_GENERATED_SECRET_LENGTH) {
    throw new InvalidArgumentError(
      `The secret should be at least ${MIN_GENERATED_SECRET_LENGTH} characters long.`
    );
  }
  return length;
}

/**
 * Secret from the `--secret` flag, falling back to `WARDEN_SECRET`.
 *
 * @throws {WardenError} `invalid_secret` when neither is set
 */
export function resolveSecret(flag: string | undefined, env: NodeJS.ProcessEnv = process.env): string {
  const secret = flag || env.WARDEN_SECRET;
  if (!secret) {
    throw new WardenError(WARDEN_ERRORS.INVALID_SECRET, 'Provide --secret or set WARDEN_SECRET');
  }
  return secret;
}

// ============================================================================
// FORMATTING
// ============================================================================

/**
 * Format timestamp to readable date
 */
export function formatTimestamp(timestamp: number): string {
  return new Date(timestamp * 1000).toISOString();
}

/**
 * Human readable distance between `now` and `target`, e.g. `5m 3s` or `2h ago`.
 */
export function formatRelative(target: number, now: number): string {
  const diff = target - now;

  if (diff < 0) {
    const absDiff = Math.abs(diff);
    if (absDiff < 60) return `${absDiff}s ago`;
    if (absDiff < 3600) return `${Math.floor(absDiff / 60)}m ago`;
    if (absDiff < 86400) return `${Math.floor(absDiff / 3600)}h ago`;
    return `${Math.floor(absDiff / 86400)}d ago`;
  }

  if (diff < 60) return `${diff}s`;
  if (diff < 3600) return `${Math.floor(diff / 60)}m ${diff % 60}s`;
  if (diff < 86400) return `${Math.floor(diff / 3600)}h ${Math.floor((diff % 3600) / 60)}m`;
  return `${Math.floor(diff / 86400)}d ${Math.floor((diff % 86400) / 3600)}h`;
}

export type TimeStatus = 'valid' | 'not_ready' | 'expired';

/**
 * Time window status of decoded claims, using the verifier's boundaries.
 */
export function timeStatus(claims: ClaimMap, now: number): TimeStatus {
  if (typeof claims.nbf === 'number' && !(now > claims.nbf)) return 'not_ready';
  if (typeof claims.exp === 'number' && !(now < claims.exp)) return 'expired';
  return 'valid';
}
