// ============================================================================
// CRYPTOGRAPHIC CONSTANTS
// ============================================================================

import { WardenAlgorithm } from '../types';

/**
 * @enum HashAlgorithm
 * @description Hash functions backing the HMAC algorithms.
 */
export enum HashAlgorithm {
  SHA256 = 'sha256',
  SHA384 = 'sha384',
  SHA512 = 'sha512',
}

/**
 * @constant RECOMMENDED_SECRET_LENGTH
 * @description Secrets shorter than this many bytes are accepted but logged.
 */
export const RECOMMENDED_SECRET_LENGTH = 32;

/**
 * @constant MIN_GENERATED_SECRET_LENGTH
 * @description Smallest secret length `generateSecret` will produce.
 */
export const MIN_GENERATED_SECRET_LENGTH = 32;

/**
 * @constant DEFAULT_GENERATED_SECRET_LENGTH
 * @description Default length of generated secrets, in characters.
 */
export const DEFAULT_GENERATED_SECRET_LENGTH = 64;

// ============================================================================
// ALGORITHM CONFIGURATION
// ============================================================================

/**
 * @interface AlgorithmConfig
 * @description Configuration for an HMAC algorithm.
 */
export interface AlgorithmConfig {
  hash: HashAlgorithm;
}

/**
 * @constant ALGORITHM_CONFIG
 * @description Hash parameters per supported algorithm.
 */
export const ALGORITHM_CONFIG: Readonly<Record<WardenAlgorithm, AlgorithmConfig>> = {
  [WardenAlgorithm.HS256]: { hash: HashAlgorithm.SHA256 },
  [WardenAlgorithm.HS384]: { hash: HashAlgorithm.SHA384 },
  [WardenAlgorithm.HS512]: { hash: HashAlgorithm.SHA512 },
} as const;
