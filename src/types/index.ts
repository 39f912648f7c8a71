/**
 * warden-jwt - Core Types
 *
 * This module defines the TypeScript types, constants and error helpers used
 * throughout warden-jwt. The types in this file are the canonical source of
 * truth for:
 *
 * - Supported HMAC algorithms
 * - The token (claims) structure and its construction options
 * - The verification failure vocabulary and the `WardenError` type
 * - Revocation repository, serializer and clock contracts
 * - Result types for verification and authorization
 */

// ============================================================================
// ALGORITHMS
// ============================================================================

/**
 * Supported symmetric signing algorithms.
 *
 * @enum {string}
 * @property {string} HS256 - HMAC using SHA-256
 * @property {string} HS384 - HMAC using SHA-384
 * @property {string} HS512 - HMAC using SHA-512
 */
export enum WardenAlgorithm {
  HS256 = 'HS256',
  HS384 = 'HS384',
  HS512 = 'HS512',
}

/**
 * All supported algorithm identifiers, in order of increasing digest size.
 */
export const WARDEN_ALGORITHMS: readonly WardenAlgorithm[] = [
  WardenAlgorithm.HS256,
  WardenAlgorithm.HS384,
  WardenAlgorithm.HS512,
];

/**
 * Type guard for algorithm identifiers coming from untyped input
 * (environment variables, CLI flags, decoded headers).
 */
export function isWardenAlgorithm(value: unknown): value is WardenAlgorithm {
  return typeof value === 'string' && (WARDEN_ALGORITHMS as readonly string[]).includes(value);
}

// ============================================================================
// TOKEN TYPES
// ============================================================================

/**
 * Sentinel TTL meaning "never expires". Tokens built with it carry no `exp`.
 */
export const INFINITE_TTL = 'infinity' as const;

/**
 * Token lifetime in seconds, or {@link INFINITE_TTL}.
 *
 * Negative values are accepted and produce tokens that are already expired.
 */
export type Ttl = number | typeof INFINITE_TTL;

/**
 * Principal identifier carried in the `sub` claim.
 */
export type Subject = string | number;

/**
 * Compact JOSE header emitted for every signed token.
 */
export interface WardenHeader {
  alg: WardenAlgorithm;
  typ: 'JWT';
}

/**
 * A built token: the structured claim set that gets signed.
 *
 * Tokens are immutable once built. Every optional field that is absent
 * before signing stays absent after verification.
 */
export interface Token {
  /** Principal the token represents. */
  readonly sub?: Subject;
  /** Issuer. */
  readonly iss?: string;
  /** Intended audience. */
  readonly aud?: string;
  /** Issued-at time as a UNIX timestamp (seconds). */
  readonly iat?: number;
  /** Not-before time as a UNIX timestamp (seconds). */
  readonly nbf?: number;
  /** Expiration time as a UNIX timestamp (seconds). Absent means no expiry. */
  readonly exp?: number;
  /** Unique token id, used as the blacklist key. Absent means not revocable. */
  readonly jti?: string;
  /** Granted `"<resource>/<action>"` scopes. Order carries no meaning. */
  readonly scopes: readonly string[];
  /** Application-defined data, opaque to warden-jwt. */
  readonly meta: Readonly<Record<string, unknown>>;
}

/**
 * Strategy for the `jti` claim.
 *
 * - a string is used as is
 * - a function is invoked once per token
 * - `false` leaves the token without a `jti`
 */
export type JtiStrategy = string | (() => string) | false;

/**
 * Caller supplied claims for {@link Token} construction. Any field left
 * `undefined` falls back to the configured default.
 */
export interface TokenClaims {
  sub?: Subject;
  iss?: string;
  aud?: string;
  jti?: JtiStrategy;
  scopes?: readonly string[];
  meta?: Record<string, unknown>;
}

/**
 * Options controlling the time claims of a new token.
 */
export interface TokenOptions {
  /** Base time (UNIX seconds). Defaults to the clock's current time. */
  time?: number;
  /** Lifetime in seconds, or {@link INFINITE_TTL}. */
  ttl?: Ttl;
}

/**
 * Defaults merged under explicit {@link TokenClaims}.
 */
export interface TokenDefaults {
  sub?: Subject;
  iss?: string;
  aud?: string;
  scopes?: readonly string[];
  jti?: JtiStrategy;
  ttl?: Ttl;
}

/**
 * Flat, string keyed claim map as it appears in the token payload.
 */
export type ClaimMap = Record<string, unknown>;

/**
 * Decoded token (without verification)
 */
export interface DecodedToken {
  header: Record<string, unknown>;
  claims: ClaimMap;
  signature: string;
}

// ============================================================================
// CLOCK
// ============================================================================

/**
 * Source of the current time, in whole UNIX seconds.
 */
export interface Clock {
  now(): number;
}

// ============================================================================
// ERROR TYPES
// ============================================================================

/**
 * Verification failure reasons. This is the complete vocabulary the
 * verifier emits.
 */
export type VerificationFailureReason =
  | 'bad_token'
  | 'not_ready'
  | 'expired'
  | 'blacklisted'
  | 'blacklist_error'
  | 'jti_unverified'
  | 'banned'
  | 'banlist_error'
  | 'sub_unverified';

/**
 * Every error code raised by warden-jwt components.
 */
export type WardenErrorCode =
  | VerificationFailureReason
  | 'invalid_secret'
  | 'unsupported_algorithm'
  | 'invalid_config'
  | 'no_serializer'
  | 'repo_disabled'
  | 'unauthorized'
  | 'forbidden';

/**
 * Constant helpers for error codes.
 *
 * Prefer referencing these constants instead of hard-coded string literals.
 */
export const WARDEN_ERRORS = {
  // Verification
  BAD_TOKEN: 'bad_token',
  NOT_READY: 'not_ready',
  EXPIRED: 'expired',
  BLACKLISTED: 'blacklisted',
  BLACKLIST_ERROR: 'blacklist_error',
  JTI_UNVERIFIED: 'jti_unverified',
  BANNED: 'banned',
  BANLIST_ERROR: 'banlist_error',
  SUB_UNVERIFIED: 'sub_unverified',
  // Configuration
  INVALID_SECRET: 'invalid_secret',
  UNSUPPORTED_ALGORITHM: 'unsupported_algorithm',
  INVALID_CONFIG: 'invalid_config',
  NO_SERIALIZER: 'no_serializer',
  REPO_DISABLED: 'repo_disabled',
  // Request gating
  UNAUTHORIZED: 'unauthorized',
  FORBIDDEN: 'forbidden',
} as const;

/**
 * Default human readable messages per error code.
 */
export const WARDEN_ERROR_MESSAGES: Record<WardenErrorCode, string> = {
  bad_token: 'Token is malformed or its signature is invalid',
  not_ready: 'Token is not valid yet',
  expired: 'Token has expired',
  blacklisted: 'Token has been revoked',
  blacklist_error: 'Blacklist could not be checked',
  jti_unverified: 'Token has no jti to check against the blacklist',
  banned: 'Subject has been banned',
  banlist_error: 'Banlist could not be checked',
  sub_unverified: 'Token has no sub to check against the banlist',
  invalid_secret: 'Secret cannot be empty',
  unsupported_algorithm: 'Algorithm not implemented',
  invalid_config: 'Invalid configuration',
  no_serializer: 'No serializer configured',
  repo_disabled: 'Revocation repository is disabled',
  unauthorized: 'Not Authorized',
  forbidden: 'Forbidden',
};

/**
 * Maps error codes to HTTP status codes.
 */
export const WARDEN_ERROR_STATUS: Record<WardenErrorCode, number> = {
  bad_token: 401,
  not_ready: 401,
  expired: 401,
  blacklisted: 401,
  blacklist_error: 401,
  jti_unverified: 401,
  banned: 401,
  banlist_error: 401,
  sub_unverified: 401,
  invalid_secret: 500,
  unsupported_algorithm: 500,
  invalid_config: 500,
  no_serializer: 500,
  repo_disabled: 500,
  unauthorized: 401,
  forbidden: 403,
};

/**
 * Structured warden-jwt error.
 *
 * Carries a stable machine-readable code plus the HTTP status derived from
 * it. Configuration problems are thrown as `WardenError`; verification
 * failures are returned inside a {@link VerificationResult} instead.
 */
export class WardenError extends Error {
  public readonly code: WardenErrorCode;
  public readonly httpStatus: number;
  public readonly timestamp: number;

  constructor(code: WardenErrorCode, message?: string, options?: { cause?: unknown }) {
    super(message || WARDEN_ERROR_MESSAGES[code], options);
    this.name = 'WardenError';
    this.code = code;
    this.httpStatus = WARDEN_ERROR_STATUS[code];
    this.timestamp = Math.floor(Date.now() / 1000);
  }

  toJSON() {
    return {
      error: this.code,
      message: this.message,
      timestamp: this.timestamp,
    };
  }
}

// ============================================================================
// RESULT TYPES
// ============================================================================

/**
 * Outcome of running a compact token through the verifier.
 */
export type VerificationResult =
  | { valid: true; token: Token }
  | { valid: false; reason: VerificationFailureReason; error: WardenError };

/**
 * Actions a request method maps to.
 */
export type ScopeAction = 'read' | 'write' | 'delete';

/**
 * Reasons the authorization engine denies a request.
 */
export type AuthorizationDenialReason = 'unsupported_method' | 'missing_scope';

/**
 * Outcome of the authorization decision engine.
 *
 * On success `scope` is the token scope that satisfied the check.
 */
export type AuthorizationResult =
  | { allowed: true; scope: string; action: ScopeAction }
  | { allowed: false; reason: AuthorizationDenialReason; required: string[] };

// ============================================================================
// PLUGGABLE CAPABILITIES
// ============================================================================

/**
 * A value or a promise of it. Repositories and serializers may be backed by
 * synchronous memory or by remote I/O.
 */
export type MaybePromise<T> = T | Promise<T>;

/**
 * Key existence store backing a blacklist (keyed by `jti`) or a banlist
 * (keyed by `sub`).
 *
 * Failures are signalled by throwing or rejecting. Implementations own
 * their own synchronization.
 */
export interface RevocationRepo {
  exists(key: string): MaybePromise<boolean>;
  insert(key: string): MaybePromise<void>;
  delete(key: string): MaybePromise<void>;
}

/**
 * A configured repository, or `false` when the check is disabled.
 */
export type RepoRef = RevocationRepo | false;

/**
 * Converts application resources (for example a user record) to claims
 * and back.
 */
export interface Serializer<R> {
  forToken(resource: R): MaybePromise<TokenClaims>;
  fromToken(token: Token): MaybePromise<R>;
}

/**
 * Leveled logger used by warden-jwt components.
 */
export interface WardenLogger {
  debug(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  error(message: string, context?: Record<string, unknown>): void;
}
