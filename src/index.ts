/**
 * @fileoverview warden-jwt
 * @module warden-jwt
 * @description JSON Web Token issuance, verification and scope authorization for Node.js services.
 *
 * The toolkit consists of these components:
 * - **Crypto Utilities**: base64url, HMAC signing, ids and secrets on native Node.js crypto
 * - **Tokens**: claims construction, signer, verifier pipeline and scope authorization
 * - **Stores**: revocation repositories (Memory, Redis, PostgreSQL)
 * - **Serializer**: resource <-> claims conversion
 * - **Server**: the `Warden` facade bound to a configuration snapshot
 * - **Middleware**: Express.js authentication and authorization
 *
 * @example
 * ```typescript
 * import { Warden, InMemoryRevocationRepo } from 'warden-jwt';
 *
 * const warden = new Warden({ secret: process.env.WARDEN_SECRET, blacklist: new InMemoryRevocationRepo() });
 * const compact = warden.sign(warden.token({ sub: 1, scopes: ['post/read'] }));
 * ```
 *
 * @packageDocumentation
 */

// ============================================================================
// TYPES & CONSTANTS
// ============================================================================

export * from './types';
export * from './middleware/constants';

// ============================================================================
// CRYPTO UTILITIES
// ============================================================================

export {
  // Signing & verification
  sign,
  verify,

  // Ids and secrets
  generateTokenId,
  generateSecret,

  // Base64URL encoding/decoding
  base64urlEncode,
  base64urlDecode,
  encodeJSON,
  decodeJSON,

  // Constants
  ALGORITHM_CONFIG,
  RECOMMENDED_SECRET_LENGTH,
  MIN_GENERATED_SECRET_LENGTH,
  DEFAULT_GENERATED_SECRET_LENGTH,
} from './crypto';

// ============================================================================
// TOKENS
// ============================================================================

export {
  // Time
  systemClock,
  fixedClock,

  // Claims
  DEFAULT_TTL,
  createToken,
  tokenToClaims,
  tokenFromClaims,
  decodeToken,

  // Signing & verification
  Signer,
  Verifier,
  verifyToken,
  assertKeyConfig,

  // Authorization
  authorize,
  actionForMethod,
  requiredScopes,
  hasScope,
} from './tokens';

export type { SignerOptions, VerifierOptions, RevocationStage } from './tokens';

// ============================================================================
// REVOCATION STORES
// ============================================================================

export {
  repoExists,
  repoInsert,
  repoDelete,
  isRevocationRepo,
  InMemoryRevocationRepo,
  RedisRevocationRepo,
  PostgresRevocationRepo,
} from './stores';

export type {
  RedisClient,
  RedisRevocationRepoOptions,
  PgPool,
  PostgresRevocationRepoOptions,
} from './stores';

// ============================================================================
// SERIALIZER, CONFIGURATION, LOGGING
// ============================================================================

export { BasicSerializer } from './serializer';
export type { BasicResource } from './serializer';

export { resolveConfig, wardenOptionsSchema } from './config';
export type { WardenOptions, ResolvedConfig } from './config';

export { createConsoleLogger, silentLogger } from './logging';

// ============================================================================
// SERVER SDK
// ============================================================================

export { Warden } from './server';
export type { SignOptions, VerifyOptions, ResourceResult } from './server';

// ============================================================================
// EXPRESS MIDDLEWARE
// ============================================================================

export {
  wardenAuthentication,
  wardenAuthorization,
  extractBearerToken,
  currentToken,
  currentUser,
  currentScopes,
  currentScope,
} from './middleware';

export type {
  WardenRequestContext,
  WardenErrorHandler,
  AuthenticationOptions,
  AuthorizationOptions,
} from './middleware';

// ============================================================================
// VERSION
// ============================================================================

/**
 * @constant VERSION
 * @description Current version of warden-jwt
 */
export const VERSION = '1.0.0';
