/**
 * warden-jwt - Token Claims
 * Build tokens, convert them to and from flat claim maps, decode compact strings
 */

import { z } from 'zod';
import { decodeJSON, generateTokenId } from '../crypto';
import {
  ClaimMap,
  Clock,
  DecodedToken,
  INFINITE_TTL,
  JtiStrategy,
  Subject,
  Token,
  TokenClaims,
  TokenDefaults,
  TokenOptions,
  Ttl,
  WardenError,
  WARDEN_ERRORS,
} from '../types';
import { systemClock } from './clock';

/**
 * Lifetime applied when neither the call nor the configuration sets one.
 */
export const DEFAULT_TTL = 3600;

/**
 * Registered claims as they must appear in a verified payload. Keys that
 * are not listed are dropped.
 */
const claimMapSchema = z.object({
  sub: z.union([z.string(), z.number().int()]).optional(),
  iss: z.string().optional(),
  aud: z.string().optional(),
  iat: z.number().int().optional(),
  nbf: z.number().int().optional(),
  exp: z.number().int().optional(),
  jti: z.string().optional(),
  scopes: z.array(z.string()).optional(),
  meta: z.record(z.unknown()).optional(),
});

type ParsedClaims = z.infer<typeof claimMapSchema>;

// ============================================================================
// TOKEN CONSTRUCTION
// ============================================================================

function resolveJti(strategy: JtiStrategy): string | undefined {
  if (strategy === false) return undefined;
  if (typeof strategy === 'function') return strategy();
  return strategy;
}

function resolveExp(time: number, ttl: Ttl): number | undefined {
  if (ttl === INFINITE_TTL) return undefined;
  if (!Number.isInteger(ttl)) {
    throw new WardenError(WARDEN_ERRORS.INVALID_CONFIG, `Invalid ttl: ${ttl} is not a whole number of seconds`);
  }
  return time + ttl;
}

function resolveSub(sub: Subject | undefined): Subject | undefined {
  if (typeof sub === 'number' && !Number.isInteger(sub)) {
    throw new WardenError(WARDEN_ERRORS.INVALID_CONFIG, `Invalid sub: ${sub} is not an integer`);
  }
  return sub;
}

type MutableToken = { -readonly [K in keyof Token]: Token[K] };

function freezeToken(fields: ParsedClaims): Token {
  const token: MutableToken = {
    scopes: Object.freeze([...(fields.scopes ?? [])]),
    meta: Object.freeze({ ...(fields.meta ?? {}) }),
  };
  if (fields.sub !== undefined) token.sub = fields.sub;
  if (fields.iss !== undefined) token.iss = fields.iss;
  if (fields.aud !== undefined) token.aud = fields.aud;
  if (fields.iat !== undefined) token.iat = fields.iat;
  if (fields.nbf !== undefined) token.nbf = fields.nbf;
  if (fields.exp !== undefined) token.exp = fields.exp;
  if (fields.jti !== undefined) token.jti = fields.jti;
  return Object.freeze(token);
}

/**
 * Build a new token.
 *
 * Explicit claims win over `defaults`. `iat` is the base time floored to
 * whole seconds, `nbf` one second earlier, and `exp` is `time + ttl` unless
 * the TTL is infinite.
 *
 * @example
 * ```typescript
 * const token = createToken({ sub: 1, scopes: ['admin/read'] }, { time: 0, ttl: 60 });
 * // { sub: 1, iat: 0, nbf: -1, exp: 60, jti: '…', scopes: ['admin/read'], meta: {} }
 * ```
 *
 * @throws {WardenError} `invalid_config` for a fractional TTL or numeric subject
 */
export function createToken(
  claims: TokenClaims = {},
  options: TokenOptions = {},
  defaults: TokenDefaults = {},
  clock: Clock = systemClock
): Token {
  const time = Math.floor(options.time ?? clock.now());
  const ttl = options.ttl ?? defaults.ttl ?? DEFAULT_TTL;
  const jti = claims.jti !== undefined ? claims.jti : defaults.jti ?? generateTokenId;

  return freezeToken({
    sub: resolveSub(claims.sub ?? defaults.sub),
    iss: claims.iss ?? defaults.iss,
    aud: claims.aud ?? defaults.aud,
    iat: time,
    nbf: time - 1,
    exp: resolveExp(time, ttl),
    jti: resolveJti(jti),
    scopes: [...(claims.scopes ?? defaults.scopes ?? [])],
    meta: claims.meta,
  });
}

// ============================================================================
// CLAIM MAP CONVERSION
// ============================================================================

/**
 * Flatten a token into the claim map that gets signed. Absent fields are
 * omitted, never emitted as `null`.
 */
export function tokenToClaims(token: Token): ClaimMap {
  const claims: ClaimMap = {};
  if (token.sub !== undefined) claims.sub = token.sub;
  if (token.iss !== undefined) claims.iss = token.iss;
  if (token.aud !== undefined) claims.aud = token.aud;
  if (token.iat !== undefined) claims.iat = token.iat;
  if (token.nbf !== undefined) claims.nbf = token.nbf;
  if (token.exp !== undefined) claims.exp = token.exp;
  if (token.jti !== undefined) claims.jti = token.jti;
  claims.scopes = [...token.scopes];
  claims.meta = { ...token.meta };
  return claims;
}

/**
 * Re-hydrate a token from a claim map.
 *
 * Unknown keys are ignored. A registered claim of the wrong type makes the
 * map unusable.
 *
 * @throws {WardenError} `bad_token` when the map does not describe a token
 */
export function tokenFromClaims(claims: unknown): Token {
  const parsed = claimMapSchema.safeParse(claims);
  if (!parsed.success) {
    throw new WardenError(WARDEN_ERRORS.BAD_TOKEN, 'Token claims are malformed', {
      cause: parsed.error,
    });
  }
  return freezeToken(parsed.data);
}

// ============================================================================
// DECODING
// ============================================================================

function isClaimMap(value: unknown): value is ClaimMap {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Decode a compact token without verifying it.
 * Useful for inspecting token contents.
 *
 * @throws {WardenError} `bad_token` when the string is not a decodable JWS
 */
export function decodeToken(compact: string): DecodedToken {
  const parts = compact.split('.');
  if (parts.length !== 3) {
    throw new WardenError(WARDEN_ERRORS.BAD_TOKEN, 'Token must have 3 parts');
  }

  let header: unknown;
  let claims: unknown;
  try {
    header = decodeJSON(parts[0]);
    claims = decodeJSON(parts[1]);
  } catch (error) {
    throw new WardenError(WARDEN_ERRORS.BAD_TOKEN, 'Failed to decode token', { cause: error });
  }

  if (!isClaimMap(header) || !isClaimMap(claims)) {
    throw new WardenError(WARDEN_ERRORS.BAD_TOKEN, 'Token header and payload must be JSON objects');
  }

  return { header, claims, signature: parts[2] };
}
