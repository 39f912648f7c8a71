/**
 * warden-jwt - Configuration
 *
 * Resolves `WardenOptions` (with environment fallbacks) into a frozen
 * snapshot. A snapshot is never mutated; reconfiguring builds a new one.
 */

import { generateTokenId } from '../crypto';
import { createConsoleLogger } from '../logging';
import { systemClock } from '../tokens/clock';
import {
  Clock,
  JtiStrategy,
  RepoRef,
  Serializer,
  Subject,
  Ttl,
  WardenAlgorithm,
  WardenError,
  WardenErrorCode,
  WardenLogger,
  WARDEN_ERRORS,
} from '../types';
import { wardenOptionsSchema } from './schema';

export { wardenOptionsSchema } from './schema';

/**
 * Options accepted by `Warden` and `Warden.configure`.
 */
export interface WardenOptions<R = unknown> {
  /** HMAC secret. Falls back to `WARDEN_SECRET`. */
  secret?: string | Buffer;
  /** Falls back to `WARDEN_DEFAULT_ALG`, then HS256. */
  defaultAlg?: WardenAlgorithm;
  /** Seconds or `INFINITE_TTL`. Falls back to `WARDEN_DEFAULT_TTL`, then 3600. */
  defaultTtl?: Ttl;
  /** Falls back to `WARDEN_DEFAULT_ISS`. */
  defaultIss?: string;
  /** Falls back to `WARDEN_DEFAULT_AUD`. */
  defaultAud?: string;
  defaultSub?: Subject;
  defaultScopes?: readonly string[];
  /** Default jti strategy (random UUID v4 when omitted). */
  defaultJti?: JtiStrategy;
  /** Repository keyed by `jti`, `false` to disable. */
  blacklist?: RepoRef;
  /** Repository keyed by `sub`, `false` to disable. */
  banlist?: RepoRef;
  serializer?: Serializer<R>;
  clock?: Clock;
  logger?: WardenLogger;
}

/**
 * Immutable configuration snapshot.
 */
export interface ResolvedConfig<R = unknown> {
  readonly secret: string | Buffer;
  readonly defaultAlg: WardenAlgorithm;
  readonly defaultTtl: Ttl;
  readonly defaultIss?: string;
  readonly defaultAud?: string;
  readonly defaultSub?: Subject;
  readonly defaultScopes: readonly string[];
  readonly defaultJti: JtiStrategy;
  readonly blacklist: RepoRef;
  readonly banlist: RepoRef;
  readonly serializer?: Serializer<R>;
  readonly clock: Clock;
  readonly logger: WardenLogger;
}

// ============================================================================
// ENVIRONMENT
// ============================================================================

function ttlFromEnv(value: string | undefined): Ttl | string | undefined {
  if (value === undefined || value === '') return undefined;
  if (value === 'infinity') return 'infinity';
  return /^-?\d+$/.test(value) ? Number(value) : value;
}

function fromEnv(env: NodeJS.ProcessEnv): Record<string, unknown> {
  const values: Record<string, unknown> = {
    secret: env.WARDEN_SECRET || undefined,
    defaultAlg: env.WARDEN_DEFAULT_ALG || undefined,
    defaultTtl: ttlFromEnv(env.WARDEN_DEFAULT_TTL),
    defaultIss: env.WARDEN_DEFAULT_ISS || undefined,
    defaultAud: env.WARDEN_DEFAULT_AUD || undefined,
  };
  return Object.fromEntries(Object.entries(values).filter(([, value]) => value !== undefined));
}

function withoutUndefined(options: object): Record<string, unknown> {
  return Object.fromEntries(Object.entries(options).filter(([, value]) => value !== undefined));
}

// ============================================================================
// RESOLUTION
// ============================================================================

function errorCodeFor(field: string | number | undefined): WardenErrorCode {
  if (field === 'secret') return WARDEN_ERRORS.INVALID_SECRET;
  if (field === 'defaultAlg') return WARDEN_ERRORS.UNSUPPORTED_ALGORITHM;
  return WARDEN_ERRORS.INVALID_CONFIG;
}

/**
 * Validate options and build a frozen snapshot. Explicit options win over
 * the environment.
 *
 * @throws {WardenError} `invalid_secret`, `unsupported_algorithm` or `invalid_config`
 */
export function resolveConfig<R>(
  options: WardenOptions<R>,
  env: NodeJS.ProcessEnv = process.env
): ResolvedConfig<R> {
  const parsed = wardenOptionsSchema.safeParse({ ...fromEnv(env), ...withoutUndefined(options) });
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const field = issue.path[0];
    const label = field === undefined ? 'options' : String(field);
    throw new WardenError(errorCodeFor(field), `Invalid ${label}: ${issue.message}`, {
      cause: parsed.error,
    });
  }

  const data = parsed.data;
  const config: ResolvedConfig<R> = {
    secret: data.secret,
    defaultAlg: data.defaultAlg,
    defaultTtl: data.defaultTtl,
    defaultIss: data.defaultIss,
    defaultAud: data.defaultAud,
    defaultSub: data.defaultSub,
    defaultScopes: Object.freeze([...data.defaultScopes]),
    defaultJti: data.defaultJti ?? generateTokenId,
    blacklist: data.blacklist,
    banlist: data.banlist,
    serializer: options.serializer,
    clock: data.clock ?? systemClock,
    logger: data.logger ?? createConsoleLogger(env),
  };
  return Object.freeze(config);
}
