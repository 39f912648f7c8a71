/**
 * warden-jwt - Verifier
 *
 * Runs a compact token through an ordered, short-circuiting pipeline:
 *
 * 1. signature, pinned to the configured algorithm (`bad_token`)
 * 2. not-before (`not_ready`)
 * 3. expiry (`expired`)
 * 4. blacklist by `jti` (`jti_unverified` / `blacklisted` / `blacklist_error`)
 * 5. banlist by `sub` (`sub_unverified` / `banned` / `banlist_error`)
 * 6. any extra revocation stages, in the order given
 *
 * Revocation stages only run when their repository is configured; `false`
 * disables a stage without touching the store. A store fault fails closed.
 */

import { base64urlDecode, base64urlEncode, verify } from '../crypto';
import { silentLogger } from '../logging';
import {
  Clock,
  RepoRef,
  RevocationRepo,
  Token,
  VerificationFailureReason,
  VerificationResult,
  WardenAlgorithm,
  WardenError,
  WardenLogger,
  WARDEN_ERRORS,
} from '../types';
import { systemClock } from './clock';
import { assertKeyConfig } from './signer';
import { decodeToken, tokenFromClaims } from './token';

export interface VerifierOptions {
  /** Shared HMAC secret the token was signed with. */
  secret: string | Buffer;
  /** The only algorithm accepted (default: HS256). */
  alg?: WardenAlgorithm;
  /** Current time (UNIX seconds). Takes precedence over `clock`. */
  time?: number;
  /** Time source used when `time` is not given (default: system clock). */
  clock?: Clock;
  /** Repository keyed by `jti`, or `false` to skip the check. */
  blacklist?: RepoRef;
  /** Repository keyed by `sub`, or `false` to skip the check. */
  banlist?: RepoRef;
  /** Extra keyed checks run after the banlist. */
  stages?: readonly RevocationStage[];
  logger?: WardenLogger;
}

/**
 * A keyed revocation check. Blacklist and banlist are two instances.
 *
 * @example
 * ```typescript
 * const issuers: RevocationStage = {
 *   name: 'issuers',
 *   repo: revokedIssuers,
 *   key: (token) => token.iss,
 *   unverified: 'bad_token',
 *   revoked: 'blacklisted',
 *   failed: 'blacklist_error',
 * };
 * new Verifier({ secret, stages: [issuers] });
 * ```
 */
export interface RevocationStage {
  /** Used in log context. */
  name: string;
  repo: RevocationRepo;
  /** Key looked up in `repo`; `undefined` fails with `unverified`. */
  key: (token: Token) => string | undefined;
  unverified: VerificationFailureReason;
  revoked: VerificationFailureReason;
  failed: VerificationFailureReason;
}

function buildStages(blacklist: RepoRef, banlist: RepoRef): RevocationStage[] {
  const stages: RevocationStage[] = [];
  if (blacklist !== false) {
    stages.push({
      name: 'blacklist',
      repo: blacklist,
      key: (token) => token.jti,
      unverified: WARDEN_ERRORS.JTI_UNVERIFIED,
      revoked: WARDEN_ERRORS.BLACKLISTED,
      failed: WARDEN_ERRORS.BLACKLIST_ERROR,
    });
  }
  if (banlist !== false) {
    stages.push({
      name: 'banlist',
      repo: banlist,
      key: (token) => (token.sub === undefined ? undefined : String(token.sub)),
      unverified: WARDEN_ERRORS.SUB_UNVERIFIED,
      revoked: WARDEN_ERRORS.BANNED,
      failed: WARDEN_ERRORS.BANLIST_ERROR,
    });
  }
  return stages;
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Verification pipeline bound to one configuration.
 *
 * Configuration errors are thrown by the constructor; `run` never throws
 * and reports failures through the returned {@link VerificationResult}.
 */
export class Verifier {
  public readonly alg: WardenAlgorithm;
  private readonly secret: Buffer;
  private readonly time?: number;
  private readonly clock: Clock;
  private readonly stages: RevocationStage[];
  private readonly logger: WardenLogger;

  constructor(options: VerifierOptions) {
    const alg = options.alg ?? WardenAlgorithm.HS256;
    this.secret = assertKeyConfig(options.secret, alg);
    this.alg = alg;
    this.time = options.time;
    this.clock = options.clock ?? systemClock;
    this.stages = [
      ...buildStages(options.blacklist ?? false, options.banlist ?? false),
      ...(options.stages ?? []),
    ];
    this.logger = options.logger ?? silentLogger;
  }

  /**
   * Verify a compact token.
   */
  async run(compact: string): Promise<VerificationResult> {
    const token = this.checkToken(compact);
    if (!token) {
      return this.fail(WARDEN_ERRORS.BAD_TOKEN);
    }

    const time = this.time ?? this.clock.now();

    if (token.nbf !== undefined && !(time > token.nbf)) {
      return this.fail(WARDEN_ERRORS.NOT_READY, { nbf: token.nbf, time });
    }

    if (token.exp !== undefined && !(time < token.exp)) {
      return this.fail(WARDEN_ERRORS.EXPIRED, { exp: token.exp, time });
    }

    for (const stage of this.stages) {
      const failure = await this.checkRevocation(stage, token);
      if (failure) {
        return failure;
      }
    }

    return { valid: true, token };
  }

  /**
   * Decode and authenticate the compact string. Returns `null` for anything
   * that is not a token signed with our secret under our algorithm.
   */
  private checkToken(compact: string): Token | null {
    try {
      const decoded = decodeToken(compact);
      if (decoded.header.alg !== this.alg) {
        this.logger.debug('Token algorithm does not match', {
          expected: this.alg,
          actual: decoded.header.alg,
        });
        return null;
      }

      // Non-canonical encodings decode to the same bytes; reject them so
      // any change to the signature segment is detected.
      const signature = base64urlDecode(decoded.signature);
      if (base64urlEncode(signature) !== decoded.signature) {
        return null;
      }

      const [headerSegment, payloadSegment] = compact.split('.');
      if (!verify(`${headerSegment}.${payloadSegment}`, signature, this.secret, this.alg)) {
        return null;
      }

      return tokenFromClaims(decoded.claims);
    } catch (error) {
      this.logger.debug('Token could not be decoded', { error: describeError(error) });
      return null;
    }
  }

  private async checkRevocation(
    stage: RevocationStage,
    token: Token
  ): Promise<VerificationResult | null> {
    const key = stage.key(token);
    if (key === undefined) {
      return this.fail(stage.unverified);
    }

    let present: unknown;
    try {
      present = await stage.repo.exists(key);
    } catch (error) {
      this.logger.warn(`${stage.name} lookup failed`, { key, error: describeError(error) });
      return this.fail(stage.failed, undefined, error);
    }

    if (typeof present !== 'boolean') {
      this.logger.warn(`${stage.name} lookup returned a non-boolean`, { key });
      return this.fail(stage.failed);
    }

    return present ? this.fail(stage.revoked, { key }) : null;
  }

  private fail(
    reason: VerificationFailureReason,
    context?: Record<string, unknown>,
    cause?: unknown
  ): VerificationResult {
    this.logger.debug(`Token rejected: ${reason}`, context);
    return {
      valid: false,
      reason,
      error: new WardenError(reason, undefined, cause === undefined ? undefined : { cause }),
    };
  }
}

/**
 * Verify a compact token with a one-off {@link Verifier}.
 *
 * @throws {WardenError} on an invalid secret or algorithm
 */
export function verifyToken(compact: string, options: VerifierOptions): Promise<VerificationResult> {
  return new Verifier(options).run(compact);
}
