/**
 * warden-jwt - Facade
 * Binds a configuration snapshot to token issuance, verification,
 * serialization and revocation
 */

import { RECOMMENDED_SECRET_LENGTH } from '../crypto';
import { resolveConfig, ResolvedConfig, WardenOptions } from '../config';
import { repoDelete, repoExists, repoInsert } from '../stores/repo';
import { createToken } from '../tokens/token';
import { Signer } from '../tokens/signer';
import { RevocationStage, Verifier } from '../tokens/verifier';
import {
  RepoRef,
  Serializer,
  Subject,
  Token,
  TokenClaims,
  TokenOptions,
  VerificationResult,
  WardenAlgorithm,
  WardenError,
  WARDEN_ERRORS,
} from '../types';

// ============================================================================
// INTERFACES
// ============================================================================

export interface SignOptions {
  /** Override the configured secret for this call */
  secret?: string | Buffer;
  /** Override the configured algorithm for this call */
  alg?: WardenAlgorithm;
}

export interface VerifyOptions extends SignOptions {
  /** Current time (UNIX seconds) instead of the configured clock */
  time?: number;
  /** Override the configured blacklist, `false` to skip it */
  blacklist?: RepoRef;
  /** Override the configured banlist, `false` to skip it */
  banlist?: RepoRef;
  /** Extra revocation stages run after the banlist */
  stages?: readonly RevocationStage[];
}

export type ResourceResult<R> =
  | { valid: true; token: Token; resource: R }
  | Extract<VerificationResult, { valid: false }>;

// ============================================================================
// WARDEN CLASS
// ============================================================================

/**
 * Entry point for applications.
 *
 * @example
 * ```typescript
 * const warden = new Warden({ secret: 'a-secret-of-at-least-32-characters', defaultIss: 'api' });
 *
 * const compact = warden.sign(warden.token({ sub: 1, scopes: ['user/read'] }));
 * const result = await warden.verify(compact);
 * ```
 */
export class Warden<R = unknown> {
  private options: WardenOptions<R>;
  private snapshot: ResolvedConfig<R>;
  private readonly env: NodeJS.ProcessEnv;

  /**
   * @param env - environment consulted for `WARDEN_*` fallbacks
   * @throws {WardenError} on invalid configuration
   */
  constructor(options: WardenOptions<R> = {}, env: NodeJS.ProcessEnv = process.env) {
    this.env = env;
    this.options = { ...options };
    this.snapshot = this.build(this.options);
  }

  /** Current configuration snapshot. */
  get config(): ResolvedConfig<R> {
    return this.snapshot;
  }

  /**
   * Validate `patch` merged over the current options and swap in the new
   * snapshot. On error the current snapshot stays in place.
   *
   * @throws {WardenError} on invalid configuration
   */
  configure(patch: WardenOptions<R>): ResolvedConfig<R> {
    const options = { ...this.options, ...patch };
    const snapshot = this.build(options);
    this.options = options;
    this.snapshot = snapshot;
    return snapshot;
  }

  private build(options: WardenOptions<R>): ResolvedConfig<R> {
    const config = resolveConfig(options, this.env);
    const length = typeof config.secret === 'string' ? Buffer.byteLength(config.secret) : config.secret.length;
    if (length < RECOMMENDED_SECRET_LENGTH) {
      config.logger.warn('Signing secret is shorter than recommended', {
        length,
        recommended: RECOMMENDED_SECRET_LENGTH,
      });
    }
    return config;
  }

  // ==========================================================================
  // TOKENS
  // ==========================================================================

  /**
   * Build a token, filling unset claims from the configured defaults.
   */
  token(claims: TokenClaims = {}, options: TokenOptions = {}): Token {
    const config = this.snapshot;
    return createToken(
      claims,
      options,
      {
        sub: config.defaultSub,
        iss: config.defaultIss,
        aud: config.defaultAud,
        scopes: config.defaultScopes,
        jti: config.defaultJti,
        ttl: config.defaultTtl,
      },
      config.clock
    );
  }

  /**
   * Sign a token into its compact form.
   *
   * @throws {WardenError} when an override secret or algorithm is invalid
   */
  sign(token: Token, options: SignOptions = {}): string {
    const config = this.snapshot;
    const signer = new Signer({
      secret: options.secret ?? config.secret,
      alg: options.alg ?? config.defaultAlg,
    });
    return signer.sign(token);
  }

  /**
   * Verify a compact token. Failures are returned, not thrown.
   *
   * @throws {WardenError} when an override secret or algorithm is invalid
   */
  verify(compact: string, options: VerifyOptions = {}): Promise<VerificationResult> {
    const config = this.snapshot;
    const verifier = new Verifier({
      secret: options.secret ?? config.secret,
      alg: options.alg ?? config.defaultAlg,
      time: options.time,
      clock: config.clock,
      blacklist: options.blacklist ?? config.blacklist,
      banlist: options.banlist ?? config.banlist,
      stages: options.stages,
      logger: config.logger,
    });
    return verifier.run(compact);
  }

  // ==========================================================================
  // SERIALIZATION
  // ==========================================================================

  private requireSerializer(): Serializer<R> {
    const serializer = this.snapshot.serializer;
    if (!serializer) {
      throw new WardenError(WARDEN_ERRORS.NO_SERIALIZER);
    }
    return serializer;
  }

  /**
   * Serialize a resource, build a token from its claims and sign it.
   */
  async forToken(resource: R, options: TokenOptions & SignOptions = {}): Promise<string> {
    const serializer = this.requireSerializer();
    const claims = await serializer.forToken(resource);
    const { secret, alg, ...tokenOptions } = options;
    return this.sign(this.token(claims, tokenOptions), { secret, alg });
  }

  /**
   * Turn a verified token back into a resource.
   */
  async fromToken(token: Token): Promise<R> {
    return this.requireSerializer().fromToken(token);
  }

  /**
   * Verify a compact token and deserialize its resource.
   */
  async fromCompactToken(compact: string, options: VerifyOptions = {}): Promise<ResourceResult<R>> {
    const serializer = this.requireSerializer();
    const result = await this.verify(compact, options);
    if (!result.valid) {
      return result;
    }
    const resource = await serializer.fromToken(result.token);
    return { valid: true, token: result.token, resource };
  }

  // ==========================================================================
  // REVOCATION
  // ==========================================================================

  private jtiKey(tokenOrJti: Token | string): string {
    const key = typeof tokenOrJti === 'string' ? tokenOrJti : tokenOrJti.jti;
    if (key === undefined) {
      throw new WardenError(WARDEN_ERRORS.JTI_UNVERIFIED);
    }
    return key;
  }

  private subKey(tokenOrSub: Token | Subject): string {
    const sub = typeof tokenOrSub === 'object' ? tokenOrSub.sub : tokenOrSub;
    if (sub === undefined) {
      throw new WardenError(WARDEN_ERRORS.SUB_UNVERIFIED);
    }
    return String(sub);
  }

  /** Add a token (or jti) to the blacklist. */
  async blacklist(tokenOrJti: Token | string): Promise<void> {
    await repoInsert(this.snapshot.blacklist, this.jtiKey(tokenOrJti));
  }

  /** Remove a token (or jti) from the blacklist. */
  async unblacklist(tokenOrJti: Token | string): Promise<void> {
    await repoDelete(this.snapshot.blacklist, this.jtiKey(tokenOrJti));
  }

  /** Whether a token (or jti) is blacklisted. */
  async blacklisted(tokenOrJti: Token | string): Promise<boolean> {
    return repoExists(this.snapshot.blacklist, this.jtiKey(tokenOrJti));
  }

  /** Add a token's subject (or a subject) to the banlist. */
  async ban(tokenOrSub: Token | Subject): Promise<void> {
    await repoInsert(this.snapshot.banlist, this.subKey(tokenOrSub));
  }

  /** Remove a subject from the banlist. */
  async unban(tokenOrSub: Token | Subject): Promise<void> {
    await repoDelete(this.snapshot.banlist, this.subKey(tokenOrSub));
  }

  /** Whether a subject is banned. */
  async banned(tokenOrSub: Token | Subject): Promise<boolean> {
    return repoExists(this.snapshot.banlist, this.subKey(tokenOrSub));
  }
}
