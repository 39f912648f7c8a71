/**
 * warden-jwt - Signer
 * Bind a secret and algorithm into a capability producing compact tokens
 */

import { base64urlEncode, encodeJSON, sign, RECOMMENDED_SECRET_LENGTH } from '../crypto';
import { silentLogger } from '../logging';
import {
  isWardenAlgorithm,
  Token,
  WardenAlgorithm,
  WardenError,
  WardenHeader,
  WardenLogger,
  WARDEN_ERRORS,
} from '../types';
import { tokenToClaims } from './token';

export interface SignerOptions {
  /** Shared HMAC secret. Must not be empty. */
  secret: string | Buffer;
  /** Signing algorithm (default: HS256). */
  alg?: WardenAlgorithm;
  logger?: WardenLogger;
}

/**
 * Validate a secret/algorithm pair, returning the secret as bytes.
 *
 * Shared by the signer and the verifier so both reject the same
 * configurations at construction time.
 *
 * @throws {WardenError} `invalid_secret` or `unsupported_algorithm`
 */
export function assertKeyConfig(secret: unknown, alg: unknown): Buffer {
  if (typeof secret !== 'string' && !Buffer.isBuffer(secret)) {
    throw new WardenError(WARDEN_ERRORS.INVALID_SECRET, 'Secret cannot be nil');
  }
  if (secret.length === 0) {
    throw new WardenError(WARDEN_ERRORS.INVALID_SECRET);
  }
  if (!isWardenAlgorithm(alg)) {
    throw new WardenError(WARDEN_ERRORS.UNSUPPORTED_ALGORITHM, `Algorithm ${String(alg)} not implemented`);
  }
  return typeof secret === 'string' ? Buffer.from(secret, 'utf8') : Buffer.from(secret);
}

/**
 * Immutable signing capability.
 *
 * @example
 * ```typescript
 * const signer = new Signer({ secret: 'a-secret-of-at-least-32-characters', alg: WardenAlgorithm.HS512 });
 * const compact = signer.sign(createToken({ sub: 42 }));
 * ```
 */
export class Signer {
  public readonly alg: WardenAlgorithm;
  private readonly secret: Buffer;

  constructor(options: SignerOptions) {
    const alg = options.alg ?? WardenAlgorithm.HS256;
    this.secret = assertKeyConfig(options.secret, alg);
    this.alg = alg;

    if (this.secret.length < RECOMMENDED_SECRET_LENGTH) {
      (options.logger ?? silentLogger).warn('Signing secret is shorter than recommended', {
        length: this.secret.length,
        recommended: RECOMMENDED_SECRET_LENGTH,
      });
    }
  }

  /**
   * Sign a token into its compact `header.payload.signature` form.
   */
  sign(token: Token): string {
    const header: WardenHeader = { alg: this.alg, typ: 'JWT' };
    const signingInput = `${encodeJSON(header)}.${encodeJSON(tokenToClaims(token))}`;
    const signature = sign(signingInput, this.secret, this.alg);

    return `${signingInput}.${base64urlEncode(signature)}`;
  }
}
