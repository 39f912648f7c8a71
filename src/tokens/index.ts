/**
 * @fileoverview Token Creation, Signing, Verification and Authorization
 * @module warden-jwt/tokens
 *
 * @example
 * ```typescript
 * import { createToken, Signer, Verifier } from 'warden-jwt/tokens';
 *
 * const signer = new Signer({ secret: 'a-secret-of-at-least-32-characters' });
 * const compact = signer.sign(createToken({ sub: 42, scopes: ['user/read'] }));
 *
 * const result = await new Verifier({ secret: 'a-secret-of-at-least-32-characters' }).run(compact);
 * if (result.valid) console.log(result.token.sub);
 * ```
 */

export * from './clock';
export * from './token';
export * from './signer';
export * from './verifier';
export * from './scopes';
