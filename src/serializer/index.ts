/**
 * warden-jwt - Serializers
 * Convert application resources to claims and back
 */

import type { Serializer, Subject, Token, TokenClaims } from '../types';

export type { Serializer } from '../types';

/**
 * Resource understood by {@link BasicSerializer}.
 */
export interface BasicResource {
  id: Subject;
  scopes?: readonly string[];
}

/**
 * Maps `{ id, scopes }` to `{ sub, scopes }` and back.
 *
 * @example
 * ```typescript
 * const warden = new Warden({ secret, serializer: new BasicSerializer() });
 * const compact = await warden.forToken({ id: 7, scopes: ['user/read'] });
 * ```
 */
export class BasicSerializer implements Serializer<BasicResource> {
  forToken(resource: BasicResource): TokenClaims {
    return {
      sub: resource.id,
      scopes: [...(resource.scopes ?? [])],
    };
  }

  fromToken(token: Token): BasicResource {
    if (token.sub === undefined) {
      throw new TypeError('Token has no subject to build a resource from');
    }
    return { id: token.sub, scopes: [...token.scopes] };
  }
}
