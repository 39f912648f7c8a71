/**
 * warden-jwt - Serializer Tests
 */

import { describe, it, expect } from 'vitest';
import { BasicSerializer } from '../../src/serializer';
import { createToken } from '../../src/tokens/token';

describe('BasicSerializer', () => {
  const serializer = new BasicSerializer();

  it('should map a resource to sub and scopes', () => {
    expect(serializer.forToken({ id: 7, scopes: ['post/read'] })).toEqual({ sub: 7, scopes: ['post/read'] });
    expect(serializer.forToken({ id: 'u-1' })).toEqual({ sub: 'u-1', scopes: [] });
  });

  it('should map a token back to a resource', () => {
    const token = createToken({ sub: 7, scopes: ['post/read'] }, { time: 0 });
    expect(serializer.fromToken(token)).toEqual({ id: 7, scopes: ['post/read'] });
  });

  it('should refuse tokens without a subject', () => {
    expect(() => serializer.fromToken(createToken({}, { time: 0 }))).toThrow(TypeError);
  });
});
