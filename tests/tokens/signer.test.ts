/**
 * warden-jwt - Signer Tests
 */

import { describe, it, expect, vi } from 'vitest';
import { Signer, assertKeyConfig } from '../../src/tokens/signer';
import { createToken, tokenToClaims } from '../../src/tokens/token';
import { base64urlEncode, decodeJSON, encodeJSON, sign } from '../../src/crypto';
import { WardenAlgorithm, WardenError } from '../../src/types';

const SECRET = 'test-secret-test-secret-test-secret';

describe('assertKeyConfig', () => {
  it('should return the secret as bytes', () => {
    expect(assertKeyConfig('abc', WardenAlgorithm.HS256)).toEqual(Buffer.from('abc'));
    expect(assertKeyConfig(Buffer.from([1, 2]), WardenAlgorithm.HS512)).toEqual(Buffer.from([1, 2]));
  });

  it('should reject a missing secret', () => {
    expect(() => assertKeyConfig(undefined, WardenAlgorithm.HS256)).toThrow('Secret cannot be nil');
    expect(() => assertKeyConfig(null, WardenAlgorithm.HS256)).toThrow(WardenError);
  });

  it('should reject an empty secret', () => {
    try {
      assertKeyConfig('', WardenAlgorithm.HS256);
      expect.unreachable();
    } catch (error) {
      expect((error as WardenError).code).toBe('invalid_secret');
    }
  });

  it('should reject algorithms outside the HMAC family', () => {
    try {
      assertKeyConfig(SECRET, 'RS256');
      expect.unreachable();
    } catch (error) {
      expect((error as WardenError).code).toBe('unsupported_algorithm');
      expect((error as WardenError).message).toBe('Algorithm RS256 not implemented');
    }
  });
});

describe('Signer', () => {
  const token = createToken({ sub: 'user-1', scopes: ['post/read'], jti: 'id-1' }, { time: 1000, ttl: 60 });

  it('should default to HS256', () => {
    expect(new Signer({ secret: SECRET }).alg).toBe(WardenAlgorithm.HS256);
  });

  it('should produce header.payload.signature', () => {
    const compact = new Signer({ secret: SECRET }).sign(token);
    const [header, payload, signature] = compact.split('.');

    expect(header).toBe(encodeJSON({ alg: 'HS256', typ: 'JWT' }));
    expect(decodeJSON(payload)).toEqual(tokenToClaims(token));
    expect(signature).toBe(base64urlEncode(sign(`${header}.${payload}`, SECRET, WardenAlgorithm.HS256)));
  });

  it('should be deterministic', () => {
    const signer = new Signer({ secret: SECRET, alg: WardenAlgorithm.HS384 });
    expect(signer.sign(token)).toBe(signer.sign(token));
  });

  it('should put the configured algorithm in the header', () => {
    const compact = new Signer({ secret: SECRET, alg: WardenAlgorithm.HS512 }).sign(token);
    expect(decodeJSON(compact.split('.')[0])).toEqual({ alg: 'HS512', typ: 'JWT' });
    // 64 byte digest -> 86 base64url characters
    expect(compact.split('.')[2]).toHaveLength(86);
  });

  it('should not emit absent claims', () => {
    const bare = createToken({ jti: false }, { time: 0, ttl: 'infinity' });
    const compact = new Signer({ secret: SECRET }).sign(bare);
    expect(decodeJSON(compact.split('.')[1])).toEqual({ iat: 0, nbf: -1, scopes: [], meta: {} });
  });

  it('should throw configuration errors at construction', () => {
    expect(() => new Signer({ secret: '' })).toThrow(WardenError);
  });

  it('should warn about short secrets', () => {
    const logger = { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
    new Signer({ secret: 'short', logger });
    expect(logger.warn).toHaveBeenCalledWith('Signing secret is shorter than recommended', {
      length: 5,
      recommended: 32,
    });

    logger.warn.mockClear();
    new Signer({ secret: SECRET, logger });
    expect(logger.warn).not.toHaveBeenCalled();
  });
});
