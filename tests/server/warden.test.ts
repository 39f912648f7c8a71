/**
 * warden-jwt - Warden Facade Tests
 */

import { describe, it, expect, vi } from 'vitest';
import { Warden } from '../../src/server/warden';
import type { WardenOptions } from '../../src/config';
import { BasicSerializer, BasicResource } from '../../src/serializer';
import { InMemoryRevocationRepo } from '../../src/stores/memory-repo';
import { fixedClock } from '../../src/tokens/clock';
import { silentLogger } from '../../src/logging';
import { decodeJSON } from '../../src/crypto';
import { Serializer, WardenAlgorithm, WardenError } from '../../src/types';

const SECRET = 'test-secret-test-secret-test-secret';

function createWarden(options: WardenOptions<BasicResource> = {}) {
  return new Warden<BasicResource>({ secret: SECRET, logger: silentLogger, clock: fixedClock(1000), ...options }, {});
}

describe('Warden', () => {
  describe('token', () => {
    it('should apply configured defaults', () => {
      const warden = createWarden({
        defaultIss: 'api',
        defaultAud: 'web',
        defaultSub: 'system',
        defaultScopes: ['post/read'],
        defaultTtl: 120,
        defaultJti: () => 'fixed-id',
      });
      const token = warden.token();
      expect(token).toEqual({
        sub: 'system',
        iss: 'api',
        aud: 'web',
        iat: 1000,
        nbf: 999,
        exp: 1120,
        jti: 'fixed-id',
        scopes: ['post/read'],
        meta: {},
      });
    });

    it('should let explicit claims and options win', () => {
      const warden = createWarden({ defaultIss: 'api', defaultTtl: 120 });
      const token = warden.token({ iss: 'other', jti: false }, { time: 5, ttl: 'infinity' });
      expect(token.iss).toBe('other');
      expect(token.iat).toBe(5);
      expect(token.exp).toBeUndefined();
      expect(token.jti).toBeUndefined();
    });
  });

  describe('sign and verify', () => {
    it('should round trip', async () => {
      const warden = createWarden();
      const token = warden.token({ sub: 1, scopes: ['post/read'] });
      const result = await warden.verify(warden.sign(token));
      expect(result).toEqual({ valid: true, token });
    });

    it('should honour per-call overrides', async () => {
      const warden = createWarden();
      const compact = warden.sign(warden.token(), { secret: 'override-secret', alg: WardenAlgorithm.HS384 });

      expect(decodeJSON(compact.split('.')[0])).toEqual({ alg: 'HS384', typ: 'JWT' });
      expect((await warden.verify(compact)).valid).toBe(false);
      expect((await warden.verify(compact, { secret: 'override-secret', alg: WardenAlgorithm.HS384 })).valid).toBe(
        true
      );
    });

    it('should verify at an explicit time', async () => {
      const warden = createWarden();
      const compact = warden.sign(warden.token({}, { ttl: 10 }));
      const result = await warden.verify(compact, { time: 1010 });
      expect(result.valid).toBe(false);
      if (!result.valid) expect(result.reason).toBe('expired');
    });

    it('should run extra revocation stages', async () => {
      const warden = createWarden();
      const compact = warden.sign(warden.token({ aud: 'legacy-app' }));
      const result = await warden.verify(compact, {
        stages: [
          {
            name: 'audiences',
            repo: new InMemoryRevocationRepo(['legacy-app']),
            key: (token) => token.aud,
            unverified: 'bad_token',
            revoked: 'blacklisted',
            failed: 'blacklist_error',
          },
        ],
      });
      expect(result.valid).toBe(false);
      if (!result.valid) expect(result.reason).toBe('blacklisted');
    });

    it('should accept its own token issued at a fractional time', async () => {
      const warden = createWarden();
      const compact = warden.sign(warden.token({ sub: 1 }, { time: 1000.5, ttl: 60 }));
      const result = await warden.verify(compact, { time: 1000 });
      expect(result.valid).toBe(true);
      if (result.valid) expect(result.token.iat).toBe(1000);
    });

    it('should consult the configured stores unless overridden', async () => {
      const blacklist = new InMemoryRevocationRepo();
      const warden = createWarden({ blacklist });
      const token = warden.token({ jti: 'abc' });
      const compact = warden.sign(token);

      await warden.blacklist(token);
      const rejected = await warden.verify(compact);
      expect(rejected.valid ? 'valid' : rejected.reason).toBe('blacklisted');
      expect((await warden.verify(compact, { blacklist: false })).valid).toBe(true);
    });
  });

  describe('configuration', () => {
    it('should throw on invalid configuration', () => {
      expect(() => new Warden({}, {})).toThrow(WardenError);
    });

    it('should warn about short secrets', () => {
      const logger = { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
      new Warden({ secret: 'short', logger }, {});
      expect(logger.warn).toHaveBeenCalledWith('Signing secret is shorter than recommended', {
        length: 5,
        recommended: 32,
      });
    });

    it('should swap in a new frozen snapshot', async () => {
      const warden = createWarden({ defaultIss: 'old' });
      const before = warden.config;
      const compact = warden.sign(warden.token());

      const after = warden.configure({ defaultIss: 'new', secret: 'rotated-secret-rotated-secret-1234' });

      expect(after).toBe(warden.config);
      expect(before.defaultIss).toBe('old');
      expect(after.defaultIss).toBe('new');
      expect(Object.isFrozen(after)).toBe(true);
      expect((await warden.verify(compact)).valid).toBe(false);
    });

    it('should keep the current snapshot when the patch is invalid', () => {
      const warden = createWarden({ defaultIss: 'kept' });
      const before = warden.config;
      expect(() => warden.configure({ secret: '' })).toThrow(WardenError);
      expect(warden.config).toBe(before);
      expect(() => warden.configure({ defaultIss: 'next' })).not.toThrow();
      expect(warden.config.secret).toBe(SECRET);
    });
  });

  describe('serialization', () => {
    it('should issue a token for a resource', async () => {
      const warden = createWarden({ serializer: new BasicSerializer() });
      const compact = await warden.forToken({ id: 9, scopes: ['user/read'] }, { ttl: 30 });
      const result = await warden.verify(compact);

      expect(result.valid).toBe(true);
      if (result.valid) {
        expect(result.token.sub).toBe(9);
        expect(result.token.exp).toBe(1030);
        expect(await warden.fromToken(result.token)).toEqual({ id: 9, scopes: ['user/read'] });
      }
    });

    it('should verify and deserialize a compact token', async () => {
      const warden = createWarden({ serializer: new BasicSerializer() });
      const compact = await warden.forToken({ id: 'u-1' });
      const result = await warden.fromCompactToken(compact);

      expect(result.valid).toBe(true);
      if (result.valid) expect(result.resource).toEqual({ id: 'u-1', scopes: [] });
    });

    it('should return verification failures', async () => {
      const warden = createWarden({ serializer: new BasicSerializer() });
      const result = await warden.fromCompactToken('not-a-token');
      expect(result.valid).toBe(false);
      if (!result.valid) expect(result.reason).toBe('bad_token');
    });

    it('should propagate serializer errors', async () => {
      const serializer: Serializer<BasicResource> = {
        forToken: () => Promise.reject(new Error('lookup failed')),
        fromToken: () => {
          throw new Error('gone');
        },
      };
      const warden = createWarden({ serializer });
      await expect(warden.forToken({ id: 1 })).rejects.toThrow('lookup failed');
      await expect(warden.fromToken(warden.token({ sub: 1 }))).rejects.toThrow('gone');
    });

    it('should reject with no_serializer', async () => {
      const warden = createWarden();
      await expect(warden.forToken({ id: 1 })).rejects.toMatchObject({ code: 'no_serializer' });
      await expect(warden.fromToken(warden.token())).rejects.toMatchObject({ code: 'no_serializer' });
      await expect(warden.fromCompactToken('x.y.z')).rejects.toMatchObject({ code: 'no_serializer' });
    });
  });

  describe('revocation', () => {
    it('should blacklist by token or jti', async () => {
      const blacklist = new InMemoryRevocationRepo();
      const warden = createWarden({ blacklist });
      const token = warden.token({ jti: 'abc' });

      await warden.blacklist(token);
      expect(await warden.blacklisted('abc')).toBe(true);
      await warden.unblacklist('abc');
      expect(await warden.blacklisted(token)).toBe(false);
    });

    it('should ban by token or subject', async () => {
      const banlist = new InMemoryRevocationRepo();
      const warden = createWarden({ banlist });

      await warden.ban(warden.token({ sub: 42 }));
      expect(banlist.exists('42')).toBe(true);
      expect(await warden.banned(42)).toBe(true);
      expect(await warden.banned('42')).toBe(true);
      await warden.unban(42);
      expect(await warden.banned(42)).toBe(false);
    });

    it('should reject when the store is disabled', async () => {
      const warden = createWarden();
      await expect(warden.blacklist('abc')).rejects.toMatchObject({ code: 'repo_disabled' });
      await expect(warden.banned(1)).rejects.toMatchObject({ code: 'repo_disabled' });
    });

    it('should reject tokens without a key', async () => {
      const warden = createWarden({ blacklist: new InMemoryRevocationRepo(), banlist: new InMemoryRevocationRepo() });
      await expect(warden.blacklist(warden.token({ jti: false }))).rejects.toMatchObject({ code: 'jti_unverified' });
      await expect(warden.ban(warden.token())).rejects.toMatchObject({ code: 'sub_unverified' });
    });
  });
});
