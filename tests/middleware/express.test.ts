/**
 * warden-jwt - Express Middleware Tests
 */

import { describe, it, expect, vi } from 'vitest';
import type { NextFunction, Request, Response } from 'express';
import {
  wardenAuthentication,
  wardenAuthorization,
  extractBearerToken,
  currentToken,
  currentUser,
  currentScopes,
  currentScope,
} from '../../src/middleware/express';
import { Warden } from '../../src/server/warden';
import type { WardenOptions } from '../../src/config';
import { BasicSerializer } from '../../src/serializer';
import { InMemoryRevocationRepo } from '../../src/stores/memory-repo';
import { createToken } from '../../src/tokens/token';
import { fixedClock } from '../../src/tokens/clock';
import { silentLogger } from '../../src/logging';
import { WardenError } from '../../src/types';

const SECRET = 'test-secret-test-secret-test-secret';

// Mock Express request/response
function createMockRequest(options: {
  headers?: Record<string, string>;
  method?: string;
  path?: string;
}): Request {
  return {
    headers: options.headers || {},
    method: options.method || 'GET',
    path: options.path || '/',
  } as unknown as Request;
}

interface MockResponse extends Response {
  statusCode: number;
  data: unknown;
}

function createMockResponse(): MockResponse {
  const res = {
    statusCode: 200,
    data: undefined as unknown,
  } as MockResponse;

  res.status = vi.fn((code: number): MockResponse => {
    res.statusCode = code;
    return res;
  });

  res.json = vi.fn((data?: unknown): MockResponse => {
    res.data = data;
    return res;
  });

  return res;
}

function createNext(): NextFunction {
  return vi.fn<[unknown?], void>();
}

function createWarden(options: WardenOptions = {}): Warden {
  return new Warden({ secret: SECRET, logger: silentLogger, clock: fixedClock(1000), ...options }, {});
}

function bearer(warden: Warden, scopes: string[] = [], claims: { sub?: string | number; jti?: string } = {}): string {
  return `Bearer ${warden.sign(warden.token({ sub: 'user-1', scopes, ...claims }))}`;
}

describe('Express Middleware', () => {
  describe('extractBearerToken', () => {
    it('should return the token of a Bearer header', () => {
      expect(extractBearerToken(createMockRequest({ headers: { authorization: 'Bearer abc.def.ghi' } }))).toBe(
        'abc.def.ghi'
      );
    });

    it('should take the last whitespace separated part', () => {
      expect(extractBearerToken(createMockRequest({ headers: { authorization: '  Bearer   first  last ' } }))).toBe(
        'last'
      );
    });

    it('should ignore other schemes and missing headers', () => {
      expect(extractBearerToken(createMockRequest({ headers: { authorization: 'Basic dXNlcjpwYXNz' } }))).toBeNull();
      expect(extractBearerToken(createMockRequest({ headers: { authorization: 'Bearer' } }))).toBeNull();
      expect(extractBearerToken(createMockRequest({}))).toBeNull();
    });
  });

  describe('wardenAuthentication', () => {
    it('should authenticate a valid token', async () => {
      const warden = createWarden();
      const middleware = wardenAuthentication({ warden });
      const header = bearer(warden, ['post/read']);
      const req = createMockRequest({ headers: { authorization: header } });
      const res = createMockResponse();
      const next = createNext();

      await middleware(req, res, next);

      expect(next).toHaveBeenCalledWith();
      expect(req.warden?.compact).toBe(header.slice('Bearer '.length));
      expect(currentToken(req)?.sub).toBe('user-1');
      expect(currentScopes(req)).toEqual(['post/read']);
      expect(currentUser(req)).toBeUndefined();
    });

    it('should resolve the current user through the serializer', async () => {
      const warden = createWarden({ serializer: new BasicSerializer() });
      const req = createMockRequest({ headers: { authorization: bearer(warden, ['post/read']) } });
      const next = createNext();

      await wardenAuthentication({ warden })(req, createMockResponse(), next);

      expect(next).toHaveBeenCalled();
      expect(currentUser(req)).toEqual({ id: 'user-1', scopes: ['post/read'] });
    });

    it('should reject a request without token', async () => {
      const warden = createWarden();
      const req = createMockRequest({});
      const res = createMockResponse();
      const next = createNext();

      await wardenAuthentication({ warden })(req, res, next);

      expect(next).not.toHaveBeenCalled();
      expect(res.status).toHaveBeenCalledWith(401);
      expect(res.data).toMatchObject({ error: 'unauthorized', message: 'Not Authorized' });
      expect(req.warden).toBeUndefined();
    });

    it('should reject an invalid token with its failure reason', async () => {
      const warden = createWarden();
      const req = createMockRequest({ headers: { authorization: 'Bearer invalid-token' } });
      const res = createMockResponse();
      const next = createNext();

      await wardenAuthentication({ warden })(req, res, next);

      expect(next).not.toHaveBeenCalled();
      expect(res.status).toHaveBeenCalledWith(401);
      expect(res.data).toMatchObject({ error: 'bad_token' });
    });

    it('should reject a blacklisted token', async () => {
      const blacklist = new InMemoryRevocationRepo(['revoked']);
      const warden = createWarden({ blacklist });
      const req = createMockRequest({ headers: { authorization: bearer(warden, [], { jti: 'revoked' }) } });
      const res = createMockResponse();

      await wardenAuthentication({ warden })(req, res, createNext());

      expect(res.data).toMatchObject({ error: 'blacklisted' });
    });

    it('should reject when the serializer fails', async () => {
      const warden = createWarden({
        serializer: {
          forToken: () => ({}),
          fromToken: () => Promise.reject(new Error('user deleted')),
        },
      });
      const req = createMockRequest({ headers: { authorization: bearer(warden) } });
      const res = createMockResponse();
      const next = createNext();

      await wardenAuthentication({ warden })(req, res, next);

      expect(next).not.toHaveBeenCalled();
      expect(res.status).toHaveBeenCalledWith(401);
      expect(res.data).toMatchObject({ error: 'unauthorized' });
      expect(req.warden).toBeUndefined();
    });

    it('should use custom extractor and error handler', async () => {
      const warden = createWarden();
      const compact = warden.sign(warden.token({ sub: 'u' }));
      const onError = vi.fn();
      const middleware = wardenAuthentication({
        warden,
        extractToken: (req) => (typeof req.headers['x-token'] === 'string' ? req.headers['x-token'] : null),
        onError,
      });

      const next = createNext();
      await middleware(createMockRequest({ headers: { 'x-token': compact } }), createMockResponse(), next);
      expect(next).toHaveBeenCalled();

      await middleware(createMockRequest({}), createMockResponse(), createNext());
      expect(onError).toHaveBeenCalledTimes(1);
      expect(onError.mock.calls[0][0]).toBeInstanceOf(WardenError);
    });
  });

  describe('wardenAuthorization', () => {
    function authenticated(method: string, scopes: string[]): Request {
      const req = createMockRequest({ method });
      req.warden = { token: createToken({ sub: 'u', scopes }, { time: 0 }), compact: 'x.y.z' };
      return req;
    }

    it('should allow a matching scope and record it', () => {
      const req = authenticated('PATCH', ['admin/write']);
      const next = createNext();

      wardenAuthorization({ permits: ['user', 'admin'] })(req, createMockResponse(), next);

      expect(next).toHaveBeenCalledWith();
      expect(currentScope(req)).toBe('admin/write');
    });

    it('should deny a missing scope with 403', () => {
      const req = authenticated('DELETE', ['user/read']);
      const res = createMockResponse();
      const next = createNext();

      wardenAuthorization({ permits: ['user'] })(req, res, next);

      expect(next).not.toHaveBeenCalled();
      expect(res.status).toHaveBeenCalledWith(403);
      expect(res.data).toMatchObject({ error: 'forbidden', message: 'Forbidden' });
      expect(currentScope(req)).toBeUndefined();
    });

    it('should deny unsupported methods', () => {
      const res = createMockResponse();
      wardenAuthorization({ permits: ['user'] })(authenticated('OPTIONS', ['user/read']), res, createNext());
      expect(res.status).toHaveBeenCalledWith(403);
    });

    it('should require authentication first', () => {
      const res = createMockResponse();
      const next = createNext();
      wardenAuthorization({ permits: ['user'] })(createMockRequest({}), res, next);
      expect(next).not.toHaveBeenCalled();
      expect(res.status).toHaveBeenCalledWith(401);
    });

    it('should log denials at debug level', () => {
      const logger = { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
      wardenAuthorization({ permits: ['user'], logger })(authenticated('GET', []), createMockResponse(), createNext());
      expect(logger.debug).toHaveBeenCalledWith('Request denied', {
        method: 'GET',
        reason: 'missing_scope',
        required: ['user/read'],
      });
    });

    it('should log denials through the console logger when WARDEN_LOG_DEBUG is set', () => {
      vi.stubEnv('WARDEN_LOG_DEBUG', '1');
      const debug = vi.spyOn(console, 'debug').mockImplementation(() => undefined);
      try {
        wardenAuthorization({ permits: ['user'] })(authenticated('GET', []), createMockResponse(), createNext());
        expect(debug).toHaveBeenCalledWith('[warden] Request denied', {
          method: 'GET',
          reason: 'missing_scope',
          required: ['user/read'],
        });
      } finally {
        debug.mockRestore();
        vi.unstubAllEnvs();
      }
    });

    it('should call a custom error handler', () => {
      const onError = vi.fn();
      wardenAuthorization({ permits: ['user'], onError })(authenticated('GET', []), createMockResponse(), createNext());
      expect(onError.mock.calls[0][0]).toMatchObject({ code: 'forbidden', httpStatus: 403 });
    });
  });

  describe('accessors', () => {
    it('should return empty values for unauthenticated requests', () => {
      const req = createMockRequest({});
      expect(currentToken(req)).toBeUndefined();
      expect(currentUser(req)).toBeUndefined();
      expect(currentScopes(req)).toEqual([]);
      expect(currentScope(req)).toBeUndefined();
    });
  });
});
