// @author lockerdb contributors
// @date 2026-10-19
import { describe, it, expect, vi, beforeEach } from 'vitest';
import type { Response, NextFunction } from 'express';
import jwt from 'jsonwebtoken';
import {
  addTokenToResponse,
  createAuthenticator,
  InvalidCredentialsError,
  resolveJwtSecret,
  type AuthenticatedRequest,
} from './authentication.mjs';
import { ConfigError, type ConnectionDetails } from './config.mjs';

const SECRET = 'test-secret';

const details: ConnectionDetails = {
  username: 'admin',
  password: 'test-password',
  host: 'localhost',
  port: '4141',
  schemaName: 'shop',
};

describe('Authentication', () => {
  const auth = createAuthenticator({ secret: SECRET, username: 'admin', password: 'test-password' });

  describe('connect', () => {
    it('issues a token carrying the schema name', () => {
      const token = auth.connect(details);

      expect(token.split('.')).toHaveLength(3);
      expect(auth.verifyToken(token)).toMatchObject({ username: 'admin', schemaName: 'shop' });
    });

    it('expires tokens after thirty minutes', () => {
      const decoded = auth.verifyToken(auth.connect(details));
      const now = Math.floor(Date.now() / 1000);

      expect(decoded?.exp).toBeGreaterThanOrEqual(now + 29 * 60);
      expect(decoded?.exp).toBeLessThanOrEqual(now + 30 * 60);
    });

    it('rejects a wrong password', () => {
      expect(() => auth.connect({ ...details, password: 'nope' })).toThrow(InvalidCredentialsError);
    });

    it('rejects a wrong username', () => {
      expect(() => auth.connect({ ...details, username: 'root' })).toThrow('invalid username or password');
    });

    it('rejects incomplete details before checking credentials', () => {
      expect(() => auth.connect({ ...details, host: '' })).toThrow(ConfigError);
    });
  });

  describe('verifyToken', () => {
    it('returns null for garbage', () => {
      expect(auth.verifyToken('not.a.jwt')).toBeNull();
    });

    it('returns null for a token signed with another secret', () => {
      const other = createAuthenticator({ secret: 'other-secret', username: 'admin', password: 'test-password' });
      expect(auth.verifyToken(other.connect(details))).toBeNull();
    });

    it('returns null for a token without a session', () => {
      expect(auth.verifyToken(jwt.sign({ userId: 'x' }, SECRET))).toBeNull();
    });
  });

  describe('authenticateToken middleware', () => {
    let mockReq: Partial<AuthenticatedRequest>;
    let mockRes: Partial<Response>;
    let mockNext: NextFunction;

    beforeEach(() => {
      mockReq = { headers: {} };
      mockRes = {
        status: vi.fn().mockReturnThis(),
        json: vi.fn().mockReturnThis(),
      };
      mockNext = vi.fn();
    });

    it('rejects a request without a token', () => {
      auth.authenticateToken(mockReq as AuthenticatedRequest, mockRes as Response, mockNext);

      expect(mockRes.status).toHaveBeenCalledWith(401);
      expect(mockRes.json).toHaveBeenCalledWith({ error: 'No token provided' });
      expect(mockNext).not.toHaveBeenCalled();
    });

    it('rejects an invalid token', () => {
      mockReq.headers = { authorization: 'Bearer invalid-token' };

      auth.authenticateToken(mockReq as AuthenticatedRequest, mockRes as Response, mockNext);

      expect(mockRes.status).toHaveBeenCalledWith(401);
      expect(mockRes.json).toHaveBeenCalledWith({ error: 'Invalid or expired token' });
    });

    it('rejects a token without the Bearer prefix', () => {
      mockReq.headers = { authorization: auth.connect(details) };

      auth.authenticateToken(mockReq as AuthenticatedRequest, mockRes as Response, mockNext);

      expect(mockRes.status).toHaveBeenCalledWith(401);
      expect(mockNext).not.toHaveBeenCalled();
    });

    it('stores the session and does not refresh a fresh token', () => {
      mockReq.headers = { authorization: `Bearer ${auth.connect(details)}` };

      auth.authenticateToken(mockReq as AuthenticatedRequest, mockRes as Response, mockNext);

      expect(mockNext).toHaveBeenCalled();
      expect(mockReq.session).toEqual({ username: 'admin', schemaName: 'shop' });
      expect(mockReq.newToken).toBeUndefined();
    });

    it('re-issues a token that is about to expire', () => {
      const expiring = jwt.sign({ username: 'admin', schemaName: 'shop' }, SECRET, { expiresIn: 120 });
      mockReq.headers = { authorization: `Bearer ${expiring}` };

      auth.authenticateToken(mockReq as AuthenticatedRequest, mockRes as Response, mockNext);

      expect(mockNext).toHaveBeenCalled();
      expect(mockReq.newToken).toBeDefined();
      expect(auth.verifyToken(mockReq.newToken ?? '')).toMatchObject({ username: 'admin', schemaName: 'shop' });
    });
  });

  describe('addTokenToResponse', () => {
    it('adds a refreshed token', () => {
      const req = { newToken: 'refreshed-token' } as AuthenticatedRequest;

      expect(addTokenToResponse(req, { message: 'ok' })).toEqual({ message: 'ok', token: 'refreshed-token' });
    });

    it('leaves the response alone otherwise', () => {
      const req = {} as AuthenticatedRequest;

      expect(addTokenToResponse(req, { message: 'ok' })).toEqual({ message: 'ok' });
    });
  });

  describe('resolveJwtSecret', () => {
    it('uses JWT_SECRET when set', () => {
      expect(resolveJwtSecret({ JWT_SECRET: SECRET })).toBe(SECRET);
    });

    it('generates a random secret otherwise', () => {
      expect(resolveJwtSecret({})).toMatch(/^[0-9a-f]{64}$/);
      expect(resolveJwtSecret({})).not.toBe(resolveJwtSecret({}));
    });
  });
});
