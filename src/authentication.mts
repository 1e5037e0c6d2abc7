// @author lockerdb contributors
// @date 2026-10-19
import crypto from 'node:crypto';
import type { Request, Response, NextFunction } from 'express';
import jwt from 'jsonwebtoken';
import { validateConnection, type ConnectionDetails } from './config.mjs';

const JWT_EXPIRATION = '30m';
const JWT_REFRESH_THRESHOLD = 300; // seconds; a token with less left is re-issued

export interface Session {
  username: string;
  schemaName: string;
}

export interface AuthenticatedRequest extends Request {
  session?: Session;
  newToken?: string;
}

export interface AuthenticatorOptions {
  secret: string;
  username: string;
  password: string;
}

export class InvalidCredentialsError extends Error {
  constructor(message = 'invalid username or password') {
    super(message);
    this.name = 'InvalidCredentialsError';
  }
}

export interface Authenticator {
  /**
   * Checks connection details against the configured credentials.
   * @returns A signed token for the requested schema.
   * @throws {ConfigError} If a field is missing.
   * @throws {InvalidCredentialsError} If username or password do not match.
   */
  connect(details: ConnectionDetails): string;
  /** Decodes a token, or returns null for a bad or expired one. */
  verifyToken(token: string): (Session & { exp?: number }) | null;
  /** Express middleware: Bearer token to `req.session`, 401 otherwise. */
  authenticateToken(req: AuthenticatedRequest, res: Response, next: NextFunction): void;
}

/**
 * `JWT_SECRET` from the environment, or a random per-process secret
 * (tokens then stop working when the daemon restarts).
 */
export function resolveJwtSecret(env: NodeJS.ProcessEnv = process.env): string {
  const fromEnv = env['JWT_SECRET'];
  return fromEnv !== undefined && fromEnv !== '' ? fromEnv : crypto.randomBytes(32).toString('hex');
}

function safeEqual(a: string, b: string): boolean {
  const digestA = crypto.createHash('sha256').update(a).digest();
  const digestB = crypto.createHash('sha256').update(b).digest();
  return crypto.timingSafeEqual(digestA, digestB);
}

export function createAuthenticator(options: AuthenticatorOptions): Authenticator {
  const { secret } = options;

  const signToken = (session: Session): string =>
    jwt.sign({ username: session.username, schemaName: session.schemaName }, secret, {
      expiresIn: JWT_EXPIRATION,
    });

  const verifyToken = (token: string): (Session & { exp?: number }) | null => {
    let decoded: string | jwt.JwtPayload;
    try {
      decoded = jwt.verify(token, secret);
    } catch {
      return null;
    }
    if (typeof decoded === 'string') return null;

    const username: unknown = decoded['username'];
    const schemaName: unknown = decoded['schemaName'];
    if (typeof username !== 'string' || typeof schemaName !== 'string') return null;
    return { username, schemaName, exp: decoded.exp };
  };

  return {
    connect(details) {
      validateConnection(details);
      // Both comparisons always run.
      const userOk = safeEqual(details.username, options.username);
      const passwordOk = safeEqual(details.password, options.password);
      if (!userOk || !passwordOk) {
        throw new InvalidCredentialsError();
      }
      return signToken({ username: details.username, schemaName: details.schemaName });
    },

    verifyToken,

    authenticateToken(req, res, next) {
      const authHeader = req.headers.authorization;
      const token = authHeader?.startsWith('Bearer ') ? authHeader.substring(7) : null;

      if (!token) {
        res.status(401).json({ error: 'No token provided' });
        return;
      }

      const decoded = verifyToken(token);
      if (!decoded) {
        res.status(401).json({ error: 'Invalid or expired token' });
        return;
      }

      req.session = { username: decoded.username, schemaName: decoded.schemaName };

      if (decoded.exp !== undefined) {
        const timeUntilExpiry = decoded.exp - Math.floor(Date.now() / 1000);
        if (timeUntilExpiry <= JWT_REFRESH_THRESHOLD) {
          req.newToken = signToken(req.session);
        }
      }

      next();
    },
  };
}

/**
 * Adds the re-issued token to a JSON response body, if the middleware produced one.
 */
export function addTokenToResponse<T extends Record<string, unknown>>(
  req: AuthenticatedRequest,
  responseData: T,
): T | (T & { token: string }) {
  return req.newToken ? { ...responseData, token: req.newToken } : responseData;
}
