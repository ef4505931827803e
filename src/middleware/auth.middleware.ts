import { Request, Response, NextFunction, RequestHandler } from 'express';
import { verify, JwtPayload } from 'jsonwebtoken';
import { Role, ROLES } from '../config/permissions';

/** Defines the structure of the payload after JWT decoding. */
export interface IAuthUser extends JwtPayload {
  sub: string; // The caller's user id (MongoDB ObjectId string)
  role: Role;
}

// Global declaration merging to add 'user' property to Request
declare module 'express-serve-static-core' {
  interface Request {
    user?: IAuthUser;
  }
}

const OBJECT_ID_PATTERN = /^[0-9a-fA-F]{24}$/;

function isRole(value: unknown): value is Role {
  return typeof value === 'string' && ROLES.some(role => role === value);
}

/**
 * Builds the middleware that extracts and validates the JWT.
 * On success, populates req.user with the decoded payload.
 */
export const authenticate = (secret: string): RequestHandler => {
  return (req: Request, res: Response, next: NextFunction): void => {
    const authHeader = req.headers.authorization;

    // 1. Check for token presence (401 Unauthorized)
    const token = authHeader && authHeader.startsWith('Bearer ') ? authHeader.split(' ')[1] : undefined;
    if (!token) {
      res.status(401).json({
        error: {
          code: 'no_token',
          message: 'Authentication token is missing or malformed.',
        },
      });
      return;
    }

    try {
      // 2. Verify token
      const decoded = verify(token, secret);

      // 3. Require the claims this service relies on; `sub` is stored as a device owner reference
      if (typeof decoded !== 'object' || !decoded.sub || !OBJECT_ID_PATTERN.test(decoded.sub) || !isRole(decoded.role)) {
        throw new Error('Invalid token structure');
      }

      req.user = { ...decoded, sub: decoded.sub, role: decoded.role };
      next();
    } catch {
      // 4. Handle expired/invalid token (401 Unauthorized)
      res.status(401).json({
        error: {
          code: 'invalid_token',
          message: 'Authentication token is invalid or has expired.',
        },
      });
    }
  };
};
