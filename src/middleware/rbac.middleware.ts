import { Request, Response, NextFunction, RequestHandler } from 'express';
import { checkPermissions } from '../config/permissions';

/**
 * Middleware function generator for Role-Based Access Control (RBAC).
 * @param requiredPermissions An array of permission constants (from src/config/permissions.ts).
 */
export const authorize = (requiredPermissions: string[]): RequestHandler => {
  return (req: Request, res: Response, next: NextFunction): void => {
    // Assumes authenticate middleware has run and req.user is present
    if (!req.user) {
      res.status(500).json({
        error: {
          code: 'server_error',
          message: 'Authorization error: missing authenticated user data.',
        },
      });
      return;
    }

    if (!checkPermissions(req.user.role, requiredPermissions)) {
      res.status(403).json({
        error: {
          code: 'permission_denied',
          message: 'You do not have the required role or permissions.',
        },
      });
      return;
    }

    next();
  };
};
