import { Request, Response, NextFunction, RequestHandler } from 'express';
import { verifyToken } from '../utils/jwt';
import { hasCapability, normalizeRole, type Capability, type Role } from '../config/roles';
import { UnauthorizedError } from '../utils/errors';
import type { UserDirectory } from '../services/userDirectory';

export interface AuthUser {
  userId: string;
  username: string;
  role: Role;
}

export interface AuthRequest extends Request {
  user?: AuthUser;
}

/**
 * Verifies the bearer token and reloads the caller from the directory so a
 * deactivated account or a changed role takes effect immediately.
 */
export const createAuthenticator = (directory: UserDirectory): RequestHandler => {
  return async (req: AuthRequest, res: Response, next: NextFunction) => {
    const authHeader = req.headers.authorization;
    const token = authHeader && authHeader.split(' ')[1]; // Bearer TOKEN

    if (!token) {
      res.status(401).json({ message: 'Access token required' });
      return;
    }

    let userId: string;
    try {
      userId = verifyToken(token).userId;
    } catch {
      res.status(403).json({ message: 'Invalid or expired token' });
      return;
    }

    try {
      const user = await directory.findUserById(userId);
      if (!user || !user.isActive) {
        res.status(401).json({ message: 'User not found or inactive' });
        return;
      }

      // Use current role from the directory, not the one baked into the token
      req.user = {
        userId: user.id,
        username: user.username,
        role: normalizeRole(user.role),
      };
      next();
    } catch (error) {
      next(error);
    }
  };
};

export const requireCapability = (capability: Capability): RequestHandler => {
  return (req: AuthRequest, res: Response, next: NextFunction) => {
    if (!req.user) {
      res.status(401).json({ message: 'Authentication required' });
      return;
    }

    if (!hasCapability(req.user.role, capability)) {
      res.status(403).json({ message: 'Insufficient permissions' });
      return;
    }

    next();
  };
};

export const currentUser = (req: AuthRequest): AuthUser => {
  if (!req.user) {
    throw new UnauthorizedError();
  }
  return req.user;
};
