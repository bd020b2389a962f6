import { Router, Request, RequestHandler, Response, NextFunction } from 'express';
import mongoose from 'mongoose';
import { User } from '../models/User';
import { generateToken } from '../utils/jwt';
import { AuthRequest, currentUser, requireCapability } from '../middleware/auth';
import { normalizeRole } from '../config/roles';
import { ForbiddenError, InvalidArgumentError, NotFoundError } from '../utils/errors';
import { hasAdminOverride } from '../utils/permissions';
import type { UserDirectory } from '../services/userDirectory';
import type { LoginResponse } from '../shared/types';

const readString = (body: unknown, key: string): string => {
  const value: unknown = typeof body === 'object' && body !== null ? Reflect.get(body, key) : undefined;
  return typeof value === 'string' ? value.trim() : '';
};

const isDuplicateKeyError = (error: unknown): boolean =>
  error instanceof mongoose.mongo.MongoServerError && error.code === 11000;

export interface AuthRouterDeps {
  directory: UserDirectory;
  authenticate: RequestHandler;
}

export function createAuthRouter({ directory, authenticate }: AuthRouterDeps): Router {
  const router = Router();

  // Register new user (users:manage only)
  router.post('/register', authenticate, requireCapability('users:manage'), async (req: AuthRequest, res: Response, next: NextFunction) => {
    try {
      const username = readString(req.body, 'username');
      const email = readString(req.body, 'email').toLowerCase();
      const password = readString(req.body, 'password');
      const managerId = readString(req.body, 'managerId');

      if (!username || !email || password.length < 6) {
        throw new InvalidArgumentError('username, email and a password of at least 6 characters are required');
      }
      const role = normalizeRole(readString(req.body, 'role'));
      if (role === 'admin' && !hasAdminOverride(currentUser(req).role)) {
        throw new ForbiddenError('Only administrators can create administrators');
      }
      if (managerId && !mongoose.isValidObjectId(managerId)) {
        throw new InvalidArgumentError('managerId is not a valid id');
      }

      const user = new User({
        username,
        email,
        password,
        firstName: readString(req.body, 'firstName'),
        lastName: readString(req.body, 'lastName'),
        position: readString(req.body, 'position'),
        department: readString(req.body, 'department') || 'General',
        role,
        managerId: managerId ? new mongoose.Types.ObjectId(managerId) : null,
      });
      await user.save();

      res.status(201).json({
        message: 'User created successfully',
        user: {
          id: String(user._id),
          username: user.username,
          email: user.email,
          role: user.role,
        },
      });
    } catch (error) {
      if (isDuplicateKeyError(error)) {
        res.status(400).json({ message: 'User already exists with this username or email' });
        return;
      }
      if (error instanceof mongoose.Error.ValidationError) {
        res.status(400).json({ message: 'Invalid user data' });
        return;
      }
      next(error);
    }
  });

  // Login with username or email
  router.post('/login', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const login = readString(req.body, 'username') || readString(req.body, 'email');
      const password = readString(req.body, 'password');
      if (!login || !password) {
        throw new InvalidArgumentError('username (or email) and password are required');
      }

      const user = await User.findOne({ $or: [{ username: login }, { email: login.toLowerCase() }] });
      const isPasswordValid = user && user.isActive ? await user.comparePassword(password) : false;

      if (!user || !isPasswordValid) {
        console.log('❌ Login failed for', login);
        res.status(401).json({ message: 'Invalid credentials' });
        return;
      }

      user.lastLogin = new Date();
      await user.save();

      const role = normalizeRole(user.role);
      const body: LoginResponse = {
        message: 'Login successful',
        token: generateToken({ userId: String(user._id), username: user.username, role }),
        user: {
          id: String(user._id),
          username: user.username,
          email: user.email,
          role,
        },
      };
      res.json(body);
    } catch (error) {
      next(error);
    }
  });

  router.get('/me', authenticate, async (req: AuthRequest, res: Response, next: NextFunction) => {
    try {
      const { userId } = currentUser(req);
      const user = await directory.findUserById(userId);
      if (!user) {
        throw new NotFoundError('User not found');
      }
      res.json({ user });
    } catch (error) {
      next(error);
    }
  });

  return router;
}
