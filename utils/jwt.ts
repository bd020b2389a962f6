import jwt from 'jsonwebtoken';
import { config } from '../config/env';
import { UnauthorizedError } from './errors';

export interface JWTPayload {
  userId: string;
  username: string;
  role: string;
}

export const generateToken = (user: JWTPayload): string => {
  const payload: JWTPayload = {
    userId: user.userId,
    username: user.username,
    role: user.role,
  };

  return jwt.sign(payload, config.jwtSecret, {
    expiresIn: config.jwtExpiresInSeconds,
  });
};

export const verifyToken = (token: string): JWTPayload => {
  const decoded = jwt.verify(token, config.jwtSecret);
  if (
    typeof decoded === 'string' ||
    typeof decoded.userId !== 'string' ||
    typeof decoded.username !== 'string' ||
    typeof decoded.role !== 'string'
  ) {
    throw new UnauthorizedError('Malformed token payload');
  }
  return { userId: decoded.userId, username: decoded.username, role: decoded.role };
};
