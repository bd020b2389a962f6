import { describe, it, expect } from 'vitest';
import jwt from 'jsonwebtoken';
import { config } from '../../../config/env';
import { generateToken, verifyToken } from '../../../utils/jwt';
import { UnauthorizedError } from '../../../utils/errors';

describe('jwt', () => {
  it('round-trips the payload', () => {
    const token = generateToken({ userId: 'u1', username: 'alice', role: 'developer' });
    expect(verifyToken(token)).toEqual({ userId: 'u1', username: 'alice', role: 'developer' });
  });

  it('rejects tokens signed with another secret', () => {
    const token = jwt.sign({ userId: 'u1', username: 'alice', role: 'developer' }, 'other-secret');
    expect(() => verifyToken(token)).toThrow(jwt.JsonWebTokenError);
  });

  it('rejects payloads without the expected claims', () => {
    const token = jwt.sign({ sub: 'u1' }, config.jwtSecret);
    expect(() => verifyToken(token)).toThrow(UnauthorizedError);
  });
});
