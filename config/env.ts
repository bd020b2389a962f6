import 'dotenv/config';

const DEFAULT_CORS_ORIGINS = [
  'http://localhost:3000',
  'http://127.0.0.1:3000',
];

const readNumber = (name: string, fallback: number): number => {
  const raw = process.env[name];
  if (!raw) return fallback;
  const value = Number(raw);
  if (!Number.isFinite(value) || value <= 0) {
    throw new Error(`${name} must be a positive number, got "${raw}"`);
  }
  return value;
};

const readList = (name: string, fallback: string[]): string[] => {
  const raw = process.env[name];
  if (!raw) return fallback;
  return raw.split(',').map((entry) => entry.trim()).filter(Boolean);
};

const nodeEnv = process.env.NODE_ENV || 'development';

if (nodeEnv === 'production' && !process.env.JWT_SECRET) {
  throw new Error('JWT_SECRET must be set in production');
}

export interface AppConfig {
  readonly nodeEnv: string;
  readonly port: number;
  readonly mongoUri: string;
  readonly jwtSecret: string;
  readonly jwtExpiresInSeconds: number;
  readonly corsOrigins: readonly string[];
  readonly pingMessage: string;
}

export const config: AppConfig = Object.freeze({
  nodeEnv,
  port: readNumber('PORT', 3000),
  mongoUri: process.env.MONGODB_URI || 'mongodb://localhost:27017/leave-desk',
  jwtSecret: process.env.JWT_SECRET || 'dev-secret-change-in-production',
  jwtExpiresInSeconds: readNumber('JWT_EXPIRES_IN_SECONDS', 7 * 24 * 60 * 60),
  corsOrigins: Object.freeze(readList('CORS_ORIGINS', DEFAULT_CORS_ORIGINS)),
  pingMessage: process.env.PING_MESSAGE ?? 'ping',
});
