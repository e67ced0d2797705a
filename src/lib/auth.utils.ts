import jwt from 'jsonwebtoken';
import { timingSafeEqual } from 'crypto';
import { config } from '@/config/env';
import { JwtPayload, jwtPayloadSchema } from '@/models/auth.types';

export const generateToken = (payload: JwtPayload, expiresIn: jwt.SignOptions['expiresIn'] = '24h'): string => {
  return jwt.sign(payload, config.jwtSecret, { expiresIn, algorithm: 'HS256' });
};

/**
 * Verifies signature and expiry, then checks the claims carry an id and a known role.
 * Returns null for anything that is not a usable token.
 */
export const verifyToken = (token: string): JwtPayload | null => {
  try {
    const decoded = jwt.verify(token, config.jwtSecret, { algorithms: ['HS256'] });
    const parsed = jwtPayloadSchema.safeParse(decoded);
    return parsed.success ? parsed.data : null;
  } catch {
    return null;
  }
};

// Constant-time comparison for shared API keys.
export const keysMatch = (provided: string, expected: string): boolean => {
  const a = Buffer.from(provided);
  const b = Buffer.from(expected);
  return a.length === b.length && timingSafeEqual(a, b);
};
