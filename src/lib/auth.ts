import bcrypt from 'bcryptjs';
import jwt from 'jsonwebtoken';
import { z } from 'zod';
import { parsePositiveInt } from '../config/env';

const DEFAULT_ACCESS_TOKEN_TTL_SECONDS = 8 * 60 * 60;

export type AccessTokenPayload = {
  sub: string;
  role: string;
};

const accessTokenPayloadSchema = z.object({
  sub: z.string().min(1),
  role: z.string().min(1)
});

function jwtSecret(): string {
  const secret = process.env.JWT_SECRET ?? '';
  if (!secret) {
    throw new Error('JWT_SECRET must be set before starting the API');
  }
  return secret;
}

export function hashPassword(password: string) {
  return bcrypt.hash(password, 12);
}

export function verifyPassword(password: string, passwordHash: string) {
  return bcrypt.compare(password, passwordHash);
}

export function signAccessToken(payload: AccessTokenPayload) {
  const expiresIn = parsePositiveInt(process.env.ACCESS_TOKEN_TTL_SECONDS, DEFAULT_ACCESS_TOKEN_TTL_SECONDS);
  return jwt.sign(payload, jwtSecret(), { expiresIn });
}

export function verifyAccessToken(token: string): AccessTokenPayload {
  const decoded = jwt.verify(token, jwtSecret());
  const parsed = accessTokenPayloadSchema.safeParse(decoded);
  if (!parsed.success) {
    throw new Error('ACCESS_TOKEN_INVALID');
  }
  return parsed.data;
}

export type AdminCredentials = {
  username: string;
  passwordHash: string;
};

/** The single operator account, configured through ADMIN_USERNAME / ADMIN_PASSWORD_HASH. */
export function getAdminCredentials(): AdminCredentials | null {
  const username = process.env.ADMIN_USERNAME?.trim();
  const passwordHash = process.env.ADMIN_PASSWORD_HASH?.trim();
  if (!username || !passwordHash) {
    return null;
  }
  return { username, passwordHash };
}
