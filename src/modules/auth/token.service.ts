import jwt from 'jsonwebtoken';
import { z } from 'zod';
import { USER_ROLES, type UserRole } from '../../constants';
import { appConfig } from '../../connections/config/app.config';
import { AuthenticationError } from '../../utils/errors';

export interface TokenPayload {
  userId: string;
  role: UserRole;
}

const tokenPayloadSchema = z.object({
  userId: z.string().uuid(),
  role: z.enum(USER_ROLES),
});

export interface TokenOptions {
  secret: string;
  expiresIn: number; // seconds
}

const defaultOptions = (): TokenOptions => ({
  secret: appConfig.jwtSecret,
  expiresIn: appConfig.jwtExpiresIn,
});

export const signAccessToken = (payload: TokenPayload, options: TokenOptions = defaultOptions()): string =>
  jwt.sign({ userId: payload.userId, role: payload.role }, options.secret, {
    algorithm: 'HS256',
    expiresIn: options.expiresIn,
  });

/**
 * Verify signature and expiry, then check the claims have the expected shape.
 * jsonwebtoken errors propagate so the error middleware can tell expiry apart.
 */
export const verifyAccessToken = (token: string, options: TokenOptions = defaultOptions()): TokenPayload => {
  const decoded = jwt.verify(token, options.secret, { algorithms: ['HS256'] });
  const parsed = tokenPayloadSchema.safeParse(decoded);
  if (!parsed.success) {
    throw new AuthenticationError('Invalid token payload');
  }
  return parsed.data;
};
