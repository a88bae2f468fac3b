import { Response, NextFunction } from 'express';
import { usersService } from '../modules/services';
import { authorize, type Action, type Resource } from '../modules/access/access-control';
import { verifyAccessToken } from '../modules/auth/token.service';
import type { UsersService } from '../modules/users/users.service';
import type { Actor, AuthRequest } from '../types/request.types';
import { AuthenticationError } from '../utils/errors';

const bearerToken = (req: AuthRequest): string | undefined => {
  const [scheme, token] = (req.headers.authorization ?? '').split(' ');
  return scheme?.toLowerCase() === 'bearer' && token ? token : undefined;
};

/**
 * Build the authentication middleware against a user source
 */
export const authenticateWith = (users: Pick<UsersService, 'findActiveById'>) => {
  return async (req: AuthRequest, _res: Response, next: NextFunction) => {
    try {
      const token = bearerToken(req);
      if (!token) {
        throw new AuthenticationError('Not authenticated');
      }

      const payload = verifyAccessToken(token);
      const user = await users.findActiveById(payload.userId);
      if (!user) {
        throw new AuthenticationError('User not found or inactive');
      }

      // Role comes from the database, a stale token cannot keep an old role
      req.user = { id: user.id, username: user.username, role: user.role };
      next();
    } catch (error) {
      next(error);
    }
  };
};

export const authenticate = authenticateWith(usersService);

/**
 * Gate check in front of a route, for permissions that do not depend on ownership
 */
export const requirePermission = <R extends Resource>(resource: R, action: Action<R>) => {
  return (req: AuthRequest, _res: Response, next: NextFunction) => {
    try {
      authorize(requireActor(req).role, resource, action);
      next();
    } catch (error) {
      next(error);
    }
  };
};

/**
 * Authenticated user of the request; throws when `authenticate` did not run
 */
export const requireActor = (req: AuthRequest): Actor => {
  if (!req.user) {
    throw new AuthenticationError('Not authenticated');
  }
  return req.user;
};
