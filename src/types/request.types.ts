import { Request } from 'express';
import type { UserRole } from '../constants';

/**
 * Identity resolved from a bearer token
 */
export interface Actor {
  id: string; // UUID
  username: string;
  role: UserRole;
}

/**
 * Auth Request - request carrying the authenticated user
 */
export interface AuthRequest extends Request {
  user?: Actor;
}
