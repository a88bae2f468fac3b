import { Response, NextFunction } from 'express';
import { usersService } from '../services';
import { requireActor } from '../../middlewares/auth.middleware';
import type { AuthRequest } from '../../types/request.types';
import { ResponseHandler } from '../../utils/response';
import { toOffset, uuidSchema } from '../../utils/validation';
import { createUserSchema, listUsersQuerySchema, updateUserSchema } from './users.validation';

export const getMe = async (req: AuthRequest, res: Response, next: NextFunction) => {
  try {
    const user = await usersService.getProfile(requireActor(req));
    return ResponseHandler.success(res, user);
  } catch (error) {
    next(error);
  }
};

export const listUsers = async (req: AuthRequest, res: Response, next: NextFunction) => {
  try {
    const query = listUsersQuerySchema.parse(req.query);
    const { users, total } = await usersService.listUsers(requireActor(req), {
      role: query.role,
      offset: toOffset(query),
      limit: query.limit,
    });

    return ResponseHandler.paginated(res, users, { page: query.page, limit: query.limit, total });
  } catch (error) {
    next(error);
  }
};

export const getUser = async (req: AuthRequest, res: Response, next: NextFunction) => {
  try {
    const id = uuidSchema.parse(req.params.id);
    const user = await usersService.getUser(requireActor(req), id);
    return ResponseHandler.success(res, user);
  } catch (error) {
    next(error);
  }
};

export const createUser = async (req: AuthRequest, res: Response, next: NextFunction) => {
  try {
    const validated = createUserSchema.parse(req.body);
    const user = await usersService.createUser(requireActor(req), validated);
    return ResponseHandler.created(res, user, 'User created');
  } catch (error) {
    next(error);
  }
};

export const updateUser = async (req: AuthRequest, res: Response, next: NextFunction) => {
  try {
    const id = uuidSchema.parse(req.params.id);
    const validated = updateUserSchema.parse(req.body);
    const user = await usersService.updateUser(requireActor(req), id, validated);
    return ResponseHandler.success(res, user, 'User updated');
  } catch (error) {
    next(error);
  }
};

// Accounts are deactivated, never removed
export const deleteUser = async (req: AuthRequest, res: Response, next: NextFunction) => {
  try {
    const id = uuidSchema.parse(req.params.id);
    const user = await usersService.deleteUser(requireActor(req), id);
    return ResponseHandler.success(res, user, 'User deactivated');
  } catch (error) {
    next(error);
  }
};
