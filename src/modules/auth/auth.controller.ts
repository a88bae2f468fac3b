import { Request, Response, NextFunction } from 'express';
import { usersService } from '../services';
import { setupSchema } from '../users/users.validation';
import { toPublicUser } from '../../connections/db/models';
import { ResponseHandler } from '../../utils/response';
import { auditLog } from '../../utils/logging';
import { tokenRequestSchema } from './auth.validation';
import { signAccessToken } from './token.service';

// Issue an access token for username + password (JSON or form-encoded)
export const issueToken = async (req: Request, res: Response, next: NextFunction) => {
  try {
    const { username, password } = tokenRequestSchema.parse(req.body);
    const user = await usersService.authenticate(username, password);

    const accessToken = signAccessToken({ userId: user.id, role: user.role });

    auditLog('TOKEN_ISSUED', { userId: user.id, ip: req.ip });

    return ResponseHandler.success(res, {
      access_token: accessToken,
      token_type: 'bearer',
      user: toPublicUser(user),
    }, 'Login successful');
  } catch (error) {
    next(error);
  }
};

// First-run setup: create the initial admin while the system has no users
export const setup = async (req: Request, res: Response, next: NextFunction) => {
  try {
    const validated = setupSchema.parse(req.body);
    const user = await usersService.bootstrapAdmin(validated);

    return ResponseHandler.created(res, user, 'Admin account created');
  } catch (error) {
    next(error);
  }
};
