import express from 'express';
import * as usersController from './users.controller';
import { authenticate, requirePermission } from '../../middlewares/auth.middleware';

const router = express.Router();

router.use(authenticate);

router.get('/me', usersController.getMe);

router.get('/', requirePermission('user', 'list'), usersController.listUsers);
router.post('/', requirePermission('user', 'create'), usersController.createUser);
router.get('/:id', requirePermission('user', 'read'), usersController.getUser);
router.patch('/:id', requirePermission('user', 'update'), usersController.updateUser);
router.delete('/:id', requirePermission('user', 'delete'), usersController.deleteUser);

export default router;
