import express from 'express';
import * as authController from './auth.controller';
import { rateLimiters } from '../../middlewares/rateLimit.middleware';

const router = express.Router();

// Login, OAuth2 password style
router.post('/token', rateLimiters.auth, authController.issueToken);

// First-run bootstrap of the admin account
router.post('/setup', rateLimiters.setup, authController.setup);

export default router;
