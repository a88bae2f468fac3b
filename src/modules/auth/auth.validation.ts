import { z } from 'zod';

// Validation schemas for the Auth module
export const tokenRequestSchema = z.object({
  username: z.string().trim().min(1, 'Username is required'),
  password: z.string().min(1, 'Password is required'),
});
