import { z } from 'zod';
import { USER_ROLE, USER_ROLES } from '../../constants';
import { paginationQuerySchema } from '../../utils/validation';

// Validation schemas for the Users module
const usernameSchema = z
  .string()
  .trim()
  .min(3, 'Username must be at least 3 characters')
  .max(20, 'Username must be at most 20 characters')
  .regex(/^[A-Za-z0-9_.-]+$/, 'Username may only contain letters, digits, dot, dash and underscore');

const passwordSchema = z.string().min(8, 'Password must be at least 8 characters').max(128);

export const setupSchema = z.object({
  username: usernameSchema,
  email: z.string().trim().max(255).email('Invalid email'),
  password: passwordSchema,
  full_name: z.string().trim().min(1).max(100).nullish(),
});

export const createUserSchema = setupSchema.extend({
  role: z.enum(USER_ROLES).default(USER_ROLE.CUSTOMER),
});

export const updateUserSchema = z.object({
  username: usernameSchema.optional(),
  email: z.string().trim().max(255).email('Invalid email').optional(),
  password: passwordSchema.optional(),
  full_name: z.string().trim().min(1).max(100).nullish(),
  role: z.enum(USER_ROLES).optional(),
  is_active: z.boolean().optional(),
}).refine(data => Object.values(data).some(value => value !== undefined), {
  message: 'At least one field must be provided',
});

export const listUsersQuerySchema = paginationQuerySchema.extend({
  role: z.enum(USER_ROLES).optional(),
});
