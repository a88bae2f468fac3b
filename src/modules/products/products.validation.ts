import { z } from 'zod';
import { PRODUCT_CATEGORIES, PRODUCT_PRICE_MAX } from '../../constants';
import { hasAtMostTwoDecimals } from '../../utils/money';
import { booleanQuerySchema, paginationQuerySchema } from '../../utils/validation';

// Validation schemas for the Products module
const priceSchema = z
  .number()
  .nonnegative('Price must be greater than or equal to 0')
  .max(PRODUCT_PRICE_MAX, `Price must be at most ${PRODUCT_PRICE_MAX}`)
  .refine(hasAtMostTwoDecimals, 'Price must have at most two decimal places');

export const productSchema = z.object({
  name: z.string().trim().min(1, 'Product name is required').max(80),
  description: z.string().trim().max(255).nullish(),
  price: priceSchema,
  category: z.enum(PRODUCT_CATEGORIES),
  is_available: z.boolean().optional(),
});

export const updateProductSchema = productSchema.partial().refine(
  data => Object.values(data).some(value => value !== undefined),
  { message: 'At least one field must be provided' }
);

export const listProductsQuerySchema = paginationQuerySchema.extend({
  category: z.enum(PRODUCT_CATEGORIES).optional(),
  is_available: booleanQuerySchema.optional(),
});
