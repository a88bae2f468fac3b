import { Request, Response, NextFunction } from 'express';
import { productsService } from '../services';
import { requireActor } from '../../middlewares/auth.middleware';
import type { AuthRequest } from '../../types/request.types';
import { ResponseHandler } from '../../utils/response';
import { numericIdSchema, toOffset } from '../../utils/validation';
import { listProductsQuerySchema, productSchema, updateProductSchema } from './products.validation';

// Public catalog
export const getProducts = async (req: Request, res: Response, next: NextFunction) => {
  try {
    const query = listProductsQuerySchema.parse(req.query);
    const { products, total } = await productsService.listProducts({
      category: query.category,
      is_available: query.is_available,
      offset: toOffset(query),
      limit: query.limit,
    });

    return ResponseHandler.paginated(res, products, { page: query.page, limit: query.limit, total });
  } catch (error) {
    next(error);
  }
};

export const getProductById = async (req: Request, res: Response, next: NextFunction) => {
  try {
    const id = numericIdSchema.parse(req.params.id);
    const product = await productsService.getProduct(id);
    return ResponseHandler.success(res, product);
  } catch (error) {
    next(error);
  }
};

export const createProduct = async (req: AuthRequest, res: Response, next: NextFunction) => {
  try {
    const validated = productSchema.parse(req.body);
    const product = await productsService.createProduct(requireActor(req), validated);
    return ResponseHandler.created(res, product, 'Product created');
  } catch (error) {
    next(error);
  }
};

// PUT replaces every field, PATCH only the given ones
export const replaceProduct = async (req: AuthRequest, res: Response, next: NextFunction) => {
  try {
    const id = numericIdSchema.parse(req.params.id);
    const validated = productSchema.parse(req.body);
    const product = await productsService.updateProduct(requireActor(req), id, {
      ...validated,
      description: validated.description ?? null,
      is_available: validated.is_available ?? true,
    });
    return ResponseHandler.success(res, product, 'Product updated');
  } catch (error) {
    next(error);
  }
};

export const updateProduct = async (req: AuthRequest, res: Response, next: NextFunction) => {
  try {
    const id = numericIdSchema.parse(req.params.id);
    const validated = updateProductSchema.parse(req.body);
    const product = await productsService.updateProduct(requireActor(req), id, validated);
    return ResponseHandler.success(res, product, 'Product updated');
  } catch (error) {
    next(error);
  }
};

export const deleteProduct = async (req: AuthRequest, res: Response, next: NextFunction) => {
  try {
    const id = numericIdSchema.parse(req.params.id);
    const result = await productsService.deleteProduct(requireActor(req), id);

    const message = result.action === 'deleted'
      ? 'Product deleted'
      : 'Product is part of open orders and was marked unavailable instead';
    return ResponseHandler.success(res, result, message);
  } catch (error) {
    next(error);
  }
};
