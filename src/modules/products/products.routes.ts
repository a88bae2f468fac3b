import express from 'express';
import * as productsController from './products.controller';
import { authenticate, requirePermission } from '../../middlewares/auth.middleware';

const router = express.Router();

// Public
router.get('/', productsController.getProducts);
router.get('/:id', productsController.getProductById);

// Admin
router.post('/', authenticate, requirePermission('product', 'create'), productsController.createProduct);
router.put('/:id', authenticate, requirePermission('product', 'update'), productsController.replaceProduct);
router.patch('/:id', authenticate, requirePermission('product', 'update'), productsController.updateProduct);
router.delete('/:id', authenticate, requirePermission('product', 'delete'), productsController.deleteProduct);

export default router;
