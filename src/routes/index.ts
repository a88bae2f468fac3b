import express from 'express';
import authRoutes from '../modules/auth/auth.routes';
import usersRoutes from '../modules/users/users.routes';
import productsRoutes from '../modules/products/products.routes';
import ordersRoutes from '../modules/orders/orders.routes';
import publicRoutes from '../modules/orders/orders.public.routes';

const router = express.Router();

// API Routes
router.use('/', authRoutes);
router.use('/users', usersRoutes);
router.use('/products', productsRoutes);
router.use('/orders', ordersRoutes);
router.use('/public', publicRoutes);

export default router;
