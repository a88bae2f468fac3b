import express from 'express';
import * as ordersController from './orders.controller';
import { authenticate, requirePermission } from '../../middlewares/auth.middleware';

const router = express.Router();

// Ownership-dependent checks happen in the service
router.use(authenticate);

router.post('/', ordersController.createOrder);
router.get('/', ordersController.getOrders);
router.get('/:id', ordersController.getOrderById);
router.get('/:id/items', ordersController.getOrderItems);
router.get('/:id/history', ordersController.getOrderHistory);
router.post('/:id/status', ordersController.updateOrderStatus);
router.post('/:id/items', ordersController.addOrderItem);
router.patch('/:id/items/:itemId', ordersController.updateOrderItem);
router.delete('/:id/items/:itemId', ordersController.removeOrderItem);
router.post('/:id/rating', ordersController.rateOrder);
router.delete('/:id', requirePermission('order', 'delete'), ordersController.deleteOrder);

export default router;
