import express from 'express';
import * as ordersController from './orders.controller';

const router = express.Router();

// Pickup board shown at the truck window
router.get('/orders', ordersController.getPickupBoard);

export default router;
