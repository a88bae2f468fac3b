import { Request, Response, NextFunction } from 'express';
import { ordersService } from '../services';
import { requireActor } from '../../middlewares/auth.middleware';
import type { AuthRequest } from '../../types/request.types';
import { ResponseHandler } from '../../utils/response';
import { numericIdSchema, toOffset } from '../../utils/validation';
import {
  createOrderSchema,
  listOrdersQuerySchema,
  orderLineSchema,
  ratingSchema,
  transitionSchema,
  updateItemSchema,
} from './orders.validation';

export const createOrder = async (req: AuthRequest, res: Response, next: NextFunction) => {
  try {
    const validated = createOrderSchema.parse(req.body);
    const order = await ordersService.createOrder(requireActor(req), validated);
    return ResponseHandler.created(res, order, 'Order created');
  } catch (error) {
    next(error);
  }
};

// Customers get their own orders, crew gets everybody's
export const getOrders = async (req: AuthRequest, res: Response, next: NextFunction) => {
  try {
    const query = listOrdersQuerySchema.parse(req.query);
    const { orders, total } = await ordersService.listOrders(requireActor(req), {
      status: query.status,
      offset: toOffset(query),
      limit: query.limit,
    });

    return ResponseHandler.paginated(res, orders, { page: query.page, limit: query.limit, total });
  } catch (error) {
    next(error);
  }
};

export const getOrderById = async (req: AuthRequest, res: Response, next: NextFunction) => {
  try {
    const id = numericIdSchema.parse(req.params.id);
    const order = await ordersService.getOrder(requireActor(req), id);
    return ResponseHandler.success(res, order);
  } catch (error) {
    next(error);
  }
};

export const getOrderItems = async (req: AuthRequest, res: Response, next: NextFunction) => {
  try {
    const id = numericIdSchema.parse(req.params.id);
    const items = await ordersService.getOrderItems(requireActor(req), id);
    return ResponseHandler.success(res, items);
  } catch (error) {
    next(error);
  }
};

export const getOrderHistory = async (req: AuthRequest, res: Response, next: NextFunction) => {
  try {
    const id = numericIdSchema.parse(req.params.id);
    const history = await ordersService.getStatusHistory(requireActor(req), id);
    return ResponseHandler.success(res, history);
  } catch (error) {
    next(error);
  }
};

export const updateOrderStatus = async (req: AuthRequest, res: Response, next: NextFunction) => {
  try {
    const id = numericIdSchema.parse(req.params.id);
    const validated = transitionSchema.parse(req.body);
    const order = await ordersService.transition(requireActor(req), id, validated);
    return ResponseHandler.success(res, order, `Order is now ${order.status}`);
  } catch (error) {
    next(error);
  }
};

export const addOrderItem = async (req: AuthRequest, res: Response, next: NextFunction) => {
  try {
    const id = numericIdSchema.parse(req.params.id);
    const validated = orderLineSchema.parse(req.body);
    const order = await ordersService.addItem(requireActor(req), id, validated);
    return ResponseHandler.success(res, order, 'Item added');
  } catch (error) {
    next(error);
  }
};

export const updateOrderItem = async (req: AuthRequest, res: Response, next: NextFunction) => {
  try {
    const id = numericIdSchema.parse(req.params.id);
    const itemId = numericIdSchema.parse(req.params.itemId);
    const { quantity } = updateItemSchema.parse(req.body);
    const order = await ordersService.updateItemQuantity(requireActor(req), id, itemId, quantity);
    return ResponseHandler.success(res, order, 'Item updated');
  } catch (error) {
    next(error);
  }
};

export const removeOrderItem = async (req: AuthRequest, res: Response, next: NextFunction) => {
  try {
    const id = numericIdSchema.parse(req.params.id);
    const itemId = numericIdSchema.parse(req.params.itemId);
    const order = await ordersService.removeItem(requireActor(req), id, itemId);
    return ResponseHandler.success(res, order, 'Item removed');
  } catch (error) {
    next(error);
  }
};

export const rateOrder = async (req: AuthRequest, res: Response, next: NextFunction) => {
  try {
    const id = numericIdSchema.parse(req.params.id);
    const { rating } = ratingSchema.parse(req.body);
    const order = await ordersService.rateOrder(requireActor(req), id, rating);
    return ResponseHandler.success(res, order, 'Thanks for your rating');
  } catch (error) {
    next(error);
  }
};

export const deleteOrder = async (req: AuthRequest, res: Response, next: NextFunction) => {
  try {
    const id = numericIdSchema.parse(req.params.id);
    await ordersService.deleteOrder(requireActor(req), id);
    return ResponseHandler.success(res, undefined, 'Order deleted');
  } catch (error) {
    next(error);
  }
};

// Pickup board, no authentication
export const getPickupBoard = async (_req: Request, res: Response, next: NextFunction) => {
  try {
    const entries = await ordersService.pickupBoard();
    return ResponseHandler.success(res, entries.map(({ locator, status }) => ({ locator, status })));
  } catch (error) {
    next(error);
  }
};
