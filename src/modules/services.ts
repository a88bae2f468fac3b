import { database } from '../connections/db/database';
import { redisClient } from '../connections/redis';
import { redisConfig } from '../connections/config';
import { UsersService } from './users/users.service';
import { ProductsService } from './products/products.service';
import { RedisProductCache } from './products/products.cache';
import { OrdersService } from './orders/orders.service';

// Application-wide service instances, wired to PostgreSQL and Redis
export const usersService = new UsersService(database);

export const productsService = new ProductsService(
  database,
  new RedisProductCache(redisClient, redisConfig.expireInSeconds)
);

export const ordersService = new OrdersService(database);
