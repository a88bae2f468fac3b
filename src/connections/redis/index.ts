export { redisClient, connectRedis, disconnectRedis } from './redis.connection';
