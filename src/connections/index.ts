// Database
export { pool, connectDatabase, database } from './db';
export type { Database, Repositories } from './db';

// Redis
export { redisClient, connectRedis, disconnectRedis } from './redis';

// Config - All configurations in one place
export {
  appConfig,
  dbConfig,
  redisConfig,
} from './config';
