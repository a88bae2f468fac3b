import './app.config';

export const redisConfig = {
  host: process.env.REDIS_HOST || 'localhost',
  port: parseInt(process.env.REDIS_PORT || '6379'),
  password: process.env.REDIS_PASSWORD || '',
  db: parseInt(process.env.REDIS_DB || '0'),
  // TTL for cached catalog entries
  expireInSeconds: parseInt(process.env.REDIS_EXPIRE_IN_SECONDS || '60'),
};
