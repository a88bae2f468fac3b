export { pool, connectDatabase } from './connection';
export { database } from './database';
export type { Database, Repositories } from './database';
