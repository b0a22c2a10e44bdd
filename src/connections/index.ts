
// Database
export { pool, migrate, connectDatabase, withTransaction, isUniqueViolation } from './db';
export type { Queryable } from './db';

// Redis
export { redisClient, connectRedis } from './redis';

// Config - All configurations in one place
export {
  appConfig,
  smsConfig,
  uploadConfig,
  wizardConfig,
  dbConfig,
  redisConfig
} from './config';
