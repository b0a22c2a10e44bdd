export { redisClient, connectRedis } from './redis.connection';
