export { appConfig, smsConfig, uploadConfig, wizardConfig } from './app.config';
export { dbConfig } from './database.config';
export { redisConfig } from './redis.config';
