import dotenv from 'dotenv';

dotenv.config();

/**
 * Parse CORS origins from environment variable
 * Supports comma or space separated values
 */
const parseCorsOrigins = (): string[] => {
  const corsOrigins = process.env.CORS_ORIGINS || '';
  if (!corsOrigins) {
    return [];
  }

  return corsOrigins
    .split(/[,\s]+/)
    .map(origin => origin.trim())
    .filter(origin => origin.length > 0);
};

const parseIntEnv = (value: string | undefined, fallback: number): number => {
  const parsed = parseInt(value || '', 10);
  return isNaN(parsed) ? fallback : parsed;
};

const nodeEnv = process.env.NODE_ENV || 'development';

export const appConfig = {
  port: parseIntEnv(process.env.APP_PORT || process.env.PORT, 3000),
  nodeEnv,
  jwtSecret: process.env.JWT_SECRET || 'secret',
  jwtAccessTtl: parseIntEnv(process.env.JWT_ACCESS_TTL, 60 * 60), // seconds
  jwtRefreshTtl: parseIntEnv(process.env.JWT_REFRESH_TTL, 30 * 24 * 60 * 60),
  bcryptRounds: parseIntEnv(process.env.BCRYPT_ROUNDS, 10),
  frontendUrl: process.env.FRONTEND_URL || 'http://localhost:5173',
  corsOrigins: parseCorsOrigins(),
  rateLimitEnabled: process.env.RATE_LIMIT_ENABLED !== 'false' && nodeEnv !== 'test',
};

export const smsConfig = {
  provider: process.env.SMS_PROVIDER || 'log',
  sender: process.env.SMS_SENDER || '4546',
  maxRetries: parseIntEnv(process.env.SMS_MAX_RETRIES, 3),
  retryDelayMs: parseIntEnv(process.env.SMS_RETRY_DELAY_MS, 5000),
};

export const uploadConfig = {
  uploadDir: process.env.UPLOAD_DIR || './uploads',
  baseUrl: process.env.BASE_URL || 'http://localhost:3000',
  tempDir: 'temp_uploads',
};

export const wizardConfig = {
  draftTtl: parseIntEnv(process.env.WIZARD_DRAFT_TTL, 60 * 60), // 1 hour
  signupSessionTtl: parseIntEnv(process.env.SIGNUP_SESSION_TTL, 5 * 60),
  codeLifetimeMinutes: 5,
};
