import jwt from 'jsonwebtoken';
import { z } from 'zod';
import { appConfig } from '../connections/config/app.config';

export type TokenType = 'access' | 'refresh';

const tokenPayloadSchema = z.object({
  userId: z.number().int().positive(),
  type: z.enum(['access', 'refresh']),
});

export type TokenPayload = z.infer<typeof tokenPayloadSchema>;

export interface TokenPair {
  access: string;
  refresh: string;
}

export class InvalidTokenError extends Error {
  constructor(message: string = 'Token is invalid or expired') {
    super(message);
    this.name = 'InvalidTokenError';
  }
}

const signToken = (userId: number, type: TokenType): string =>
  jwt.sign({ userId, type }, appConfig.jwtSecret, {
    expiresIn: type === 'access' ? appConfig.jwtAccessTtl : appConfig.jwtRefreshTtl,
  });

export const issueTokens = (userId: number): TokenPair => ({
  access: signToken(userId, 'access'),
  refresh: signToken(userId, 'refresh'),
});

/**
 * Verifies signature and expiry, then checks the payload shape and token type.
 * Throws InvalidTokenError on any failure.
 */
export const verifyToken = (token: string, expected: TokenType): TokenPayload => {
  let decoded: unknown;
  try {
    decoded = jwt.verify(token, appConfig.jwtSecret);
  } catch (error) {
    if (error instanceof jwt.TokenExpiredError) {
      throw new InvalidTokenError('Token has expired');
    }
    throw new InvalidTokenError();
  }

  const parsed = tokenPayloadSchema.safeParse(decoded);
  if (!parsed.success || parsed.data.type !== expected) {
    throw new InvalidTokenError(`Token is not a valid ${expected} token`);
  }

  return parsed.data;
};
