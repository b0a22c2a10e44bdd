import { Response, NextFunction } from 'express';
import { pool } from '../connections';
import { AuthRequest, AuthUser } from '../types/request.types';
import { ResponseHandler } from '../utils/response';
import { verifyToken, InvalidTokenError } from '../utils/token';
import { logger, errorMessage } from '../utils/logging';

class InactiveUserError extends Error {}

const resolveUserFromToken = async (token: string): Promise<AuthUser> => {
  const { userId } = verifyToken(token, 'access');

  const result = await pool.query<AuthUser & { is_active: boolean }>(
    'SELECT id, email, phone_number, first_name, last_name, is_staff, is_active FROM users WHERE id = $1',
    [userId]
  );

  const user = result.rows[0];
  if (!user) {
    throw new InvalidTokenError('User not found');
  }

  if (!user.is_active) {
    throw new InactiveUserError('Account is inactive');
  }

  return {
    id: user.id,
    email: user.email,
    phone_number: user.phone_number,
    first_name: user.first_name,
    last_name: user.last_name,
    is_staff: user.is_staff,
  };
};

const bearerToken = (req: AuthRequest): string | undefined => {
  const [scheme, token] = (req.headers.authorization || '').split(' ');
  return scheme === 'Bearer' && token ? token : undefined;
};

export const authenticate = async (req: AuthRequest, res: Response, next: NextFunction) => {
  const token = bearerToken(req);
  if (!token) {
    return ResponseHandler.unauthorized(res, 'Authentication credentials were not provided');
  }

  try {
    req.user = await resolveUserFromToken(token);
  } catch (error) {
    if (error instanceof InvalidTokenError || error instanceof InactiveUserError) {
      return ResponseHandler.unauthorized(res, error.message);
    }
    logger.error('[Auth] Failed to resolve user from token', { error: errorMessage(error) });
    return ResponseHandler.internalError(res, 'Failed to authenticate', error);
  }

  next();
};

export const requireStaff = (req: AuthRequest, res: Response, next: NextFunction) => {
  if (!req.user) {
    return ResponseHandler.unauthorized(res);
  }

  if (!req.user.is_staff) {
    return ResponseHandler.forbidden(res, 'You do not have permission to perform this action');
  }

  next();
};
