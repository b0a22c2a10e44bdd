import { Response } from 'express';
import bcrypt from 'bcryptjs';
import { ZodError } from 'zod';
import { pool } from '../../connections';
import { appConfig } from '../../connections/config/app.config';
import { User } from '../../connections/db/models';
import { AuthRequest, AuthUser } from '../../types/request.types';
import { ResponseHandler } from '../../utils/response';
import { logger } from '../../utils/logging';
import { idSchema, offsetOf } from '../../utils/validation';
import { userListQuerySchema, updateUserSchema, staffUpdateUserSchema, UpdateUserInput } from './users.validation';
import { findIdentityConflicts, findUserById, toUserResponse } from './users.service';

const handleFailure = (res: Response, error: unknown, message: string) => {
  if (error instanceof ZodError) {
    return ResponseHandler.validationError(res, error.issues);
  }
  return ResponseHandler.internalError(res, message, error);
};

/**
 * `me` or a numeric id; regular users only ever reach their own record
 */
const resolveTargetId = (actor: AuthUser, param: string): number | null => {
  const id = param === 'me' ? actor.id : idSchema.safeParse(param).data;
  if (id === undefined) return null;
  return actor.is_staff || id === actor.id ? id : null;
};

// GET /users (staff)
export const listUsers = async (req: AuthRequest, res: Response) => {
  try {
    const { page, limit, search } = userListQuerySchema.parse(req.query);

    const params: unknown[] = [];
    let where = '';
    if (search) {
      params.push(`%${search.toLowerCase()}%`);
      where = `WHERE LOWER(first_name) LIKE $1 OR LOWER(last_name) LIKE $1
               OR LOWER(email) LIKE $1 OR phone_number LIKE $1`;
    }

    const countResult = await pool.query<{ total: number }>(
      `SELECT COUNT(*)::int AS total FROM users ${where}`,
      params
    );
    const result = await pool.query<User>(
      `SELECT * FROM users ${where} ORDER BY id ASC LIMIT ${limit} OFFSET ${offsetOf({ page, limit })}`,
      params
    );

    return ResponseHandler.paginated(
      res,
      result.rows.map(toUserResponse),
      { page, limit, total: Number(countResult.rows[0]?.total ?? 0) }
    );
  } catch (error) {
    return handleFailure(res, error, 'Failed to list users');
  }
};

// GET /users/me, /users/:id
export const getUser = async (req: AuthRequest, res: Response) => {
  try {
    if (!req.user) return ResponseHandler.unauthorized(res);

    const id = resolveTargetId(req.user, req.params.id ?? 'me');
    const user = id === null ? null : await findUserById(pool, id);
    if (!user) {
      return ResponseHandler.notFound(res, 'User not found');
    }

    return ResponseHandler.success(res, toUserResponse(user));
  } catch (error) {
    return handleFailure(res, error, 'Failed to get user');
  }
};

const UPDATABLE_COLUMNS = [
  'first_name',
  'last_name',
  'other_name',
  'gender',
  'email',
  'phone_number',
  'address',
  'birth_date',
  'working_place',
  'pinfl',
  'passport_number',
  'is_staff',
  'is_active',
] as const;

// PATCH /users/me, /users/:id
export const updateUser = async (req: AuthRequest, res: Response) => {
  try {
    if (!req.user) return ResponseHandler.unauthorized(res);

    const id = resolveTargetId(req.user, req.params.id ?? 'me');
    const existing = id === null ? null : await findUserById(pool, id);
    if (!existing) {
      return ResponseHandler.notFound(res, 'User not found');
    }

    const input: UpdateUserInput = req.user.is_staff
      ? staffUpdateUserSchema.parse(req.body)
      : updateUserSchema.parse(req.body);

    const conflicts = await findIdentityConflicts(
      pool,
      { email: input.email, phone_number: input.phone_number },
      existing.id
    );
    if (Object.keys(conflicts).length > 0) {
      return ResponseHandler.badRequest(res, 'User already exists', conflicts, 'USER_EXISTS');
    }

    const sets: string[] = [];
    const params: unknown[] = [];
    for (const column of UPDATABLE_COLUMNS) {
      const value = input[column];
      if (value !== undefined) {
        params.push(value);
        sets.push(`${column} = $${params.length}`);
      }
    }
    if (input.password !== undefined) {
      params.push(await bcrypt.hash(input.password, appConfig.bcryptRounds));
      sets.push(`password_hash = $${params.length}`);
    }

    if (sets.length === 0) {
      return ResponseHandler.success(res, toUserResponse(existing), 'Nothing to update');
    }

    params.push(new Date());
    sets.push(`updated_at = $${params.length}`);
    params.push(existing.id);

    const result = await pool.query<User>(
      `UPDATE users SET ${sets.join(', ')} WHERE id = $${params.length} RETURNING *`,
      params
    );

    logger.info('[UpdateUser] User updated', { userId: existing.id, by: req.user.id });

    return ResponseHandler.success(res, toUserResponse(result.rows[0]), 'User updated successfully');
  } catch (error) {
    return handleFailure(res, error, 'Failed to update user');
  }
};

// DELETE /users/me, /users/:id
export const deleteUser = async (req: AuthRequest, res: Response) => {
  try {
    if (!req.user) return ResponseHandler.unauthorized(res);

    const id = resolveTargetId(req.user, req.params.id ?? 'me');
    const existing = id === null ? null : await findUserById(pool, id);
    if (!existing) {
      return ResponseHandler.notFound(res, 'User not found');
    }

    await pool.query('DELETE FROM users WHERE id = $1', [existing.id]);
    logger.info('[DeleteUser] User deleted', { userId: existing.id, by: req.user.id });

    return ResponseHandler.success(res, null, 'User deleted successfully');
  } catch (error) {
    return handleFailure(res, error, 'Failed to delete user');
  }
};
