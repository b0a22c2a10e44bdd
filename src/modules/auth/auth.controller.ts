import { Request, Response } from 'express';
import bcrypt from 'bcryptjs';
import { ZodError } from 'zod';
import { pool, withTransaction, isUniqueViolation } from '../../connections';
import { appConfig, wizardConfig } from '../../connections/config/app.config';
import { User } from '../../connections/db/models';
import {
  signupStep1Schema,
  signupVerifySchema,
  resendSmsSchema,
  signupSessionSchema,
  SignupSession,
  signinSchema,
  refreshTokenSchema,
  sendResetCodeSchema,
  resetPasswordSchema,
} from './auth.validation';
import {
  createPhoneVerification,
  findUnusedVerification,
  findVerificationById,
  isVerificationValid,
  markVerificationUsed,
  createPasswordResetCode,
  findLatestResetCode,
  isResetCodeExpired,
  deleteResetCode,
} from '../../utils/verification';
import { cacheStore } from '../../utils/cache';
import { dispatchSms, verificationMessage, passwordResetMessage } from '../../utils/sms.service';
import { issueTokens, verifyToken, InvalidTokenError } from '../../utils/token';
import { ResponseHandler } from '../../utils/response';
import { logger, auditLog } from '../../utils/logging';
import { AuthResponse, SignupStartedResponse } from '../../types/response.types';
import {
  findIdentityConflicts,
  findUserById,
  findUserByPhone,
  insertUser,
  toUserResponse,
} from '../users/users.service';

export const signupSessionKey = (verificationId: number): string => `signup_data_${verificationId}`;

const readSignupSession = async (verificationId: number): Promise<SignupSession | null> => {
  const parsed = signupSessionSchema.safeParse(await cacheStore.get(signupSessionKey(verificationId)));
  return parsed.success ? parsed.data : null;
};

class UserExistsError extends Error {
  constructor(public readonly fields: Record<string, string[]>) {
    super('User already exists');
  }
}

const handleFailure = (res: Response, error: unknown, message: string) => {
  if (error instanceof ZodError) {
    return ResponseHandler.validationError(res, error.issues);
  }
  return ResponseHandler.internalError(res, message, error);
};

// Signup step 1: validate the whole form, park it in the cache and text a code
export const signupStep1 = async (req: Request, res: Response) => {
  try {
    const data = signupStep1Schema.parse(req.body);

    const conflicts = await findIdentityConflicts(pool, { email: data.email, phone_number: data.phone_number });
    if (Object.keys(conflicts).length > 0) {
      logger.warn('[SignupStep1] User already exists', { email: data.email, phone: data.phone_number, ip: req.ip });
      return ResponseHandler.badRequest(res, 'User already exists', conflicts, 'USER_EXISTS');
    }

    const session: SignupSession = {
      first_name: data.first_name,
      last_name: data.last_name,
      other_name: data.other_name || null,
      gender: data.gender,
      email: data.email,
      phone_number: data.phone_number,
      password_hash: await bcrypt.hash(data.password, appConfig.bcryptRounds),
      birth_date: data.birth_date,
      address: data.address,
      working_place: data.working_place || null,
      pinfl: data.pinfl,
      passport_number: data.passport_number,
    };

    const verification = await createPhoneVerification(pool, data.phone_number, 'signup');
    await cacheStore.set(signupSessionKey(verification.id), session, wizardConfig.signupSessionTtl);

    dispatchSms(data.phone_number, verificationMessage(verification.code));

    auditLog('USER_SIGNUP_STARTED', {
      verificationId: verification.id,
      phone: data.phone_number,
      ip: req.ip,
    });

    const body: SignupStartedResponse = {
      verification_id: verification.id,
      phone_number: verification.phone_number,
      expires_at: new Date(verification.expires_at).toISOString(),
    };

    return ResponseHandler.success(res, body, 'Verification code sent to your phone number');
  } catch (error) {
    return handleFailure(res, error, 'Failed to start signup');
  }
};

// Signup step 2: only the code; the form comes from the cache
export const signupStep2 = async (req: Request, res: Response) => {
  try {
    const { verification_id, code } = signupVerifySchema.parse(req.body);

    const verification = await findUnusedVerification(pool, verification_id, code, 'signup');
    if (!verification || verification.user_id !== null) {
      logger.warn('[SignupStep2] Invalid verification code', { verificationId: verification_id, ip: req.ip });
      return ResponseHandler.badRequest(
        res,
        'Invalid or expired verification code',
        { code: ['Invalid or expired verification code'] },
        'INVALID_CODE'
      );
    }

    if (!isVerificationValid(verification)) {
      return ResponseHandler.badRequest(
        res,
        'Verification code has expired',
        { code: ['Verification code has expired'] },
        'INVALID_CODE'
      );
    }

    const session = await readSignupSession(verification_id);
    if (!session) {
      return ResponseHandler.sessionExpired(res);
    }

    let user: User;
    try {
      user = await withTransaction(async (client) => {
        const conflicts = await findIdentityConflicts(client, {
          email: session.email,
          phone_number: session.phone_number,
        });
        if (Object.keys(conflicts).length > 0) {
          throw new UserExistsError(conflicts);
        }

        const created = await insertUser(client, session);
        await markVerificationUsed(client, verification.id, created.id);
        return created;
      });
    } catch (error) {
      if (error instanceof UserExistsError) {
        return ResponseHandler.badRequest(res, 'User already exists', error.fields, 'USER_EXISTS');
      }
      if (isUniqueViolation(error)) {
        return ResponseHandler.badRequest(res, 'This phone number or email is already registered', undefined, 'USER_EXISTS');
      }
      throw error;
    }

    try {
      await cacheStore.delete(signupSessionKey(verification_id));
    } catch (error) {
      logger.warn('[SignupStep2] Failed to clear signup session', { verificationId: verification_id, error });
    }

    auditLog('USER_REGISTERED', { userId: user.id, phone: user.phone_number, ip: req.ip });

    const body: AuthResponse = { ...issueTokens(user.id), user: toUserResponse(user) };
    return ResponseHandler.created(res, body, 'Registration completed successfully');
  } catch (error) {
    return handleFailure(res, error, 'Failed to complete signup');
  }
};

// Signup: send a fresh code for a session that is still cached
export const resendSignupSms = async (req: Request, res: Response) => {
  try {
    const { verification_id } = resendSmsSchema.parse(req.body);

    const session = await readSignupSession(verification_id);
    const previous = await findVerificationById(pool, verification_id, 'signup');
    // A retired id must not retire the code that replaced it
    if (!session || !previous || previous.is_used) {
      return ResponseHandler.sessionExpired(res);
    }

    // Retires the previous code too: same phone, same type
    const verification = await createPhoneVerification(pool, session.phone_number, 'signup');

    await cacheStore.set(signupSessionKey(verification.id), session, wizardConfig.signupSessionTtl);
    await cacheStore.delete(signupSessionKey(verification_id));

    dispatchSms(session.phone_number, verificationMessage(verification.code));

    const body: SignupStartedResponse = {
      verification_id: verification.id,
      phone_number: verification.phone_number,
      expires_at: new Date(verification.expires_at).toISOString(),
    };

    return ResponseHandler.success(res, body, 'A new verification code has been sent');
  } catch (error) {
    return handleFailure(res, error, 'Failed to resend verification code');
  }
};

export const signin = async (req: Request, res: Response) => {
  try {
    const { phone_number, password } = signinSchema.parse(req.body);

    const user = await findUserByPhone(pool, phone_number);
    const matches = user ? await bcrypt.compare(password, user.password_hash) : false;

    if (!user || !matches) {
      logger.warn('[Signin] Invalid credentials', { phone: phone_number, ip: req.ip });
      return ResponseHandler.unauthorized(res, 'No active account found with the given credentials');
    }

    if (!user.is_active) {
      return ResponseHandler.unauthorized(res, 'Account is inactive');
    }

    auditLog('USER_LOGIN', { userId: user.id, ip: req.ip });

    const body: AuthResponse = { ...issueTokens(user.id), user: toUserResponse(user) };
    return ResponseHandler.success(res, body, 'Signed in successfully');
  } catch (error) {
    return handleFailure(res, error, 'Failed to sign in');
  }
};

export const refreshToken = async (req: Request, res: Response) => {
  try {
    const { refresh } = refreshTokenSchema.parse(req.body);
    const { userId } = verifyToken(refresh, 'refresh');

    const user = await findUserById(pool, userId);
    if (!user || !user.is_active) {
      return ResponseHandler.unauthorized(res, 'No active account found for this token');
    }

    return ResponseHandler.success(res, issueTokens(user.id), 'Token refreshed');
  } catch (error) {
    if (error instanceof InvalidTokenError) {
      return ResponseHandler.unauthorized(res, error.message);
    }
    return handleFailure(res, error, 'Failed to refresh token');
  }
};

export const sendResetCode = async (req: Request, res: Response) => {
  try {
    const { phone_number } = sendResetCodeSchema.parse(req.body);

    const user = await findUserByPhone(pool, phone_number);
    if (!user) {
      return ResponseHandler.badRequest(
        res,
        'Invalid data',
        { phone_number: ['User with this phone number does not exist.'] },
        'VALIDATION_ERROR'
      );
    }

    const resetCode = await createPasswordResetCode(pool, phone_number);
    dispatchSms(phone_number, passwordResetMessage(resetCode.code));

    auditLog('PASSWORD_RESET_REQUESTED', { userId: user.id, ip: req.ip });

    return ResponseHandler.success(res, { phone_number }, 'Reset code sent to your phone number');
  } catch (error) {
    return handleFailure(res, error, 'Failed to send reset code');
  }
};

export const resetPassword = async (req: Request, res: Response) => {
  try {
    const { phone_number, code, new_password } = resetPasswordSchema.parse(req.body);

    const resetCode = await findLatestResetCode(pool, phone_number, code);
    if (!resetCode) {
      return ResponseHandler.badRequest(res, 'Invalid code', { code: ['Invalid code'] }, 'VALIDATION_ERROR');
    }

    if (isResetCodeExpired(resetCode)) {
      return ResponseHandler.badRequest(res, 'The code is expired', { code: ['The code is expired'] }, 'VALIDATION_ERROR');
    }

    const user = await findUserByPhone(pool, phone_number);
    if (!user) {
      return ResponseHandler.badRequest(res, 'Invalid code', { code: ['Invalid code'] }, 'VALIDATION_ERROR');
    }

    const passwordHash = await bcrypt.hash(new_password, appConfig.bcryptRounds);
    await withTransaction(async (client) => {
      await client.query(
        'UPDATE users SET password_hash = $1, updated_at = $2 WHERE id = $3',
        [passwordHash, new Date(), user.id]
      );
      await deleteResetCode(client, resetCode.id);
    });

    auditLog('PASSWORD_RESET', { userId: user.id, ip: req.ip });

    return ResponseHandler.success(res, null, 'Password has been reset successfully');
  } catch (error) {
    return handleFailure(res, error, 'Failed to reset password');
  }
};
