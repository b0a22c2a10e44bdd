import { randomInt } from 'crypto';
import { Queryable } from '../connections/db/connection';
import { wizardConfig } from '../connections/config/app.config';
import { PhoneVerification, VerificationType, PasswordResetCode } from '../connections/db/models';
import { VERIFICATION_CODE_LENGTH, RESET_CODE_LIFETIME_SECONDS } from '../constants/user.constants';

// Generate random numeric code, zero-padded
export const generateCode = (length: number = VERIFICATION_CODE_LENGTH): string => {
  return randomInt(0, 10 ** length).toString().padStart(length, '0');
};

export const isVerificationExpired = (verification: PhoneVerification, now: Date = new Date()): boolean =>
  new Date(verification.expires_at).getTime() <= now.getTime();

/**
 * Usable exactly when it has not been consumed and has not expired
 */
export const isVerificationValid = (verification: PhoneVerification, now: Date = new Date()): boolean =>
  !verification.is_used && !isVerificationExpired(verification, now);

/**
 * Retires earlier unused codes for the phone, then stores a fresh one
 */
export const createPhoneVerification = async (
  db: Queryable,
  phoneNumber: string,
  type: VerificationType,
  userId: number | null = null
): Promise<PhoneVerification> => {
  await db.query(
    `UPDATE phone_verifications SET is_used = TRUE
     WHERE phone_number = $1 AND verification_type = $2 AND is_used = FALSE`,
    [phoneNumber, type]
  );

  const expiresAt = new Date(Date.now() + wizardConfig.codeLifetimeMinutes * 60 * 1000);
  const result = await db.query<PhoneVerification>(
    `INSERT INTO phone_verifications (user_id, phone_number, code, verification_type, expires_at)
     VALUES ($1, $2, $3, $4, $5)
     RETURNING *`,
    [userId, phoneNumber, generateCode(), type, expiresAt]
  );

  return result.rows[0];
};

export const findVerificationById = async (
  db: Queryable,
  id: number,
  type: VerificationType
): Promise<PhoneVerification | null> => {
  const result = await db.query<PhoneVerification>(
    'SELECT * FROM phone_verifications WHERE id = $1 AND verification_type = $2',
    [id, type]
  );
  return result.rows[0] ?? null;
};

/**
 * Unused row matching both id and code, regardless of expiry
 */
export const findUnusedVerification = async (
  db: Queryable,
  id: number,
  code: string,
  type: VerificationType
): Promise<PhoneVerification | null> => {
  const result = await db.query<PhoneVerification>(
    `SELECT * FROM phone_verifications
     WHERE id = $1 AND code = $2 AND verification_type = $3 AND is_used = FALSE`,
    [id, code, type]
  );
  return result.rows[0] ?? null;
};

export const markVerificationUsed = async (
  db: Queryable,
  id: number,
  userId: number | null = null
): Promise<void> => {
  await db.query(
    'UPDATE phone_verifications SET is_used = TRUE, user_id = COALESCE($2, user_id) WHERE id = $1',
    [id, userId]
  );
};

// Password reset codes

export const isResetCodeExpired = (resetCode: PasswordResetCode, now: Date = new Date()): boolean =>
  now.getTime() - new Date(resetCode.created_at).getTime() >= RESET_CODE_LIFETIME_SECONDS * 1000;

export const createPasswordResetCode = async (db: Queryable, phoneNumber: string): Promise<PasswordResetCode> => {
  const result = await db.query<PasswordResetCode>(
    `INSERT INTO password_reset_codes (phone_number, code, created_at)
     VALUES ($1, $2, $3)
     RETURNING *`,
    [phoneNumber, generateCode(), new Date()]
  );
  return result.rows[0];
};

// Most recent code issued to the phone with this value
export const findLatestResetCode = async (
  db: Queryable,
  phoneNumber: string,
  code: string
): Promise<PasswordResetCode | null> => {
  const result = await db.query<PasswordResetCode>(
    `SELECT * FROM password_reset_codes
     WHERE phone_number = $1 AND code = $2
     ORDER BY created_at DESC, id DESC
     LIMIT 1`,
    [phoneNumber, code]
  );
  return result.rows[0] ?? null;
};

export const deleteResetCode = async (db: Queryable, id: number): Promise<void> => {
  await db.query('DELETE FROM password_reset_codes WHERE id = $1', [id]);
};
