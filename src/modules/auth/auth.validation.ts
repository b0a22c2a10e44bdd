import { z } from 'zod';
import { GENDERS, PINFL_REGEX, PASSPORT_REGEX, PHONE_REGEX } from '../../constants/user.constants';
import { toDateString } from '../../utils/validation';

const required = 'This field is required';

const phoneNumber = z
  .string({ required_error: required })
  .trim()
  .regex(PHONE_REGEX, 'Enter a valid phone number');

const isoDate = z
  .string({ required_error: 'Birth date is required' })
  .regex(/^\d{4}-\d{2}-\d{2}$/, 'Date must be in YYYY-MM-DD format')
  .refine(value => !Number.isNaN(new Date(`${value}T00:00:00`).getTime()), 'Enter a valid date');

export const pinflSchema = z
  .string({ required_error: required })
  .trim()
  .regex(PINFL_REGEX, 'PINFL must be exactly 14 digits');

// Validation schemas for the Auth module
export const signupStep1Schema = z
  .object({
    first_name: z.string({ required_error: required }).trim().min(1, required).max(50),
    last_name: z.string({ required_error: required }).trim().min(1, required).max(50),
    other_name: z.string().trim().max(50).optional(),
    gender: z.enum(GENDERS, { errorMap: () => ({ message: 'Gender must be male or female' }) }),
    email: z.string({ required_error: required }).trim().toLowerCase().email('Enter a valid email address').max(100),
    phone_number: phoneNumber,
    password: z.string({ required_error: required }).min(8, 'Password must be at least 8 characters'),
    password_confirm: z.string({ required_error: required }),
    birth_date: isoDate.refine(
      value => value < (toDateString(new Date()) ?? ''),
      'Birth date must be before today'
    ),
    address: z.string({ required_error: required }).trim().min(1, required).max(2000),
    working_place: z.string().max(2000, 'Working place must be less than 2000 characters').optional(),
    pinfl: pinflSchema,
    passport_number: z
      .string({ required_error: required })
      .trim()
      .toUpperCase()
      .regex(PASSPORT_REGEX, 'Passport number must be two letters followed by seven digits'),
  })
  .refine(data => data.password === data.password_confirm, {
    message: 'Passwords do not match',
    path: ['password_confirm'],
  });

export type SignupStep1Input = z.infer<typeof signupStep1Schema>;

export const signupVerifySchema = z.object({
  verification_id: z.coerce.number({ invalid_type_error: 'Must be a number' }).int().positive(),
  code: z.string({ required_error: required }).trim().min(1, required).max(6),
});

export const resendSmsSchema = z.object({
  verification_id: z.coerce.number({ invalid_type_error: 'Must be a number' }).int().positive(),
});

/**
 * What step 1 leaves in the cache for step 2 to turn into a user
 */
export const signupSessionSchema = z.object({
  first_name: z.string(),
  last_name: z.string(),
  other_name: z.string().nullable(),
  gender: z.enum(GENDERS),
  email: z.string(),
  phone_number: z.string(),
  password_hash: z.string(),
  birth_date: z.string(),
  address: z.string(),
  working_place: z.string().nullable(),
  pinfl: z.string(),
  passport_number: z.string(),
});

export type SignupSession = z.infer<typeof signupSessionSchema>;

export const signinSchema = z.object({
  phone_number: z.string({ required_error: 'Phone number and password are required' }).trim().min(1, required),
  password: z.string({ required_error: 'Phone number and password are required' }).min(1, required),
});

export const refreshTokenSchema = z.object({
  refresh: z.string({ required_error: required }).min(1, required),
});

export const sendResetCodeSchema = z.object({
  phone_number: phoneNumber,
});

export const resetPasswordSchema = z.object({
  phone_number: phoneNumber,
  code: z.string({ required_error: required }).trim().min(1, required).max(6),
  new_password: z.string({ required_error: required }).min(8, 'Password must be at least 8 characters'),
});
