import { z } from 'zod';
import { GENDERS, PINFL_REGEX, PASSPORT_REGEX, PHONE_REGEX } from '../../constants/user.constants';
import { paginationSchema } from '../../utils/validation';

export const userListQuerySchema = paginationSchema(20).and(
  z.object({
    search: z.string().trim().optional(),
  })
);

// Profile fields any user may change on their own record
const profileFields = z.object({
  first_name: z.string().trim().min(1).max(50),
  last_name: z.string().trim().min(1).max(50),
  other_name: z.string().trim().max(50).nullable(),
  gender: z.enum(GENDERS),
  email: z.string().trim().toLowerCase().email('Enter a valid email address').max(100),
  phone_number: z.string().trim().regex(PHONE_REGEX, 'Enter a valid phone number'),
  password: z.string().min(8, 'Password must be at least 8 characters'),
  address: z.string().trim().max(2000).nullable(),
  birth_date: z.string().regex(/^\d{4}-\d{2}-\d{2}$/, 'Date must be in YYYY-MM-DD format').nullable(),
  working_place: z.string().max(2000, 'Working place must be less than 2000 characters').nullable(),
  pinfl: z.string().trim().regex(PINFL_REGEX, 'PINFL must be exactly 14 digits').nullable(),
  passport_number: z
    .string()
    .trim()
    .toUpperCase()
    .regex(PASSPORT_REGEX, 'Passport number must be two letters followed by seven digits')
    .nullable(),
});

export const updateUserSchema = profileFields.partial().strict();

// Staff additionally toggle these
export const staffUpdateUserSchema = profileFields
  .extend({
    is_staff: z.boolean(),
    is_active: z.boolean(),
  })
  .partial()
  .strict();

export type UpdateUserInput = z.infer<typeof staffUpdateUserSchema>;
