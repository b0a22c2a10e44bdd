/**
 * User Gender Constants
 */
export const GENDER = {
  MALE: 'male',
  FEMALE: 'female',
} as const;

export const GENDERS = [GENDER.MALE, GENDER.FEMALE] as const;

export type GenderValue = typeof GENDER[keyof typeof GENDER];

/**
 * Identity document formats
 */
export const PINFL_REGEX = /^\d{14}$/;
export const PASSPORT_REGEX = /^[A-Z]{2}\d{7}$/;
export const PHONE_REGEX = /^\+?\d{9,15}$/;

export const VERIFICATION_CODE_LENGTH = 6;

// Password reset codes older than this are rejected
export const RESET_CODE_LIFETIME_SECONDS = 300;
