import { describe, it, expect } from 'vitest';
import {
  generateCode,
  isResetCodeExpired,
  isVerificationExpired,
  isVerificationValid,
} from '../../src/utils/verification';
import { PhoneVerification } from '../../src/connections/db/models';

const now = new Date('2026-05-10T08:00:00.000Z');

const verification = (overrides: Partial<PhoneVerification> = {}): PhoneVerification => ({
  id: 1,
  user_id: null,
  phone_number: '+998901112233',
  code: '123456',
  verification_type: 'signup',
  expires_at: new Date(now.getTime() + 60 * 1000),
  is_used: false,
  created_at: new Date(now.getTime() - 4 * 60 * 1000),
  ...overrides,
});

describe('verification codes', () => {
  it('generates six zero-padded digits', () => {
    for (let i = 0; i < 50; i++) {
      expect(generateCode()).toMatch(/^\d{6}$/);
    }
  });

  it('is valid only while unused and before expiry', () => {
    expect(isVerificationValid(verification(), now)).toBe(true);
    expect(isVerificationValid(verification({ is_used: true }), now)).toBe(false);
    expect(isVerificationValid(verification({ expires_at: now }), now)).toBe(false);
  });

  it('expires at the expiry instant', () => {
    expect(isVerificationExpired(verification({ expires_at: new Date(now.getTime() + 1) }), now)).toBe(false);
    expect(isVerificationExpired(verification({ expires_at: now }), now)).toBe(true);
  });
});

describe('password reset codes', () => {
  const resetCode = (ageSeconds: number) => ({
    id: 1,
    phone_number: '+998901112233',
    code: '654321',
    created_at: new Date(now.getTime() - ageSeconds * 1000),
  });

  it('lives for just under five minutes', () => {
    expect(isResetCodeExpired(resetCode(299), now)).toBe(false);
    expect(isResetCodeExpired(resetCode(300), now)).toBe(true);
  });
});
