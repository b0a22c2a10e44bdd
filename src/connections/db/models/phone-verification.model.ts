// PhoneVerification Model - Based on migration 20251201_000002_create_phone_verifications_table

export type VerificationType = 'signup' | 'login' | 'reset';

export interface PhoneVerification {
  id: number;
  user_id: number | null; // set once the signup completes
  phone_number: string;
  code: string; // 6 digits
  verification_type: VerificationType;
  expires_at: Date;
  is_used: boolean;
  created_at: Date;
}
