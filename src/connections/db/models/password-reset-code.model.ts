// PasswordResetCode Model - Based on migration 20251201_000003_create_password_reset_codes_table

export interface PasswordResetCode {
  id: number;
  phone_number: string;
  code: string;
  created_at: Date;
}
