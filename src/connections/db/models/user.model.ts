// User Model - Based on migration 20251201_000001_create_users_table

export type Gender = 'male' | 'female';

export interface User {
  id: number;
  first_name: string;
  last_name: string;
  other_name: string | null;
  gender: Gender | null;
  email: string;
  phone_number: string;
  password_hash: string;
  address: string | null;
  birth_date: Date | string | null;
  working_place: string | null;
  pinfl: string | null;
  passport_number: string | null;
  profile_picture: string | null;
  is_staff: boolean;
  is_active: boolean;
  created_at: Date;
  updated_at: Date;
}

export type PublicUser = Omit<User, 'password_hash'>;

export interface CreateUserInput {
  first_name: string;
  last_name: string;
  other_name?: string | null;
  gender?: Gender | null;
  email: string;
  phone_number: string;
  password_hash: string;
  address?: string | null;
  birth_date?: string | null;
  working_place?: string | null;
  pinfl?: string | null;
  passport_number?: string | null;
}
