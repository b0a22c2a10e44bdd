import { PublicUser } from '../connections/db/models';
import { TokenPair } from '../utils/token';

/**
 * Response Types shared across modules
 */

export type UserResponse = Omit<PublicUser, 'birth_date'> & {
  birth_date: string | null;
  full_name: string;
};

export interface AuthResponse extends TokenPair {
  user: UserResponse;
}

export interface SignupStartedResponse {
  verification_id: number;
  phone_number: string;
  expires_at: string;
}

export interface StoredFileInfo {
  original_name: string;
  file_path: string;
  file_size: number;
}
