import { Migration } from './types';
import { migration as createUsers } from './20251201_000001_create_users_table';
import { migration as createPhoneVerifications } from './20251201_000002_create_phone_verifications_table';
import { migration as createPasswordResetCodes } from './20251201_000003_create_password_reset_codes_table';
import { migration as createRewards } from './20251201_000004_create_rewards_table';
import { migration as createApplications } from './20251201_000005_create_applications_table';
import { migration as createCertificates } from './20251201_000006_create_certificates_table';
import { migration as createNotifications } from './20251201_000007_create_notifications_table';

export interface MigrationEntry {
  name: string;
  migration: Migration;
}

// Executed in array order
export const migrations: MigrationEntry[] = [
  { name: '20251201_000001_create_users_table', migration: createUsers },
  { name: '20251201_000002_create_phone_verifications_table', migration: createPhoneVerifications },
  { name: '20251201_000003_create_password_reset_codes_table', migration: createPasswordResetCodes },
  { name: '20251201_000004_create_rewards_table', migration: createRewards },
  { name: '20251201_000005_create_applications_table', migration: createApplications },
  { name: '20251201_000006_create_certificates_table', migration: createCertificates },
  { name: '20251201_000007_create_notifications_table', migration: createNotifications },
];
