import bcrypt from 'bcryptjs';
import { pool } from '../../src/connections/db/connection';
import { Reward, User } from '../../src/connections/db/models';
import { insertUser } from '../../src/modules/users/users.service';
import { issueTokens } from '../../src/utils/token';

export const TEST_PASSWORD = 'test-password';

let sequence = 0;

/**
 * Insert a user with unique email/phone; the password is TEST_PASSWORD unless overridden
 */
export async function createUser(
  overrides: Partial<{
    first_name: string;
    last_name: string;
    email: string;
    phone_number: string;
    password: string;
    pinfl: string;
    is_staff: boolean;
    is_active: boolean;
  }> = {}
): Promise<User> {
  sequence += 1;
  const user = await insertUser(pool, {
    first_name: overrides.first_name ?? 'Test',
    last_name: overrides.last_name ?? `User${sequence}`,
    email: overrides.email ?? `user${sequence}@example.com`,
    phone_number: overrides.phone_number ?? `+99890000${String(sequence).padStart(4, '0')}`,
    password_hash: await bcrypt.hash(overrides.password ?? TEST_PASSWORD, 4),
    gender: 'male',
    birth_date: '1990-05-17',
    address: 'Test street 1',
    pinfl: overrides.pinfl ?? '12345678901234',
    passport_number: 'AA1234567',
  });

  if (overrides.is_staff === undefined && overrides.is_active === undefined) {
    return user;
  }

  const result = await pool.query<User>(
    'UPDATE users SET is_staff = $1, is_active = $2 WHERE id = $3 RETURNING *',
    [overrides.is_staff ?? user.is_staff, overrides.is_active ?? user.is_active, user.id]
  );
  return result.rows[0];
}

export const createStaff = () => createUser({ first_name: 'Staff', is_staff: true });

export const authHeader = (user: User): string => `Bearer ${issueTokens(user.id).access}`;

export async function createReward(name: string = 'Young Leader', description: string = 'For outstanding young leaders'): Promise<Reward> {
  const result = await pool.query<Reward>(
    'INSERT INTO rewards (name, description) VALUES ($1, $2) RETURNING *',
    [name, description]
  );
  return result.rows[0];
}

/**
 * A submitted application inserted directly, bypassing the wizard
 */
export async function createApplication(
  user: User,
  reward: Reward,
  overrides: Partial<{ status: string; area: string; created_at: Date }> = {}
): Promise<number> {
  const result = await pool.query<{ id: number }>(
    `INSERT INTO applications (reward_id, user_id, status, area, district, neighborhood, activity, activity_description, created_at)
     VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9)
     RETURNING id`,
    [
      reward.id,
      user.id,
      overrides.status ?? 'submitted',
      overrides.area ?? 'tashkent_city',
      'Yunusabad',
      'Bodomzor',
      'Volunteering',
      'Organised weekly clean-up events across the neighbourhood for two years.',
      overrides.created_at ?? new Date(),
    ]
  );
  return result.rows[0].id;
}
