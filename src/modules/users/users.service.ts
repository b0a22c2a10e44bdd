import { Queryable } from '../../connections/db/connection';
import { User, CreateUserInput } from '../../connections/db/models';
import { UserResponse } from '../../types/response.types';
import { toDateString } from '../../utils/validation';

export const fullName = (user: { first_name: string; last_name: string }): string =>
  `${user.first_name} ${user.last_name}`.trim();

/**
 * Strip the password hash; add the display name
 */
export const toUserResponse = (user: User): UserResponse => {
  const { password_hash: _passwordHash, birth_date, ...rest } = user;
  return {
    ...rest,
    birth_date: toDateString(birth_date),
    full_name: fullName(user),
  };
};

export const findUserById = async (db: Queryable, id: number): Promise<User | null> => {
  const result = await db.query<User>('SELECT * FROM users WHERE id = $1', [id]);
  return result.rows[0] ?? null;
};

export const findUserByPhone = async (db: Queryable, phoneNumber: string): Promise<User | null> => {
  const result = await db.query<User>('SELECT * FROM users WHERE phone_number = $1', [phoneNumber]);
  return result.rows[0] ?? null;
};

/**
 * Per-field messages for an email or phone already taken by someone other than `exceptUserId`
 */
export const findIdentityConflicts = async (
  db: Queryable,
  identity: { email?: string; phone_number?: string },
  exceptUserId: number | null = null
): Promise<Record<string, string[]>> => {
  const conflicts: Record<string, string[]> = {};

  const taken = async (column: 'email' | 'phone_number', value: string): Promise<boolean> => {
    const result = exceptUserId === null
      ? await db.query(`SELECT id FROM users WHERE ${column} = $1`, [value])
      : await db.query(`SELECT id FROM users WHERE ${column} = $1 AND id <> $2`, [value, exceptUserId]);
    return result.rows.length > 0;
  };

  if (identity.email !== undefined && await taken('email', identity.email)) {
    conflicts.email = ['User with this email already exists.'];
  }

  if (identity.phone_number !== undefined && await taken('phone_number', identity.phone_number)) {
    conflicts.phone_number = ['User with this phone number already exists.'];
  }

  return conflicts;
};

export const insertUser = async (db: Queryable, input: CreateUserInput): Promise<User> => {
  const result = await db.query<User>(
    `INSERT INTO users (
       first_name, last_name, other_name, gender, email, phone_number, password_hash,
       address, birth_date, working_place, pinfl, passport_number
     )
     VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11, $12)
     RETURNING *`,
    [
      input.first_name,
      input.last_name,
      input.other_name ?? null,
      input.gender ?? null,
      input.email,
      input.phone_number,
      input.password_hash,
      input.address ?? null,
      input.birth_date ?? null,
      input.working_place ?? null,
      input.pinfl ?? null,
      input.passport_number ?? null,
    ]
  );
  return result.rows[0];
};
