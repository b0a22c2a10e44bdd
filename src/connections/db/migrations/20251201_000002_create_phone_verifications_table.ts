import { Queryable } from '../connection';
import { Migration } from './types';

export const migration: Migration = {
  async up(db: Queryable) {
    // user_id stays NULL for signup codes: the user row does not exist yet
    await db.query(`
      CREATE TABLE IF NOT EXISTS phone_verifications (
        id SERIAL PRIMARY KEY,
        user_id INTEGER REFERENCES users(id) ON DELETE CASCADE,
        phone_number VARCHAR(20) NOT NULL,
        code VARCHAR(6) NOT NULL,
        verification_type VARCHAR(20) NOT NULL DEFAULT 'signup',
        expires_at TIMESTAMPTZ NOT NULL,
        is_used BOOLEAN NOT NULL DEFAULT FALSE,
        created_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
      )
    `);

    await db.query(`
      CREATE INDEX IF NOT EXISTS idx_phone_verifications_phone_type ON phone_verifications(phone_number, verification_type)
    `);
  },

  async down(db: Queryable) {
    await db.query('DROP INDEX IF EXISTS idx_phone_verifications_phone_type');
    await db.query('DROP TABLE IF EXISTS phone_verifications CASCADE');
  },
};
