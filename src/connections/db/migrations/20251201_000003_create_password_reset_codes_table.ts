import { Queryable } from '../connection';
import { Migration } from './types';

export const migration: Migration = {
  async up(db: Queryable) {
    await db.query(`
      CREATE TABLE IF NOT EXISTS password_reset_codes (
        id SERIAL PRIMARY KEY,
        phone_number VARCHAR(20) NOT NULL,
        code VARCHAR(6) NOT NULL,
        created_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
      )
    `);

    await db.query(`
      CREATE INDEX IF NOT EXISTS idx_password_reset_codes_phone ON password_reset_codes(phone_number)
    `);
  },

  async down(db: Queryable) {
    await db.query('DROP INDEX IF EXISTS idx_password_reset_codes_phone');
    await db.query('DROP TABLE IF EXISTS password_reset_codes CASCADE');
  },
};
