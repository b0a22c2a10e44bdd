import { Queryable } from '../connection';
import { Migration } from './types';

export const migration: Migration = {
  async up(db: Queryable) {
    await db.query(`
      CREATE TABLE IF NOT EXISTS certificates (
        id SERIAL PRIMARY KEY,
        application_id INTEGER NOT NULL REFERENCES applications(id) ON DELETE CASCADE,
        file VARCHAR(500) NOT NULL,
        original_name VARCHAR(255),
        file_size INTEGER,
        created_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
        updated_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
      )
    `);

    await db.query(`
      CREATE INDEX IF NOT EXISTS idx_certificates_application ON certificates(application_id)
    `);
  },

  async down(db: Queryable) {
    await db.query('DROP INDEX IF EXISTS idx_certificates_application');
    await db.query('DROP TABLE IF EXISTS certificates CASCADE');
  },
};
