import { Queryable } from '../connection';
import { Migration } from './types';

export const migration: Migration = {
  async up(db: Queryable) {
    // reward_id has no ON DELETE action: a reward with applications cannot be removed
    await db.query(`
      CREATE TABLE IF NOT EXISTS applications (
        id SERIAL PRIMARY KEY,
        reward_id INTEGER NOT NULL REFERENCES rewards(id),
        user_id INTEGER NOT NULL REFERENCES users(id) ON DELETE CASCADE,
        status VARCHAR(20) NOT NULL DEFAULT 'submitted',
        area VARCHAR(20) NOT NULL,
        district VARCHAR(200) NOT NULL,
        neighborhood VARCHAR(200) NOT NULL,
        activity VARCHAR(200) NOT NULL,
        activity_description TEXT NOT NULL,
        recommendation_letter VARCHAR(500),
        source VARCHAR(200) DEFAULT 'web',
        created_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
        updated_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
        CONSTRAINT unique_user_reward_application UNIQUE (user_id, reward_id)
      )
    `);

    await db.query(`
      CREATE INDEX IF NOT EXISTS idx_applications_status ON applications(status)
    `);

    await db.query(`
      CREATE INDEX IF NOT EXISTS idx_applications_reward ON applications(reward_id)
    `);
  },

  async down(db: Queryable) {
    await db.query('DROP INDEX IF EXISTS idx_applications_reward');
    await db.query('DROP INDEX IF EXISTS idx_applications_status');
    await db.query('DROP TABLE IF EXISTS applications CASCADE');
  },
};
