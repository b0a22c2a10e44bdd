import { Queryable } from '../connection';
import { Migration } from './types';

export const migration: Migration = {
  async up(db: Queryable) {
    // content_type + object_id point at the source row (currently always an application)
    await db.query(`
      CREATE TABLE IF NOT EXISTS notifications (
        id SERIAL PRIMARY KEY,
        content_type VARCHAR(50) NOT NULL,
        object_id INTEGER NOT NULL,
        recipient_id INTEGER NOT NULL REFERENCES users(id) ON DELETE CASCADE,
        notification_type VARCHAR(30) NOT NULL,
        title VARCHAR(200) NOT NULL,
        status VARCHAR(10) NOT NULL DEFAULT 'sent',
        sent_time TIMESTAMPTZ,
        read_at TIMESTAMPTZ,
        extra_data JSONB NOT NULL DEFAULT '{}',
        created_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
      )
    `);

    await db.query(`
      CREATE INDEX IF NOT EXISTS idx_notifications_recipient_read ON notifications(recipient_id, read_at)
    `);

    await db.query(`
      CREATE INDEX IF NOT EXISTS idx_notifications_source ON notifications(content_type, object_id)
    `);

    await db.query(`
      CREATE INDEX IF NOT EXISTS idx_notifications_type ON notifications(notification_type)
    `);
  },

  async down(db: Queryable) {
    await db.query('DROP INDEX IF EXISTS idx_notifications_type');
    await db.query('DROP INDEX IF EXISTS idx_notifications_source');
    await db.query('DROP INDEX IF EXISTS idx_notifications_recipient_read');
    await db.query('DROP TABLE IF EXISTS notifications CASCADE');
  },
};
