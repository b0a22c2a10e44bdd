import { pool, withTransaction, Queryable } from './connection';
import { migrations } from './migrations';
import { Migration } from './migrations/types';
import { logger, errorMessage } from '../../utils/logging';

// Create migrations table if not exists
const createMigrationsTable = async (db: Queryable) => {
  await db.query(`
    CREATE TABLE IF NOT EXISTS migrations (
      id SERIAL PRIMARY KEY,
      name VARCHAR(255) UNIQUE NOT NULL,
      executed_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
    )
  `);
};

const isMigrationExecuted = async (db: Queryable, name: string): Promise<boolean> => {
  const result = await db.query('SELECT id FROM migrations WHERE name = $1', [name]);
  return result.rows.length > 0;
};

const applyMigration = async (db: Queryable, name: string, migration: Migration) => {
  await migration.up(db);
  await db.query('INSERT INTO migrations (name) VALUES ($1)', [name]);
};

/**
 * Runs every pending migration in order. With `transactional` each one gets its own
 * BEGIN/COMMIT so a failure leaves earlier migrations applied.
 */
export const runMigrations = async (transactional: boolean = true): Promise<string[]> => {
  await createMigrationsTable(pool);
  const applied: string[] = [];

  for (const { name, migration } of migrations) {
    if (await isMigrationExecuted(pool, name)) {
      logger.debug(`Migration ${name} already executed, skipping`);
      continue;
    }

    try {
      if (transactional) {
        await withTransaction(client => applyMigration(client, name, migration));
      } else {
        await applyMigration(pool, name, migration);
      }
    } catch (error) {
      logger.error(`Migration ${name} failed`, { error: errorMessage(error) });
      throw error;
    }

    logger.info(`Migration ${name} executed successfully`);
    applied.push(name);
  }

  return applied;
};

// Run all pending migrations
export const migrate = async (): Promise<void> => {
  try {
    logger.info(`Starting database migrations (${migrations.length} known)...`);
    const applied = await runMigrations();
    logger.info(`All migrations completed successfully (${applied.length} applied)`);
  } catch (error) {
    logger.error('Migration error', { error: errorMessage(error) });
    process.exitCode = 1;
  } finally {
    await pool.end();
  }
};

// Rollback last migration
export const rollback = async (): Promise<void> => {
  try {
    logger.info('Rolling back last migration...');
    await createMigrationsTable(pool);

    const result = await pool.query<{ name: string }>(
      'SELECT name FROM migrations ORDER BY id DESC LIMIT 1'
    );

    const last = result.rows[0];
    if (!last) {
      logger.info('No migrations to rollback');
      return;
    }

    const entry = migrations.find(m => m.name === last.name);
    if (!entry) {
      logger.error(`Migration ${last.name} not found in migrations list`);
      process.exitCode = 1;
      return;
    }

    await withTransaction(async client => {
      await entry.migration.down(client);
      await client.query('DELETE FROM migrations WHERE name = $1', [entry.name]);
    });
    logger.info(`Migration ${entry.name} rolled back successfully`);
  } catch (error) {
    logger.error('Rollback error', { error: errorMessage(error) });
    process.exitCode = 1;
  } finally {
    await pool.end();
  }
};

// Run if called directly
if (require.main === module) {
  const command = process.argv[2];
  const task = command === 'rollback' ? rollback : migrate;
  void task();
}
