export { pool, connectDatabase, withTransaction, isUniqueViolation } from './connection';
export type { Queryable } from './connection';
export { migrate, runMigrations } from './migrate';
