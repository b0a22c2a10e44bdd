import { Queryable } from '../../connections/db/connection';
import { Reward } from '../../connections/db/models';
import {
  APPLICATION_STATUS,
  APPLICATION_STATUSES,
  ApplicationStatus,
  PENDING_STATUSES,
} from '../../constants/application.constants';
import { PaginationQuery } from '../../types/request.types';
import { offsetOf } from '../../utils/validation';
import { logger, errorMessage } from '../../utils/logging';
import { getFileUrl, removeFile } from '../upload/localStorage.service';

export const MONTHS_IN_STATS = 12;

const placeholders = (count: number, offset: number = 0): string =>
  Array.from({ length: count }, (_, index) => `$${index + offset + 1}`).join(', ');

export const findRewardById = async (db: Queryable, id: number): Promise<Reward | null> => {
  const result = await db.query<Reward>('SELECT * FROM rewards WHERE id = $1', [id]);
  return result.rows[0] ?? null;
};

/**
 * Names are unique regardless of case
 */
export const isRewardNameTaken = async (db: Queryable, name: string, exceptId?: number): Promise<boolean> => {
  const params: unknown[] = [name];
  let query = 'SELECT id FROM rewards WHERE LOWER(name) = LOWER($1)';
  if (exceptId !== undefined) {
    params.push(exceptId);
    query += ' AND id <> $2';
  }
  const result = await db.query(query, params);
  return result.rows.length > 0;
};

export const listRewards = async (
  db: Queryable,
  search: string | undefined,
  pagination: PaginationQuery
): Promise<{ rows: Reward[]; total: number }> => {
  const params: unknown[] = [];
  let where = '';
  if (search) {
    params.push(`%${search.toLowerCase()}%`);
    where = 'WHERE LOWER(name) LIKE $1 OR LOWER(description) LIKE $1';
  }

  const countResult = await db.query<{ total: number }>(
    `SELECT COUNT(*)::int AS total FROM rewards ${where}`,
    params
  );
  const result = await db.query<Reward>(
    `SELECT * FROM rewards ${where}
     ORDER BY created_at DESC, id DESC
     LIMIT ${pagination.limit} OFFSET ${offsetOf(pagination)}`,
    params
  );

  return { rows: result.rows, total: Number(countResult.rows[0]?.total ?? 0) };
};

/**
 * Application counts per reward, optionally restricted to some statuses
 */
export const countApplicationsByReward = async (
  db: Queryable,
  rewardIds: number[],
  statuses?: readonly ApplicationStatus[]
): Promise<Map<number, number>> => {
  const counts = new Map<number, number>();
  if (rewardIds.length === 0) {
    return counts;
  }

  const params: unknown[] = [...rewardIds];
  let query = `SELECT reward_id, COUNT(*)::int AS count FROM applications WHERE reward_id IN (${placeholders(rewardIds.length)})`;
  if (statuses && statuses.length > 0) {
    query += ` AND status IN (${placeholders(statuses.length, params.length)})`;
    params.push(...statuses);
  }
  query += ' GROUP BY reward_id';

  const result = await db.query<{ reward_id: number; count: number }>(query, params);
  for (const row of result.rows) {
    counts.set(row.reward_id, Number(row.count));
  }
  return counts;
};

export const toRewardResponse = (reward: Reward, applicationsCount: number) => ({
  id: reward.id,
  name: reward.name,
  description: reward.description,
  image: reward.image,
  image_url: getFileUrl(reward.image),
  applications_count: applicationsCount,
  created_at: reward.created_at,
  updated_at: reward.updated_at,
});

export const rewardDetail = async (db: Queryable, reward: Reward) => {
  const [all, pending, approved] = await Promise.all([
    countApplicationsByReward(db, [reward.id]),
    countApplicationsByReward(db, [reward.id], PENDING_STATUSES),
    countApplicationsByReward(db, [reward.id], [APPLICATION_STATUS.AWARDED]),
  ]);

  return {
    ...toRewardResponse(reward, all.get(reward.id) ?? 0),
    pending_applications: pending.get(reward.id) ?? 0,
    approved_applications: approved.get(reward.id) ?? 0,
  };
};

/**
 * `YYYY-MM` keys (UTC) for the current month and the months before it, oldest first
 */
export const monthKeys = (now: Date, count: number = MONTHS_IN_STATS): string[] => {
  const keys: string[] = [];
  for (let back = count - 1; back >= 0; back--) {
    const month = new Date(Date.UTC(now.getUTCFullYear(), now.getUTCMonth() - back, 1));
    keys.push(monthKey(month));
  }
  return keys;
};

const monthKey = (date: Date): string =>
  `${date.getUTCFullYear()}-${String(date.getUTCMonth() + 1).padStart(2, '0')}`;

export const rewardStats = async (db: Queryable, reward: Reward, now: Date = new Date()) => {
  const byStatus = await db.query<{ status: ApplicationStatus; count: number }>(
    'SELECT status, COUNT(*)::int AS count FROM applications WHERE reward_id = $1 GROUP BY status',
    [reward.id]
  );
  const statusBreakdown: Record<string, number> = {};
  for (const status of APPLICATION_STATUSES) {
    statusBreakdown[status] = 0;
  }
  let total = 0;
  for (const row of byStatus.rows) {
    statusBreakdown[row.status] = Number(row.count);
    total += Number(row.count);
  }

  const keys = monthKeys(now);
  const since = new Date(Date.UTC(now.getUTCFullYear(), now.getUTCMonth() - (MONTHS_IN_STATS - 1), 1));
  const recent = await db.query<{ created_at: Date }>(
    'SELECT created_at FROM applications WHERE reward_id = $1 AND created_at >= $2',
    [reward.id, since]
  );
  const perMonth = new Map<string, number>(keys.map(key => [key, 0]));
  for (const row of recent.rows) {
    const key = monthKey(new Date(row.created_at));
    const current = perMonth.get(key);
    if (current !== undefined) {
      perMonth.set(key, current + 1);
    }
  }

  return {
    reward_id: reward.id,
    reward_name: reward.name,
    total_applications: total,
    status_breakdown: statusBreakdown,
    monthly_applications: keys.map(month => ({ month, count: perMonth.get(month) ?? 0 })),
  };
};

/**
 * Best-effort image cleanup; the database change already happened
 */
export const discardImage = async (relativePath: string | null): Promise<void> => {
  if (!relativePath) return;
  try {
    await removeFile(relativePath);
  } catch (error) {
    logger.warn('Failed to remove reward image', { path: relativePath, error: errorMessage(error) });
  }
};
