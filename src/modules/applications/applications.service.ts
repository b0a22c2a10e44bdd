import { Queryable, withTransaction } from '../../connections/db/connection';
import { Application, Certificate, Notification } from '../../connections/db/models';
import {
  APPLICATION_STATUS_LABELS,
  APPLICATION_STATUSES,
  ApplicationStatus,
  AreaCode,
  AREA_LABELS,
} from '../../constants/application.constants';
import { PaginationQuery } from '../../types/request.types';
import { offsetOf } from '../../utils/validation';
import { getFileUrl } from '../upload/localStorage.service';
import { buildStatusNotification, notifyApplicationOwner } from '../notifications/notifications.service';

export interface ApplicationRow extends Application {
  reward_name: string;
  reward_description: string;
  reward_image: string | null;
  user_first_name: string;
  user_last_name: string;
  user_pinfl: string | null;
  user_phone_number: string;
}

const APPLICATION_SELECT = `
  SELECT a.*,
         r.name AS reward_name,
         r.description AS reward_description,
         r.image AS reward_image,
         u.first_name AS user_first_name,
         u.last_name AS user_last_name,
         u.pinfl AS user_pinfl,
         u.phone_number AS user_phone_number
  FROM applications a
  JOIN rewards r ON r.id = a.reward_id
  JOIN users u ON u.id = a.user_id
`;

export interface ApplicationFilters {
  userId?: number;
  rewardId?: number;
  status?: ApplicationStatus;
  area?: AreaCode;
  search?: string;
}

const buildFilter = (filters: ApplicationFilters): { where: string; params: unknown[] } => {
  const conditions: string[] = [];
  const params: unknown[] = [];

  if (filters.userId !== undefined) {
    params.push(filters.userId);
    conditions.push(`a.user_id = $${params.length}`);
  }
  if (filters.rewardId !== undefined) {
    params.push(filters.rewardId);
    conditions.push(`a.reward_id = $${params.length}`);
  }
  if (filters.status !== undefined) {
    params.push(filters.status);
    conditions.push(`a.status = $${params.length}`);
  }
  if (filters.area !== undefined) {
    params.push(filters.area);
    conditions.push(`a.area = $${params.length}`);
  }
  if (filters.search) {
    params.push(`%${filters.search.toLowerCase()}%`);
    const p = `$${params.length}`;
    conditions.push(
      `(LOWER(u.first_name) LIKE ${p} OR LOWER(u.last_name) LIKE ${p} OR u.pinfl LIKE ${p} OR LOWER(r.name) LIKE ${p})`
    );
  }

  return {
    where: conditions.length > 0 ? `WHERE ${conditions.join(' AND ')}` : '',
    params,
  };
};

export const listApplications = async (
  db: Queryable,
  filters: ApplicationFilters,
  pagination: PaginationQuery
): Promise<{ rows: ApplicationRow[]; total: number; certificateCounts: Map<number, number> }> => {
  const { where, params } = buildFilter(filters);

  const countResult = await db.query<{ total: number }>(
    `SELECT COUNT(*)::int AS total
     FROM applications a
     JOIN rewards r ON r.id = a.reward_id
     JOIN users u ON u.id = a.user_id
     ${where}`,
    params
  );

  const result = await db.query<ApplicationRow>(
    `${APPLICATION_SELECT}
     ${where}
     ORDER BY a.created_at DESC, a.id DESC
     LIMIT ${pagination.limit} OFFSET ${offsetOf(pagination)}`,
    params
  );

  return {
    rows: result.rows,
    total: Number(countResult.rows[0]?.total ?? 0),
    certificateCounts: await countCertificates(db, result.rows.map(row => row.id)),
  };
};

const countCertificates = async (db: Queryable, applicationIds: number[]): Promise<Map<number, number>> => {
  const counts = new Map<number, number>();
  if (applicationIds.length === 0) {
    return counts;
  }

  const placeholders = applicationIds.map((_, index) => `$${index + 1}`).join(', ');
  const result = await db.query<{ application_id: number; count: number }>(
    `SELECT application_id, COUNT(*)::int AS count
     FROM certificates
     WHERE application_id IN (${placeholders})
     GROUP BY application_id`,
    applicationIds
  );
  for (const row of result.rows) {
    counts.set(row.application_id, Number(row.count));
  }
  return counts;
};

/**
 * List entry; personal fields are only filled in for staff
 */
export const toApplicationListItem = (row: ApplicationRow, isStaff: boolean, certificatesCount: number) => ({
  id: row.id,
  reward_id: row.reward_id,
  reward_name: row.reward_name,
  status: row.status,
  status_display: APPLICATION_STATUS_LABELS[row.status],
  source: row.source,
  has_recommendation_letter: row.recommendation_letter !== null,
  certificates_count: certificatesCount,
  created_at: row.created_at,
  updated_at: row.updated_at,
  user_full_name: isStaff ? `${row.user_first_name} ${row.user_last_name}`.trim() : null,
  pinfl: isStaff ? row.user_pinfl : null,
  phone_number: isStaff ? row.user_phone_number : null,
  area_display: isStaff ? AREA_LABELS[row.area] : null,
});

export const findApplicationRow = async (db: Queryable, id: number): Promise<ApplicationRow | null> => {
  const result = await db.query<ApplicationRow>(`${APPLICATION_SELECT} WHERE a.id = $1`, [id]);
  return result.rows[0] ?? null;
};

export const findCertificates = async (db: Queryable, applicationId: number): Promise<Certificate[]> => {
  const result = await db.query<Certificate>(
    'SELECT * FROM certificates WHERE application_id = $1 ORDER BY created_at ASC, id ASC',
    [applicationId]
  );
  return result.rows;
};

const baseName = (filePath: string): string => filePath.split('/').pop() ?? filePath;

export const toApplicationDetail = (row: ApplicationRow, certificates: Certificate[]) => ({
  id: row.id,
  reward_id: row.reward_id,
  reward_name: row.reward_name,
  reward_image_url: getFileUrl(row.reward_image),
  status: row.status,
  status_display: APPLICATION_STATUS_LABELS[row.status],
  source: row.source,
  personal_info: {
    first_name: row.user_first_name,
    last_name: row.user_last_name,
    pinfl: row.user_pinfl,
    phone_number: row.user_phone_number,
    area: row.area,
    area_display: AREA_LABELS[row.area],
    district: row.district,
    neighborhood: row.neighborhood,
  },
  activity_info: {
    activity: row.activity,
    activity_description: row.activity_description,
  },
  documents: {
    recommendation_letter: {
      exists: row.recommendation_letter !== null,
      file_name: row.recommendation_letter ? baseName(row.recommendation_letter) : null,
      file_url: getFileUrl(row.recommendation_letter),
    },
    certificates: certificates.map(certificate => ({
      id: certificate.id,
      file_name: certificate.original_name ?? baseName(certificate.file),
      file_size: certificate.file_size,
      file_url: getFileUrl(certificate.file),
      uploaded_at: certificate.created_at,
    })),
  },
  created_at: row.created_at,
  updated_at: row.updated_at,
});

export interface StatusChangeResult {
  application: Application;
  previousStatus: ApplicationStatus;
  changed: boolean;
  notification: Notification | null;
}

/**
 * Compare-and-set on the loaded status: the UPDATE only applies while the row still
 * holds the status read in this transaction, so a transition notifies at most once.
 */
export const changeApplicationStatus = async (
  applicationId: number,
  newStatus: ApplicationStatus
): Promise<StatusChangeResult | null> =>
  withTransaction(async (client) => {
    const current = await findApplicationRow(client, applicationId);
    if (!current) {
      return null;
    }

    const unchanged = { application: current, previousStatus: current.status, changed: false, notification: null };
    if (current.status === newStatus) {
      return unchanged;
    }

    const updated = await client.query<Application>(
      `UPDATE applications SET status = $1, updated_at = $2
       WHERE id = $3 AND status = $4
       RETURNING *`,
      [newStatus, new Date(), applicationId, current.status]
    );
    const application = updated.rows[0];
    if (!application) {
      return unchanged;
    }

    const draft = buildStatusNotification({
      oldStatus: current.status,
      newStatus,
      rewardName: current.reward_name,
      rewardDescription: current.reward_description,
    });
    const notification = draft ? await notifyApplicationOwner(client, application, draft) : null;

    return { application, previousStatus: current.status, changed: true, notification };
  });

export const applicationStats = async (db: Queryable, now: Date = new Date()) => {
  const total = await db.query<{ count: number }>('SELECT COUNT(*)::int AS count FROM applications');

  const byStatus = await db.query<{ status: ApplicationStatus; count: number }>(
    'SELECT status, COUNT(*)::int AS count FROM applications GROUP BY status'
  );
  const statusBreakdown: Record<string, number> = {};
  for (const status of APPLICATION_STATUSES) {
    statusBreakdown[status] = 0;
  }
  for (const row of byStatus.rows) {
    statusBreakdown[row.status] = Number(row.count);
  }

  const bySource = await db.query<{ source: string | null; count: number }>(
    'SELECT source, COUNT(*)::int AS count FROM applications GROUP BY source'
  );
  const sourceBreakdown: Record<string, number> = {};
  for (const row of bySource.rows) {
    sourceBreakdown[row.source ?? 'unknown'] = Number(row.count);
  }

  const weekAgo = new Date(now.getTime() - 7 * 24 * 60 * 60 * 1000);
  const recent = await db.query<{ count: number }>(
    'SELECT COUNT(*)::int AS count FROM applications WHERE created_at >= $1',
    [weekAgo]
  );

  const byReward = await db.query<{ reward_id: number; count: number }>(
    'SELECT reward_id, COUNT(*)::int AS count FROM applications GROUP BY reward_id'
  );
  const top = byReward.rows
    .map(row => ({ reward_id: row.reward_id, count: Number(row.count) }))
    .sort((a, b) => b.count - a.count || a.reward_id - b.reward_id)
    .slice(0, 5);

  const names = new Map<number, string>();
  if (top.length > 0) {
    const placeholders = top.map((_, index) => `$${index + 1}`).join(', ');
    const rewards = await db.query<{ id: number; name: string }>(
      `SELECT id, name FROM rewards WHERE id IN (${placeholders})`,
      top.map(entry => entry.reward_id)
    );
    for (const reward of rewards.rows) {
      names.set(reward.id, reward.name);
    }
  }

  return {
    total_applications: Number(total.rows[0]?.count ?? 0),
    status_breakdown: statusBreakdown,
    source_breakdown: sourceBreakdown,
    last_7_days: Number(recent.rows[0]?.count ?? 0),
    top_rewards: top.map(entry => ({
      reward_id: entry.reward_id,
      reward_name: names.get(entry.reward_id) ?? null,
      count: entry.count,
    })),
  };
};
