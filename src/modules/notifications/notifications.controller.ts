import { Response } from 'express';
import { ZodError } from 'zod';
import { pool } from '../../connections';
import { Application, Notification } from '../../connections/db/models';
import { APPLICATION_STATUS_LABELS, AREA_LABELS } from '../../constants/application.constants';
import { AuthRequest } from '../../types/request.types';
import { ResponseHandler } from '../../utils/response';
import { logger } from '../../utils/logging';
import { idSchema, offsetOf } from '../../utils/validation';
import { notificationListQuerySchema, markAllReadSchema } from './notifications.validation';
import {
  APPLICATION_CONTENT_TYPE,
  countNotifications,
  findOwnNotification,
  markNotificationRead,
  toNotificationDetail,
  toNotificationListItem,
} from './notifications.service';

const handleFailure = (res: Response, error: unknown, message: string, context: Record<string, unknown>) => {
  if (error instanceof ZodError) {
    return ResponseHandler.validationError(res, error.issues);
  }
  logger.error(message, { error, ...context });
  return ResponseHandler.internalError(res, message, error);
};

/**
 * Snapshot of the application a notification points at, as it is now
 */
const loadContentObject = async (notification: Notification): Promise<Record<string, unknown> | null> => {
  if (notification.content_type !== APPLICATION_CONTENT_TYPE) {
    return { id: notification.object_id, model: notification.content_type };
  }

  const result = await pool.query<Application & { reward_name: string }>(
    `SELECT a.*, r.name AS reward_name
     FROM applications a
     JOIN rewards r ON r.id = a.reward_id
     WHERE a.id = $1`,
    [notification.object_id]
  );
  const application = result.rows[0];
  if (!application) {
    return null;
  }

  return {
    id: application.id,
    reward_name: application.reward_name,
    status: application.status,
    status_display: APPLICATION_STATUS_LABELS[application.status],
    area: AREA_LABELS[application.area],
    district: application.district,
    activity: application.activity,
    created_at: application.created_at,
  };
};

// GET /notifications
export const getNotifications = async (req: AuthRequest, res: Response) => {
  const userId = req.user?.id;
  try {
    if (!userId) {
      return ResponseHandler.unauthorized(res);
    }

    const { page, limit } = notificationListQuerySchema.parse(req.query);
    const stats = await countNotifications(pool, userId);

    const result = await pool.query<Notification>(
      `SELECT * FROM notifications
       WHERE recipient_id = $1
       ORDER BY created_at DESC, id DESC
       LIMIT ${limit} OFFSET ${offsetOf({ page, limit })}`,
      [userId]
    );

    return ResponseHandler.paginated(
      res,
      result.rows.map(toNotificationListItem),
      { page, limit, total: stats.total_count },
      'Notifications retrieved',
      { stats }
    );
  } catch (error) {
    return handleFailure(res, error, 'Failed to fetch notifications', { userId, ip: req.ip });
  }
};

// GET /notifications/:id - opening a notification marks it read
export const getNotification = async (req: AuthRequest, res: Response) => {
  const userId = req.user?.id;
  try {
    if (!userId) {
      return ResponseHandler.unauthorized(res);
    }

    const id = idSchema.safeParse(req.params.id);
    const notification = id.success ? await findOwnNotification(pool, id.data, userId) : null;
    if (!notification) {
      return ResponseHandler.notFound(res, 'Notification not found');
    }

    const wasMarkedAsRead = await markNotificationRead(pool, notification.id);
    const current = wasMarkedAsRead ? await findOwnNotification(pool, notification.id, userId) : notification;

    return ResponseHandler.success(res, {
      ...toNotificationDetail(current ?? notification, await loadContentObject(notification)),
      was_marked_as_read: wasMarkedAsRead,
    });
  } catch (error) {
    return handleFailure(res, error, 'Failed to fetch notification', { userId, notificationId: req.params.id });
  }
};

// PATCH /notifications/:id/read
export const markAsRead = async (req: AuthRequest, res: Response) => {
  const userId = req.user?.id;
  try {
    if (!userId) {
      return ResponseHandler.unauthorized(res);
    }

    const id = idSchema.safeParse(req.params.id);
    const notification = id.success ? await findOwnNotification(pool, id.data, userId) : null;
    if (!notification) {
      return ResponseHandler.notFound(res, 'Notification not found');
    }

    const wasUnread = await markNotificationRead(pool, notification.id);

    return ResponseHandler.success(
      res,
      { was_unread: wasUnread, is_read: true },
      wasUnread ? 'Notification marked as read' : 'Notification was already read'
    );
  } catch (error) {
    return handleFailure(res, error, 'Failed to mark notification as read', { userId, notificationId: req.params.id });
  }
};

// POST /notifications/read-all - every unread one, or only the listed ids
export const markAllAsRead = async (req: AuthRequest, res: Response) => {
  const userId = req.user?.id;
  try {
    if (!userId) {
      return ResponseHandler.unauthorized(res);
    }

    const { notification_ids: ids } = markAllReadSchema.parse(req.body ?? {});

    const params: unknown[] = [userId];
    let idFilter = '';
    if (ids && ids.length > 0) {
      const placeholders = ids.map((id) => {
        params.push(id);
        return `$${params.length}`;
      });
      idFilter = ` AND id IN (${placeholders.join(', ')})`;
    }

    const before = await pool.query<{ count: number }>(
      `SELECT COUNT(*)::int AS count FROM notifications WHERE recipient_id = $1 AND read_at IS NULL${idFilter}`,
      params
    );

    params.push(new Date());
    const updated = await pool.query(
      `UPDATE notifications SET read_at = $${params.length}
       WHERE recipient_id = $1 AND read_at IS NULL${idFilter}
       RETURNING id`,
      params
    );

    const updatedCount = updated.rows.length;

    return ResponseHandler.success(
      res,
      {
        updated_count: updatedCount,
        total_unread_before: Number(before.rows[0]?.count ?? 0),
      },
      `${updatedCount} notification(s) marked as read`
    );
  } catch (error) {
    return handleFailure(res, error, 'Failed to mark notifications as read', { userId });
  }
};

// GET /notifications/stats
export const getNotificationStats = async (req: AuthRequest, res: Response) => {
  const userId = req.user?.id;
  try {
    if (!userId) {
      return ResponseHandler.unauthorized(res);
    }

    const counts = await countNotifications(pool, userId);

    const byType = await pool.query<{ notification_type: string; count: number }>(
      `SELECT notification_type, COUNT(*)::int AS count
       FROM notifications
       WHERE recipient_id = $1
       GROUP BY notification_type`,
      [userId]
    );

    const recent = await pool.query<Notification>(
      `SELECT * FROM notifications
       WHERE recipient_id = $1
       ORDER BY created_at DESC, id DESC
       LIMIT 5`,
      [userId]
    );

    const notificationsByType: Record<string, number> = {};
    for (const row of byType.rows) {
      notificationsByType[row.notification_type] = Number(row.count);
    }

    return ResponseHandler.success(res, {
      ...counts,
      notifications_by_type: notificationsByType,
      recent_notifications: recent.rows.map(toNotificationListItem),
    });
  } catch (error) {
    return handleFailure(res, error, 'Failed to fetch notification stats', { userId });
  }
};
