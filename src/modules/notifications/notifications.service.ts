import { Queryable } from '../../connections/db/connection';
import {
  Application,
  Notification,
  NotificationType,
  CreateNotificationInput,
} from '../../connections/db/models';
import {
  APPLICATION_STATUS,
  APPLICATION_STATUS_LABELS,
  ApplicationStatus,
  AREA_LABELS,
  IN_PROCESS_STATUSES,
} from '../../constants/application.constants';

export const APPLICATION_CONTENT_TYPE = 'application';

export interface NotificationDraft {
  notification_type: NotificationType;
  title: string;
  extra_data: Record<string, unknown>;
}

export interface StatusTransition {
  oldStatus: ApplicationStatus;
  newStatus: ApplicationStatus;
  rewardName: string;
  rewardDescription: string;
  now?: Date;
}

/**
 * Maps a status change to the notification it produces.
 * No change, or a move back to `submitted`, produces nothing.
 */
export const buildStatusNotification = ({
  oldStatus,
  newStatus,
  rewardName,
  rewardDescription,
  now = new Date(),
}: StatusTransition): NotificationDraft | null => {
  if (oldStatus === newStatus) {
    return null;
  }

  if (IN_PROCESS_STATUSES.includes(newStatus)) {
    const stage = APPLICATION_STATUS_LABELS[newStatus];
    return {
      notification_type: 'application_updated',
      title: `Your application is under review. Current stage: ${stage}.`,
      extra_data: {
        reward_name: rewardName,
        old_status: oldStatus,
        new_status: newStatus,
        status_display: stage,
      },
    };
  }

  switch (newStatus) {
    case APPLICATION_STATUS.FINAL_REVIEW:
      return {
        notification_type: 'application_updated',
        title: 'Application status updated',
        extra_data: {
          reward_name: rewardName,
          updated_date: now.toISOString(),
        },
      };
    case APPLICATION_STATUS.AWARDED:
      return {
        notification_type: 'reward_won',
        title: `Congratulations! Your application for '${rewardName}' passed every stage and you have been selected for this award.`,
        extra_data: {
          reward_name: rewardName,
          reward_description: rewardDescription,
          won_date: now.toISOString(),
        },
      };
    case APPLICATION_STATUS.REJECTED:
      return {
        notification_type: 'application_rejected',
        title: `Unfortunately, your application for '${rewardName}' was rejected.`,
        extra_data: {
          reward_name: rewardName,
          rejected_date: now.toISOString(),
        },
      };
    default:
      return null;
  }
};

export const buildCreatedNotification = (
  application: Pick<Application, 'area' | 'district' | 'activity'>,
  rewardName: string
): NotificationDraft => ({
  notification_type: 'application_created',
  title: `Your application for the '${rewardName}' award was submitted successfully.`,
  extra_data: {
    reward_name: rewardName,
    area: AREA_LABELS[application.area],
    district: application.district,
    activity: application.activity,
  },
});

/**
 * Stored already delivered: the feed itself is the delivery channel
 */
export const createNotification = async (db: Queryable, input: CreateNotificationInput): Promise<Notification> => {
  const now = new Date();
  const result = await db.query<Notification>(
    `INSERT INTO notifications (
       content_type, object_id, recipient_id, notification_type, title, status, sent_time, extra_data, created_at
     )
     VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9)
     RETURNING *`,
    [
      input.content_type,
      input.object_id,
      input.recipient_id,
      input.notification_type,
      input.title,
      input.status ?? 'sent',
      now,
      JSON.stringify(input.extra_data ?? {}),
      now,
    ]
  );
  return result.rows[0];
};

export const notifyApplicationOwner = (
  db: Queryable,
  application: Pick<Application, 'id' | 'user_id'>,
  draft: NotificationDraft
): Promise<Notification> =>
  createNotification(db, {
    content_type: APPLICATION_CONTENT_TYPE,
    object_id: application.id,
    recipient_id: application.user_id,
    ...draft,
  });

export interface NotificationCounts {
  total_count: number;
  unread_count: number;
  read_count: number;
}

export const countNotifications = async (db: Queryable, recipientId: number): Promise<NotificationCounts> => {
  const total = await db.query<{ count: number }>(
    'SELECT COUNT(*)::int AS count FROM notifications WHERE recipient_id = $1',
    [recipientId]
  );
  const unread = await db.query<{ count: number }>(
    'SELECT COUNT(*)::int AS count FROM notifications WHERE recipient_id = $1 AND read_at IS NULL',
    [recipientId]
  );

  const totalCount = Number(total.rows[0]?.count ?? 0);
  const unreadCount = Number(unread.rows[0]?.count ?? 0);
  return {
    total_count: totalCount,
    unread_count: unreadCount,
    read_count: totalCount - unreadCount,
  };
};

export const findOwnNotification = async (
  db: Queryable,
  id: number,
  recipientId: number
): Promise<Notification | null> => {
  const result = await db.query<Notification>(
    'SELECT * FROM notifications WHERE id = $1 AND recipient_id = $2',
    [id, recipientId]
  );
  return result.rows[0] ?? null;
};

/**
 * Sets read_at only where it is still NULL
 * @returns whether this call flipped the notification to read
 */
export const markNotificationRead = async (db: Queryable, id: number): Promise<boolean> => {
  const result = await db.query(
    'UPDATE notifications SET read_at = $1 WHERE id = $2 AND read_at IS NULL RETURNING id',
    [new Date(), id]
  );
  return result.rows.length > 0;
};

const timeSince = (from: Date, now: Date = new Date()): string => {
  const seconds = Math.max(0, Math.floor((now.getTime() - from.getTime()) / 1000));
  const units: Array<[string, number]> = [
    ['day', 86400],
    ['hour', 3600],
    ['minute', 60],
  ];
  for (const [unit, size] of units) {
    const count = Math.floor(seconds / size);
    if (count >= 1) {
      return `${count} ${unit}${count === 1 ? '' : 's'}`;
    }
  }
  return '0 minutes';
};

export const toNotificationListItem = (notification: Notification) => ({
  id: notification.id,
  title: notification.title,
  notification_type: notification.notification_type,
  created_at: notification.created_at,
  is_read: notification.read_at !== null,
  time_since: timeSince(new Date(notification.created_at)),
});

export const toNotificationDetail = (
  notification: Notification,
  contentObject: Record<string, unknown> | null
) => ({
  ...toNotificationListItem(notification),
  sent_time: notification.sent_time,
  read_at: notification.read_at,
  status: notification.status,
  extra_data: notification.extra_data,
  content_object_data: contentObject,
});
