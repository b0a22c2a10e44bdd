// Notification Model - Based on migration 20251201_000007_create_notifications_table

export type NotificationType =
  | 'application_created'
  | 'application_updated'
  | 'application_rejected'
  | 'reward_won';

export type NotificationStatus = 'pending' | 'sent' | 'failed' | 'cancelled';

export interface Notification {
  id: number;
  content_type: string;
  object_id: number;
  recipient_id: number;
  notification_type: NotificationType;
  title: string;
  status: NotificationStatus;
  sent_time: Date | null;
  read_at: Date | null;
  extra_data: Record<string, unknown>;
  created_at: Date;
}

export interface CreateNotificationInput {
  content_type: string;
  object_id: number;
  recipient_id: number;
  notification_type: NotificationType;
  title: string;
  extra_data?: Record<string, unknown>;
  status?: NotificationStatus;
}
