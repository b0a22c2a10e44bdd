import { z } from 'zod';
import { paginationSchema } from '../../utils/validation';

export const NOTIFICATION_PAGE_SIZE = 20;
export const NOTIFICATION_MAX_PAGE_SIZE = 100;

export const notificationListQuerySchema = paginationSchema(NOTIFICATION_PAGE_SIZE, NOTIFICATION_MAX_PAGE_SIZE);

export const markAllReadSchema = z.object({
  notification_ids: z
    .array(z.number({ invalid_type_error: 'Must be a number' }).int().positive())
    .optional(),
});
