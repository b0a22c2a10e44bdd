import express from 'express';
import { authenticate } from '../../middlewares/auth.middleware';
import {
  getNotifications,
  getNotification,
  markAsRead,
  markAllAsRead,
  getNotificationStats,
} from './notifications.controller';

const router = express.Router();

// All notification routes require authentication
router.use(authenticate);

router.get('/', getNotifications);
router.get('/stats', getNotificationStats);
router.post('/read-all', markAllAsRead);
router.get('/:id', getNotification);
router.patch('/:id/read', markAsRead);

export default router;
