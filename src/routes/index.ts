import express from 'express';
import authRoutes from '../modules/auth/auth.routes';
import usersRoutes from '../modules/users/users.routes';
import rewardsRoutes from '../modules/rewards/rewards.routes';
import applicationsRoutes from '../modules/applications/applications.routes';
import notificationRoutes from '../modules/notifications/notifications.routes';

const router = express.Router();

// API Routes
router.use('/auth', authRoutes);
router.use('/users', usersRoutes);
router.use('/rewards', rewardsRoutes);
router.use('/applications', applicationsRoutes);
router.use('/notifications', notificationRoutes);

export default router;
