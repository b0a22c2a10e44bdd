import express from 'express';
import * as rewardsController from './rewards.controller';
import { authenticate, requireStaff } from '../../middlewares/auth.middleware';
import { rewardImageMiddleware } from './rewards.upload';

const router = express.Router();

router.use(authenticate);

router.get('/', rewardsController.getRewards);
router.get('/:id', rewardsController.getReward);

// Catalog management (staff only)
router.post('/', requireStaff, rewardImageMiddleware, rewardsController.createReward);
router.patch('/:id', requireStaff, rewardImageMiddleware, rewardsController.updateReward);
router.delete('/:id', requireStaff, rewardsController.deleteReward);
router.get('/:id/stats', requireStaff, rewardsController.getRewardStats);
router.get('/:id/applications', requireStaff, rewardsController.getRewardApplications);

export default router;
