import { Response } from 'express';
import { ZodError } from 'zod';
import { pool } from '../../connections';
import { Reward } from '../../connections/db/models';
import { AuthRequest } from '../../types/request.types';
import { ResponseHandler } from '../../utils/response';
import { logger, auditLog, errorMessage } from '../../utils/logging';
import { idSchema } from '../../utils/validation';
import { saveFileToLocal, STORAGE_DIRS } from '../upload/localStorage.service';
import { listApplications, toApplicationListItem } from '../applications/applications.service';
import { rewardApplicationsQuerySchema } from '../applications/applications.validation';
import { createRewardSchema, rewardListQuerySchema, updateRewardSchema } from './rewards.validation';
import {
  countApplicationsByReward,
  discardImage,
  findRewardById,
  isRewardNameTaken,
  listRewards,
  rewardDetail,
  rewardStats,
  toRewardResponse,
} from './rewards.service';

const NAME_TAKEN = { name: ['Reward with this name already exists.'] };

const handleFailure = (res: Response, error: unknown, message: string, context: Record<string, unknown>) => {
  if (error instanceof ZodError) {
    return ResponseHandler.validationError(res, error.issues);
  }
  logger.error(message, { error: errorMessage(error), ...context });
  return ResponseHandler.internalError(res, message, error);
};

const loadReward = async (rawId: string): Promise<Reward | null> => {
  const id = idSchema.safeParse(rawId);
  return id.success ? findRewardById(pool, id.data) : null;
};

// GET /rewards
export const getRewards = async (req: AuthRequest, res: Response) => {
  try {
    const { page, limit, search } = rewardListQuerySchema.parse(req.query);
    const { rows, total } = await listRewards(pool, search, { page, limit });
    const counts = await countApplicationsByReward(pool, rows.map(reward => reward.id));

    return ResponseHandler.paginated(
      res,
      rows.map(reward => toRewardResponse(reward, counts.get(reward.id) ?? 0)),
      { page, limit, total },
      'Rewards retrieved'
    );
  } catch (error) {
    return handleFailure(res, error, 'Failed to list rewards', { userId: req.user?.id });
  }
};

// GET /rewards/:id
export const getReward = async (req: AuthRequest, res: Response) => {
  try {
    const reward = await loadReward(req.params.id);
    if (!reward) {
      return ResponseHandler.notFound(res, 'Reward not found');
    }
    return ResponseHandler.success(res, await rewardDetail(pool, reward));
  } catch (error) {
    return handleFailure(res, error, 'Failed to fetch reward', { rewardId: req.params.id });
  }
};

// POST /rewards (staff, multipart)
export const createReward = async (req: AuthRequest, res: Response) => {
  try {
    const input = createRewardSchema.parse(req.body);
    if (await isRewardNameTaken(pool, input.name)) {
      return ResponseHandler.badRequest(res, 'Invalid data', NAME_TAKEN, 'VALIDATION_ERROR');
    }

    const image = req.file ? await saveFileToLocal(req.file.buffer, req.file.originalname, STORAGE_DIRS.REWARDS) : null;

    let reward: Reward;
    try {
      const result = await pool.query<Reward>(
        `INSERT INTO rewards (name, description, image)
         VALUES ($1, $2, $3)
         RETURNING *`,
        [input.name, input.description, image]
      );
      reward = result.rows[0];
    } catch (error) {
      await discardImage(image);
      throw error;
    }

    auditLog('REWARD_CREATED', { rewardId: reward.id, by: req.user?.id });
    return ResponseHandler.created(res, toRewardResponse(reward, 0), 'Reward created');
  } catch (error) {
    return handleFailure(res, error, 'Failed to create reward', { userId: req.user?.id });
  }
};

// PATCH /rewards/:id (staff, multipart)
export const updateReward = async (req: AuthRequest, res: Response) => {
  try {
    const existing = await loadReward(req.params.id);
    if (!existing) {
      return ResponseHandler.notFound(res, 'Reward not found');
    }

    const input = updateRewardSchema.parse(req.body);
    if (input.name !== undefined && (await isRewardNameTaken(pool, input.name, existing.id))) {
      return ResponseHandler.badRequest(res, 'Invalid data', NAME_TAKEN, 'VALIDATION_ERROR');
    }

    const image = req.file
      ? await saveFileToLocal(req.file.buffer, req.file.originalname, STORAGE_DIRS.REWARDS)
      : existing.image;

    let reward: Reward;
    try {
      const result = await pool.query<Reward>(
        `UPDATE rewards
         SET name = $1, description = $2, image = $3, updated_at = NOW()
         WHERE id = $4
         RETURNING *`,
        [input.name ?? existing.name, input.description ?? existing.description, image, existing.id]
      );
      reward = result.rows[0];
    } catch (error) {
      if (req.file) await discardImage(image);
      throw error;
    }

    if (req.file) {
      await discardImage(existing.image);
    }

    const counts = await countApplicationsByReward(pool, [reward.id]);
    return ResponseHandler.success(res, toRewardResponse(reward, counts.get(reward.id) ?? 0), 'Reward updated');
  } catch (error) {
    return handleFailure(res, error, 'Failed to update reward', { userId: req.user?.id });
  }
};

// DELETE /rewards/:id (staff)
export const deleteReward = async (req: AuthRequest, res: Response) => {
  try {
    const reward = await loadReward(req.params.id);
    if (!reward) {
      return ResponseHandler.notFound(res, 'Reward not found');
    }

    const applicationsCount = (await countApplicationsByReward(pool, [reward.id])).get(reward.id) ?? 0;
    if (applicationsCount > 0) {
      return ResponseHandler.badRequest(
        res,
        'Cannot delete a reward that has applications',
        { applications_count: applicationsCount },
        'REWARD_IN_USE'
      );
    }

    await pool.query('DELETE FROM rewards WHERE id = $1', [reward.id]);
    await discardImage(reward.image);

    auditLog('REWARD_DELETED', { rewardId: reward.id, by: req.user?.id });
    return ResponseHandler.success(res, null, 'Reward deleted');
  } catch (error) {
    return handleFailure(res, error, 'Failed to delete reward', { userId: req.user?.id });
  }
};

// GET /rewards/:id/stats (staff)
export const getRewardStats = async (req: AuthRequest, res: Response) => {
  try {
    const reward = await loadReward(req.params.id);
    if (!reward) {
      return ResponseHandler.notFound(res, 'Reward not found');
    }
    return ResponseHandler.success(res, await rewardStats(pool, reward));
  } catch (error) {
    return handleFailure(res, error, 'Failed to load reward statistics', { rewardId: req.params.id });
  }
};

// GET /rewards/:id/applications (staff)
export const getRewardApplications = async (req: AuthRequest, res: Response) => {
  try {
    const reward = await loadReward(req.params.id);
    if (!reward) {
      return ResponseHandler.notFound(res, 'Reward not found');
    }

    const { page, limit, status, area } = rewardApplicationsQuerySchema.parse(req.query);
    const { rows, total, certificateCounts } = await listApplications(
      pool,
      { rewardId: reward.id, status, area },
      { page, limit }
    );

    return ResponseHandler.paginated(
      res,
      rows.map(row => toApplicationListItem(row, true, certificateCounts.get(row.id) ?? 0)),
      { page, limit, total },
      'Applications retrieved',
      { reward: { id: reward.id, name: reward.name } }
    );
  } catch (error) {
    return handleFailure(res, error, 'Failed to list reward applications', { rewardId: req.params.id });
  }
};
