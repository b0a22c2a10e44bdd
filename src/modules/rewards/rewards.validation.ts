import { z } from 'zod';
import { paginationSchema } from '../../utils/validation';

const rewardFields = z.object({
  name: z
    .string({ required_error: 'Name is required' })
    .trim()
    .min(1, 'Name is required')
    .max(100, 'Name must be at most 100 characters'),
  description: z
    .string({ required_error: 'Description is required' })
    .trim()
    .min(1, 'Description is required'),
});

export const createRewardSchema = rewardFields;
export const updateRewardSchema = rewardFields.partial();

export type CreateRewardInput = z.infer<typeof createRewardSchema>;
export type UpdateRewardInput = z.infer<typeof updateRewardSchema>;

export const rewardListQuerySchema = paginationSchema().and(
  z.object({
    search: z.string().trim().optional(),
  })
);
