import { z } from 'zod';
import { AREA_CODES, APPLICATION_STATUSES, isApplicationStatus } from '../../constants/application.constants';
import { PHONE_REGEX } from '../../constants/user.constants';
import { paginationSchema, idSchema } from '../../utils/validation';
import { pinflSchema } from '../auth/auth.validation';

const required = 'This field is required';

export const rewardIdSchema = z.object({
  reward_id: idSchema,
});

const applicationStatus = z.string().refine(isApplicationStatus, {
  message: `Status must be one of: ${APPLICATION_STATUSES.join(', ')}`,
});

// Wizard step 1: personal information
export const step1Schema = z.object({
  reward_id: idSchema,
  first_name: z.string({ required_error: required }).trim().min(1, required).max(50),
  last_name: z.string({ required_error: required }).trim().min(1, required).max(50),
  pinfl: pinflSchema,
  phone_number: z
    .string({ required_error: required })
    .trim()
    .regex(PHONE_REGEX, 'Phone number must contain at least 9 digits'),
  area: z.enum(AREA_CODES, { errorMap: () => ({ message: 'Select a valid region' }) }),
  district: z.string({ required_error: required }).trim().min(1, required).max(200),
  neighborhood: z.string({ required_error: required }).trim().min(1, required).max(200),
});

export type Step1Data = z.infer<typeof step1Schema>;

// Wizard step 2: activity information
export const step2Schema = z.object({
  activity: z.string({ required_error: required }).trim().min(1, required).max(200, 'Activity must be at most 200 characters'),
  activity_description: z
    .string({ required_error: required })
    .trim()
    .min(50, 'Activity description must be at least 50 characters'),
});

export type Step2Data = z.infer<typeof step2Schema>;

export const storedFileSchema = z.object({
  original_name: z.string(),
  file_path: z.string(),
  file_size: z.number(),
});

// Wizard step 3: staged document metadata (the files themselves live on disk)
export const step3DataSchema = z.object({
  recommendation_letter: storedFileSchema.nullable(),
  certificates: z.array(storedFileSchema),
});

export type Step3Data = z.infer<typeof step3DataSchema>;

export const draftSchema = z.object({
  reward_id: z.number().int().positive(),
  current_step: z.number().int().min(1).max(4),
  step1_data: step1Schema.optional(),
  step2_data: step2Schema.optional(),
  step3_data: step3DataSchema.optional(),
});

export type WizardDraft = z.infer<typeof draftSchema>;

export const applicationListQuerySchema = paginationSchema(10).and(
  z.object({
    status: applicationStatus.optional(),
    reward_id: idSchema.optional(),
    area: z.enum(AREA_CODES).optional(),
    search: z.string().trim().optional(),
  })
);

export const rewardApplicationsQuerySchema = paginationSchema(10).and(
  z.object({
    status: applicationStatus.optional(),
    area: z.enum(AREA_CODES).optional(),
  })
);

export const updateStatusSchema = z.object({
  status: applicationStatus,
});
