import { Response } from 'express';
import { ZodError } from 'zod';
import { pool } from '../../connections';
import { Reward } from '../../connections/db/models';
import { AuthRequest } from '../../types/request.types';
import { ResponseHandler } from '../../utils/response';
import { logger, auditLog, errorMessage } from '../../utils/logging';
import { stageFile } from '../upload/localStorage.service';
import { findUserById } from '../users/users.service';
import { rewardIdSchema, step1Schema, step2Schema, Step3Data } from './applications.validation';
import {
  ApplicationExistsError,
  RewardNotFoundError,
  clearDraft,
  discardFiles,
  draftProgress,
  isComplete,
  loadDraft,
  missingSteps,
  saveStep,
  stagedFiles,
  submitApplication,
  SubmissionResult,
} from './wizard.service';
import { findApplicationRow, findCertificates, toApplicationDetail } from './applications.service';

const handleFailure = (res: Response, error: unknown, message: string, context: Record<string, unknown>) => {
  if (error instanceof ZodError) {
    return ResponseHandler.validationError(res, error.issues);
  }
  logger.error(message, { error: errorMessage(error), ...context });
  return ResponseHandler.internalError(res, message, error);
};

/**
 * reward_id from the body first, then the query string
 */
const rewardIdFrom = (req: AuthRequest): number =>
  rewardIdSchema.parse({ reward_id: req.body?.reward_id ?? req.query.reward_id }).reward_id;

const findReward = async (rewardId: number): Promise<Reward | null> => {
  const result = await pool.query<Reward>('SELECT * FROM rewards WHERE id = $1', [rewardId]);
  return result.rows[0] ?? null;
};

const findExistingApplication = async (userId: number, rewardId: number) => {
  const result = await pool.query<{ id: number; status: string }>(
    'SELECT id, status FROM applications WHERE user_id = $1 AND reward_id = $2',
    [userId, rewardId]
  );
  return result.rows[0] ?? null;
};

const applicationExists = (res: Response, existing: { id: number; status: string } | null) =>
  ResponseHandler.badRequest(
    res,
    'You have already applied for this reward',
    existing ? { existing_application_id: existing.id, existing_application_status: existing.status } : undefined,
    'APPLICATION_EXISTS'
  );

const stepOrder = (res: Response, message: string) =>
  ResponseHandler.badRequest(res, message, undefined, 'STEP_ORDER');

// GET /wizard/step1 - saved data, or a profile pre-fill
export const getStep1 = async (req: AuthRequest, res: Response) => {
  try {
    if (!req.user) return ResponseHandler.unauthorized(res);

    const rewardId = rewardIdFrom(req);
    const draft = await loadDraft(req.user.id, rewardId);
    if (draft?.step1_data) {
      return ResponseHandler.success(res, draft.step1_data, 'Success', 200, { current_step: 1 });
    }

    const user = await findUserById(pool, req.user.id);
    return ResponseHandler.success(
      res,
      {
        reward_id: rewardId,
        first_name: user?.first_name ?? '',
        last_name: user?.last_name ?? '',
        pinfl: user?.pinfl ?? '',
        phone_number: user?.phone_number ?? '',
        area: '',
        district: '',
        neighborhood: '',
      },
      'Success',
      200,
      { current_step: 1 }
    );
  } catch (error) {
    return handleFailure(res, error, 'Failed to load step 1', { userId: req.user?.id });
  }
};

// POST /wizard/step1
export const saveStep1 = async (req: AuthRequest, res: Response) => {
  try {
    if (!req.user) return ResponseHandler.unauthorized(res);

    const data = step1Schema.parse(req.body);

    if (!(await findReward(data.reward_id))) {
      return ResponseHandler.badRequest(res, 'Invalid data', { reward_id: ['Reward not found'] }, 'VALIDATION_ERROR');
    }

    const existing = await findExistingApplication(req.user.id, data.reward_id);
    if (existing) {
      return applicationExists(res, existing);
    }

    await saveStep(req.user.id, data.reward_id, { step: 1, data });

    return ResponseHandler.success(res, data, 'Personal information saved', 200, { next_step: 2 });
  } catch (error) {
    return handleFailure(res, error, 'Failed to save step 1', { userId: req.user?.id });
  }
};

// GET /wizard/step2
export const getStep2 = async (req: AuthRequest, res: Response) => {
  try {
    if (!req.user) return ResponseHandler.unauthorized(res);

    const draft = await loadDraft(req.user.id, rewardIdFrom(req));
    return ResponseHandler.success(res, draft?.step2_data ?? {}, 'Success', 200, { current_step: 2 });
  } catch (error) {
    return handleFailure(res, error, 'Failed to load step 2', { userId: req.user?.id });
  }
};

// POST /wizard/step2
export const saveStep2 = async (req: AuthRequest, res: Response) => {
  try {
    if (!req.user) return ResponseHandler.unauthorized(res);

    const rewardId = rewardIdFrom(req);
    const draft = await loadDraft(req.user.id, rewardId);
    if (!draft?.step1_data) {
      return stepOrder(res, 'Complete step 1 first');
    }

    const data = step2Schema.parse(req.body);
    await saveStep(req.user.id, rewardId, { step: 2, data });

    return ResponseHandler.success(res, data, 'Activity information saved', 200, { next_step: 3 });
  } catch (error) {
    return handleFailure(res, error, 'Failed to save step 2', { userId: req.user?.id });
  }
};

// GET /wizard/step3
export const getStep3 = async (req: AuthRequest, res: Response) => {
  try {
    if (!req.user) return ResponseHandler.unauthorized(res);

    const draft = await loadDraft(req.user.id, rewardIdFrom(req));
    return ResponseHandler.success(res, draft?.step3_data ?? {}, 'Success', 200, { current_step: 3 });
  } catch (error) {
    return handleFailure(res, error, 'Failed to load step 3', { userId: req.user?.id });
  }
};

const uploadedFiles = (req: AuthRequest, field: string): Express.Multer.File[] => {
  const files = req.files;
  if (!files || Array.isArray(files)) return [];
  return files[field] ?? [];
};

// POST /wizard/step3 - multipart; files are staged on disk, metadata goes to the draft
export const saveStep3 = async (req: AuthRequest, res: Response) => {
  try {
    if (!req.user) return ResponseHandler.unauthorized(res);

    const rewardId = rewardIdFrom(req);
    const draft = await loadDraft(req.user.id, rewardId);
    if (!draft?.step1_data || !draft.step2_data) {
      return stepOrder(res, 'Complete the previous steps first');
    }

    const [letter] = uploadedFiles(req, 'recommendation_letter');
    const certificateFiles = uploadedFiles(req, 'certificates');

    const data: Step3Data = { recommendation_letter: null, certificates: [] };
    try {
      if (letter) {
        data.recommendation_letter = await stageFile(letter);
      }
      for (const file of certificateFiles) {
        data.certificates.push(await stageFile(file));
      }
      await saveStep(req.user.id, rewardId, { step: 3, data });
    } catch (error) {
      // Nothing references this upload's files once the draft write fails
      await discardFiles(stagedFiles(data).map(file => file.file_path));
      throw error;
    }

    await discardFiles(stagedFiles(draft.step3_data).map(file => file.file_path));

    return ResponseHandler.success(
      res,
      {
        recommendation_letter: data.recommendation_letter?.original_name ?? null,
        certificates_count: data.certificates.length,
        certificates_names: data.certificates.map(file => file.original_name),
      },
      'Documents saved',
      200,
      { next_step: 4 }
    );
  } catch (error) {
    return handleFailure(res, error, 'Failed to save step 3', { userId: req.user?.id });
  }
};

// GET /wizard/final-review - everything collected so far, merged
export const getFinalReview = async (req: AuthRequest, res: Response) => {
  try {
    if (!req.user) return ResponseHandler.unauthorized(res);

    const rewardId = rewardIdFrom(req);
    const draft = await loadDraft(req.user.id, rewardId);
    if (!isComplete(draft)) {
      return ResponseHandler.badRequest(
        res,
        'Not all steps are completed',
        { missing_steps: missingSteps(draft) },
        'STEP_ORDER'
      );
    }

    const reward = await findReward(rewardId);

    return ResponseHandler.success(
      res,
      {
        ...draft.step1_data,
        ...draft.step2_data,
        recommendation_letter_info: draft.step3_data.recommendation_letter,
        certificates_info: draft.step3_data.certificates,
        reward_id: draft.reward_id,
        reward_name: reward?.name ?? null,
      },
      'Success',
      200,
      { current_step: 4 }
    );
  } catch (error) {
    return handleFailure(res, error, 'Failed to load final review', { userId: req.user?.id });
  }
};

// POST /wizard/final-review - turns the draft into an application
export const submitFinalReview = async (req: AuthRequest, res: Response) => {
  const userId = req.user?.id;
  try {
    if (!userId) return ResponseHandler.unauthorized(res);

    const rewardId = rewardIdFrom(req);
    const draft = await loadDraft(userId, rewardId);
    if (!isComplete(draft)) {
      return ResponseHandler.badRequest(
        res,
        'Not all steps are completed',
        { missing_steps: missingSteps(draft) },
        'STEP_ORDER'
      );
    }

    let submission: SubmissionResult;
    try {
      submission = await submitApplication(userId, draft);
    } catch (error) {
      if (error instanceof ApplicationExistsError) {
        return applicationExists(res, error.existing);
      }
      if (error instanceof RewardNotFoundError) {
        return ResponseHandler.badRequest(res, 'Invalid data', { reward_id: ['Reward not found'] }, 'VALIDATION_ERROR');
      }
      logger.error('[Wizard] Application submission failed', { userId, rewardId, error: errorMessage(error) });
      return ResponseHandler.internalError(res, `Failed to save application: ${errorMessage(error)}`, error);
    }

    try {
      await clearDraft(userId, rewardId);
    } catch (error) {
      logger.warn('[Wizard] Failed to clear draft after submission', { userId, rewardId, error: errorMessage(error) });
    }

    auditLog('APPLICATION_SUBMITTED', {
      userId,
      applicationId: submission.application.id,
      rewardId,
      ip: req.ip,
    });

    const row = await findApplicationRow(pool, submission.application.id);
    const detail = row ? toApplicationDetail(row, await findCertificates(pool, row.id)) : submission.application;

    return ResponseHandler.created(res, detail, 'Application submitted successfully');
  } catch (error) {
    return handleFailure(res, error, 'Failed to submit application', { userId });
  }
};

// GET /wizard/progress
export const getProgress = async (req: AuthRequest, res: Response) => {
  try {
    if (!req.user) return ResponseHandler.unauthorized(res);

    const rewardId = rewardIdFrom(req);
    const draft = await loadDraft(req.user.id, rewardId);

    return ResponseHandler.success(res, draftProgress(draft, rewardId));
  } catch (error) {
    return handleFailure(res, error, 'Failed to load progress', { userId: req.user?.id });
  }
};

// DELETE /wizard/draft?reward_id=
export const deleteDraft = async (req: AuthRequest, res: Response) => {
  try {
    if (!req.user) return ResponseHandler.unauthorized(res);

    await clearDraft(req.user.id, rewardIdFrom(req));

    return ResponseHandler.success(res, null, 'Application draft cleared');
  } catch (error) {
    return handleFailure(res, error, 'Failed to clear draft', { userId: req.user?.id });
  }
};
