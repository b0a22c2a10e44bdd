import { pool, withTransaction, isUniqueViolation } from '../../connections';
import { wizardConfig } from '../../connections/config/app.config';
import { Application, Certificate, Reward } from '../../connections/db/models';
import { APPLICATION_SOURCE_WEB, APPLICATION_STATUS, ApplicationStatus } from '../../constants/application.constants';
import { CacheStore, cacheStore } from '../../utils/cache';
import { logger, errorMessage } from '../../utils/logging';
import { StoredFileInfo } from '../../types/response.types';
import {
  STORAGE_DIRS,
  copyStagedFile,
  removeFile,
} from '../upload/localStorage.service';
import { buildCreatedNotification, notifyApplicationOwner } from '../notifications/notifications.service';
import {
  draftSchema,
  Step1Data,
  Step2Data,
  Step3Data,
  WizardDraft,
} from './applications.validation';

export const WIZARD_STEPS = ['step1_data', 'step2_data', 'step3_data'] as const;
export type WizardStep = typeof WIZARD_STEPS[number];

export interface CompleteDraft extends WizardDraft {
  step1_data: Step1Data;
  step2_data: Step2Data;
  step3_data: Step3Data;
}

export const draftKey = (userId: number, rewardId: number): string =>
  `application_draft:${userId}:${rewardId}`;

/**
 * The cached draft, or null when absent or unreadable
 */
export const loadDraft = async (
  userId: number,
  rewardId: number,
  store: CacheStore = cacheStore
): Promise<WizardDraft | null> => {
  const raw = await store.get(draftKey(userId, rewardId));
  if (raw === null || raw === undefined) {
    return null;
  }

  const parsed = draftSchema.safeParse(raw);
  if (!parsed.success) {
    logger.warn('[Wizard] Discarding unreadable draft', { userId, rewardId });
    return null;
  }
  return parsed.data;
};

type StepPatch =
  | { step: 1; data: Step1Data }
  | { step: 2; data: Step2Data }
  | { step: 3; data: Step3Data };

/**
 * Read-modify-write of the whole bucket; concurrent writers race and the last one wins
 */
export const saveStep = async (
  userId: number,
  rewardId: number,
  patch: StepPatch,
  store: CacheStore = cacheStore
): Promise<WizardDraft> => {
  const existing = await loadDraft(userId, rewardId, store);
  const draft: WizardDraft = {
    ...(existing ?? {}),
    reward_id: rewardId,
    current_step: patch.step,
  };

  switch (patch.step) {
    case 1:
      draft.step1_data = patch.data;
      break;
    case 2:
      draft.step2_data = patch.data;
      break;
    case 3:
      draft.step3_data = patch.data;
      break;
  }

  await store.set(draftKey(userId, rewardId), draft, wizardConfig.draftTtl);
  return draft;
};

export const missingSteps = (draft: WizardDraft | null): WizardStep[] =>
  WIZARD_STEPS.filter(step => !draft || draft[step] === undefined);

export const isComplete = (draft: WizardDraft | null): draft is CompleteDraft =>
  draft !== null && missingSteps(draft).length === 0;

export const stagedFiles = (step3: Step3Data | undefined): StoredFileInfo[] => {
  if (!step3) return [];
  return [
    ...(step3.recommendation_letter ? [step3.recommendation_letter] : []),
    ...step3.certificates,
  ];
};

/**
 * Best-effort removal; failures are logged, never thrown
 */
export const discardFiles = async (paths: string[]): Promise<void> => {
  await Promise.all(
    paths.map(filePath =>
      removeFile(filePath).catch((error: unknown) => {
        logger.warn('[Wizard] Failed to remove file', { filePath, error: errorMessage(error) });
      })
    )
  );
};

export const clearDraft = async (
  userId: number,
  rewardId: number,
  store: CacheStore = cacheStore
): Promise<void> => {
  const draft = await loadDraft(userId, rewardId, store);
  await store.delete(draftKey(userId, rewardId));
  await discardFiles(stagedFiles(draft?.step3_data).map(file => file.file_path));
};

export interface WizardProgress {
  step1_completed: boolean;
  step2_completed: boolean;
  step3_completed: boolean;
  current_step: number;
  reward_id: number;
}

export const draftProgress = (draft: WizardDraft | null, rewardId: number): WizardProgress => ({
  step1_completed: draft?.step1_data !== undefined,
  step2_completed: draft?.step2_data !== undefined,
  step3_completed: draft?.step3_data !== undefined,
  current_step: draft?.current_step ?? 1,
  reward_id: draft?.reward_id ?? rewardId,
});

// Submission

export class ApplicationExistsError extends Error {
  constructor(public readonly existing: { id: number; status: ApplicationStatus } | null) {
    super('You have already applied for this reward');
    this.name = 'ApplicationExistsError';
  }
}

export class RewardNotFoundError extends Error {
  constructor(public readonly rewardId: number) {
    super('Reward not found');
    this.name = 'RewardNotFoundError';
  }
}

export interface SubmissionResult {
  application: Application;
  certificates: Certificate[];
  reward: Reward;
}

const findExistingApplication = async (
  userId: number,
  rewardId: number
): Promise<{ id: number; status: ApplicationStatus } | null> => {
  const result = await pool.query<{ id: number; status: ApplicationStatus }>(
    'SELECT id, status FROM applications WHERE user_id = $1 AND reward_id = $2',
    [userId, rewardId]
  );
  return result.rows[0] ?? null;
};

/**
 * Creates the application from a complete draft in one transaction: profile update,
 * application row, copied files with their certificate rows, and the creation
 * notification. Staged files are removed only after commit, so a failed submission
 * can be retried from the same draft.
 */
export const submitApplication = async (userId: number, draft: CompleteDraft): Promise<SubmissionResult> => {
  const { step1_data: step1, step2_data: step2, step3_data: step3 } = draft;
  const promoted: string[] = [];

  let result: SubmissionResult;
  try {
    result = await withTransaction(async (client) => {
      const rewardResult = await client.query<Reward>('SELECT * FROM rewards WHERE id = $1', [draft.reward_id]);
      const reward = rewardResult.rows[0];
      if (!reward) {
        throw new RewardNotFoundError(draft.reward_id);
      }

      const existing = await client.query<{ id: number; status: ApplicationStatus }>(
        'SELECT id, status FROM applications WHERE user_id = $1 AND reward_id = $2',
        [userId, draft.reward_id]
      );
      if (existing.rows[0]) {
        throw new ApplicationExistsError(existing.rows[0]);
      }

      const now = new Date();
      await client.query(
        'UPDATE users SET first_name = $1, last_name = $2, pinfl = $3, updated_at = $4 WHERE id = $5',
        [step1.first_name, step1.last_name, step1.pinfl, now, userId]
      );

      let recommendationPath: string | null = null;
      if (step3.recommendation_letter) {
        recommendationPath = await copyStagedFile(step3.recommendation_letter.file_path, STORAGE_DIRS.RECOMMENDATION);
        promoted.push(recommendationPath);
      }

      const applicationResult = await client.query<Application>(
        `INSERT INTO applications (
           reward_id, user_id, status, area, district, neighborhood, activity,
           activity_description, recommendation_letter, source, created_at, updated_at
         )
         VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11, $12)
         RETURNING *`,
        [
          draft.reward_id,
          userId,
          APPLICATION_STATUS.SUBMITTED,
          step1.area,
          step1.district,
          step1.neighborhood,
          step2.activity,
          step2.activity_description,
          recommendationPath,
          APPLICATION_SOURCE_WEB,
          now,
          now,
        ]
      );
      const application = applicationResult.rows[0];

      const certificates: Certificate[] = [];
      for (const file of step3.certificates) {
        const certificatePath = await copyStagedFile(file.file_path, STORAGE_DIRS.CERTIFICATES);
        promoted.push(certificatePath);

        const certificateResult = await client.query<Certificate>(
          `INSERT INTO certificates (application_id, file, original_name, file_size, created_at, updated_at)
           VALUES ($1, $2, $3, $4, $5, $6)
           RETURNING *`,
          [application.id, certificatePath, file.original_name, file.file_size, now, now]
        );
        certificates.push(certificateResult.rows[0]);
      }

      await notifyApplicationOwner(client, application, buildCreatedNotification(application, reward.name));

      return { application, certificates, reward };
    });
  } catch (error) {
    await discardFiles(promoted);
    if (error instanceof ApplicationExistsError || error instanceof RewardNotFoundError) {
      throw error;
    }
    // A concurrent submission for the same reward may have committed first
    const existing = await findExistingApplication(userId, draft.reward_id);
    if (existing) {
      throw new ApplicationExistsError(existing);
    }
    if (isUniqueViolation(error)) {
      throw new ApplicationExistsError(null);
    }
    throw error;
  }

  await discardFiles(stagedFiles(step3).map(file => file.file_path));
  return result;
};
