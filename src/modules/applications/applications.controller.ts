import { Response } from 'express';
import { ZodError } from 'zod';
import { pool } from '../../connections';
import { APPLICATION_STATUS_LABELS } from '../../constants/application.constants';
import { AuthRequest } from '../../types/request.types';
import { ResponseHandler } from '../../utils/response';
import { logger, auditLog, errorMessage } from '../../utils/logging';
import { idSchema } from '../../utils/validation';
import { applicationListQuerySchema, updateStatusSchema } from './applications.validation';
import {
  applicationStats,
  changeApplicationStatus,
  findApplicationRow,
  findCertificates,
  listApplications,
  toApplicationDetail,
  toApplicationListItem,
} from './applications.service';

const handleFailure = (res: Response, error: unknown, message: string, context: Record<string, unknown>) => {
  if (error instanceof ZodError) {
    return ResponseHandler.validationError(res, error.issues);
  }
  logger.error(message, { error: errorMessage(error), ...context });
  return ResponseHandler.internalError(res, message, error);
};

// GET /applications - staff see everything, users their own
export const getApplications = async (req: AuthRequest, res: Response) => {
  try {
    if (!req.user) return ResponseHandler.unauthorized(res);

    const { page, limit, status, reward_id, area, search } = applicationListQuerySchema.parse(req.query);
    const isStaff = req.user.is_staff;

    const { rows, total, certificateCounts } = await listApplications(
      pool,
      {
        userId: isStaff ? undefined : req.user.id,
        rewardId: reward_id,
        status,
        area,
        search,
      },
      { page, limit }
    );

    return ResponseHandler.paginated(
      res,
      rows.map(row => toApplicationListItem(row, isStaff, certificateCounts.get(row.id) ?? 0)),
      { page, limit, total },
      'Applications retrieved',
      {
        filters: { status: status ?? null, reward_id: reward_id ?? null, search: search ?? null },
        user_role: isStaff ? 'admin' : 'user',
      }
    );
  } catch (error) {
    return handleFailure(res, error, 'Failed to list applications', { userId: req.user?.id });
  }
};

// GET /applications/mine
export const getMyApplications = async (req: AuthRequest, res: Response) => {
  try {
    if (!req.user) return ResponseHandler.unauthorized(res);

    const { page, limit, status, reward_id, area } = applicationListQuerySchema.parse(req.query);

    const { rows, total, certificateCounts } = await listApplications(
      pool,
      { userId: req.user.id, rewardId: reward_id, status, area },
      { page, limit }
    );

    return ResponseHandler.paginated(
      res,
      rows.map(row => toApplicationListItem(row, false, certificateCounts.get(row.id) ?? 0)),
      { page, limit, total },
      'Applications retrieved'
    );
  } catch (error) {
    return handleFailure(res, error, 'Failed to list applications', { userId: req.user?.id });
  }
};

// GET /applications/:id
export const getApplication = async (req: AuthRequest, res: Response) => {
  try {
    if (!req.user) return ResponseHandler.unauthorized(res);

    const id = idSchema.safeParse(req.params.id);
    const row = id.success ? await findApplicationRow(pool, id.data) : null;
    if (!row || (!req.user.is_staff && row.user_id !== req.user.id)) {
      return ResponseHandler.notFound(res, 'Application not found or access denied');
    }

    return ResponseHandler.success(res, toApplicationDetail(row, await findCertificates(pool, row.id)));
  } catch (error) {
    return handleFailure(res, error, 'Failed to fetch application', { userId: req.user?.id });
  }
};

// PATCH /applications/:id/status (staff)
export const updateApplicationStatus = async (req: AuthRequest, res: Response) => {
  try {
    if (!req.user) return ResponseHandler.unauthorized(res);

    const id = idSchema.safeParse(req.params.id);
    if (!id.success) {
      return ResponseHandler.notFound(res, 'Application not found');
    }

    const { status } = updateStatusSchema.parse(req.body);
    const result = await changeApplicationStatus(id.data, status);
    if (!result) {
      return ResponseHandler.notFound(res, 'Application not found');
    }

    if (result.changed) {
      auditLog('APPLICATION_STATUS_CHANGED', {
        applicationId: result.application.id,
        from: result.previousStatus,
        to: result.application.status,
        by: req.user.id,
        notificationId: result.notification?.id ?? null,
      });
    }

    return ResponseHandler.success(
      res,
      {
        id: result.application.id,
        status: result.application.status,
        status_display: APPLICATION_STATUS_LABELS[result.application.status],
        previous_status: result.previousStatus,
        changed: result.changed,
        notification_id: result.notification?.id ?? null,
      },
      result.changed ? 'Application status updated' : 'Application status unchanged'
    );
  } catch (error) {
    return handleFailure(res, error, 'Failed to update application status', { userId: req.user?.id });
  }
};

// GET /applications/stats (staff)
export const getApplicationStats = async (req: AuthRequest, res: Response) => {
  try {
    return ResponseHandler.success(res, await applicationStats(pool));
  } catch (error) {
    return handleFailure(res, error, 'Failed to load application statistics', { userId: req.user?.id });
  }
};
