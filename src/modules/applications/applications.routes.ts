import express from 'express';
import * as applicationsController from './applications.controller';
import * as wizardController from './wizard.controller';
import { authenticate, requireStaff } from '../../middlewares/auth.middleware';
import { step3UploadMiddleware } from './applications.upload';

const router = express.Router();

router.use(authenticate);

// Application wizard; every call is scoped by reward_id (body or query)
router.get('/wizard/step1', wizardController.getStep1);
router.post('/wizard/step1', wizardController.saveStep1);
router.get('/wizard/step2', wizardController.getStep2);
router.post('/wizard/step2', wizardController.saveStep2);
router.get('/wizard/step3', wizardController.getStep3);
router.post('/wizard/step3', step3UploadMiddleware, wizardController.saveStep3);
router.get('/wizard/final-review', wizardController.getFinalReview);
router.post('/wizard/final-review', wizardController.submitFinalReview);
router.get('/wizard/progress', wizardController.getProgress);
router.delete('/wizard/draft', wizardController.deleteDraft);

router.get('/', applicationsController.getApplications);
router.get('/mine', applicationsController.getMyApplications);
router.get('/stats', requireStaff, applicationsController.getApplicationStats);
router.get('/:id', applicationsController.getApplication);
router.patch('/:id/status', requireStaff, applicationsController.updateApplicationStatus);

export default router;
