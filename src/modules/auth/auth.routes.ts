import express from 'express';
import * as authController from './auth.controller';
import { rateLimiters } from '../../middlewares/rateLimit.middleware';

const router = express.Router();

// Signup: form + SMS code, then code only
router.post('/signup/step1', rateLimiters.auth, authController.signupStep1);
router.post('/signup/step2', rateLimiters.auth, authController.signupStep2);
router.post('/signup/resend-sms', rateLimiters.verification, authController.resendSignupSms);

router.post('/signin', rateLimiters.auth, authController.signin);
router.post('/token/refresh', authController.refreshToken);

// Password reset by SMS code
router.post('/send-reset-code', rateLimiters.verification, authController.sendResetCode);
router.post('/reset-password', rateLimiters.auth, authController.resetPassword);

export default router;
