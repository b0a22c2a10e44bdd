import express from 'express';
import * as usersController from './users.controller';
import { authenticate, requireStaff } from '../../middlewares/auth.middleware';

const router = express.Router();

router.use(authenticate);

router.get('/', requireStaff, usersController.listUsers);

// `me` resolves to the caller; other ids are staff-only
router.get('/:id', usersController.getUser);
router.patch('/:id', usersController.updateUser);
router.delete('/:id', usersController.deleteUser);

export default router;
