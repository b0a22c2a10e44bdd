/**
 * Multer configuration for reward images
 */

import multer from 'multer';
import { UploadValidationError } from '../../middlewares/error.middleware';
import { MAX_REWARD_IMAGE_SIZE, REWARD_IMAGE_MIME_TYPES } from '../../constants/application.constants';

const storage = multer.memoryStorage();
export const rewardImageUpload = multer({
  storage,
  limits: {
    fileSize: MAX_REWARD_IMAGE_SIZE,
    files: 1,
  },
  fileFilter: (_req, file, cb) => {
    if (REWARD_IMAGE_MIME_TYPES.some(type => type === file.mimetype)) {
      cb(null, true);
    } else {
      cb(new UploadValidationError(`File type ${file.mimetype} is not supported`, file.fieldname));
    }
  },
});

export const rewardImageMiddleware = rewardImageUpload.single('image');
