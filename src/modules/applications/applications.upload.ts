/**
 * Multer configuration for wizard document uploads
 */

import path from 'path';
import multer from 'multer';
import { UploadValidationError } from '../../middlewares/error.middleware';
import {
  DOCUMENT_EXTENSIONS,
  MAX_CERTIFICATES,
  MAX_DOCUMENT_SIZE,
} from '../../constants/application.constants';

export const isAllowedDocument = (fileName: string): boolean => {
  const ext = path.extname(fileName).toLowerCase();
  return DOCUMENT_EXTENSIONS.some(allowed => allowed === ext);
};

// Memory storage: nothing touches the disk until the step is accepted
const storage = multer.memoryStorage();
export const documentUpload = multer({
  storage,
  limits: {
    fileSize: MAX_DOCUMENT_SIZE,
    files: MAX_CERTIFICATES + 1,
  },
  fileFilter: (_req, file, cb) => {
    if (isAllowedDocument(file.originalname)) {
      cb(null, true);
    } else {
      cb(new UploadValidationError(
        `Unsupported file type. Allowed: ${DOCUMENT_EXTENSIONS.join(', ')}`,
        file.fieldname
      ));
    }
  },
});

export const step3UploadMiddleware = documentUpload.fields([
  { name: 'recommendation_letter', maxCount: 1 },
  { name: 'certificates', maxCount: MAX_CERTIFICATES },
]);
