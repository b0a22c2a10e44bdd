/**
 * Local Storage Service - files under UPLOAD_DIR, addressed by paths relative to it
 */

import fs from 'fs';
import path from 'path';
import { v4 as uuidv4 } from 'uuid';
import { uploadConfig } from '../../connections/config/app.config';
import { StoredFileInfo } from '../../types/response.types';

export const STORAGE_DIRS = {
  TEMP: uploadConfig.tempDir,
  RECOMMENDATION: 'recommendation',
  CERTIFICATES: 'certificates',
  REWARDS: 'rewards',
} as const;

export const getUploadRoot = (): string => path.resolve(uploadConfig.uploadDir);

/**
 * Absolute path for a stored file; refuses paths that escape the upload root
 */
export const resolveStoredPath = (relativePath: string): string => {
  const root = getUploadRoot();
  const absolute = path.resolve(root, relativePath);
  if (absolute !== root && !absolute.startsWith(root + path.sep)) {
    throw new Error(`Path escapes upload directory: ${relativePath}`);
  }
  return absolute;
};

const ensureDir = async (dir: string): Promise<void> => {
  await fs.promises.mkdir(dir, { recursive: true });
};

/**
 * Unique name keeping the original extension
 */
export const generateFileName = (originalName: string): string => {
  const ext = path.extname(originalName).toLowerCase();
  return `${uuidv4()}${ext}`;
};

const toRelative = (...segments: string[]): string => segments.join('/');

/**
 * Write a buffer under `subDir` with a generated name
 * @returns path relative to the upload root
 */
export const saveFileToLocal = async (
  fileBuffer: Buffer,
  originalName: string,
  subDir: string
): Promise<string> => {
  const relativePath = toRelative(subDir, generateFileName(originalName));
  const absolute = resolveStoredPath(relativePath);
  await ensureDir(path.dirname(absolute));
  await fs.promises.writeFile(absolute, fileBuffer);
  return relativePath;
};

/**
 * Write an uploaded file to the temp area; only its metadata is kept by the caller
 */
export const stageFile = async (file: { buffer: Buffer; originalname: string; size: number }): Promise<StoredFileInfo> => {
  const filePath = await saveFileToLocal(file.buffer, file.originalname, STORAGE_DIRS.TEMP);
  return {
    original_name: file.originalname,
    file_path: filePath,
    file_size: file.size,
  };
};

/**
 * Copy a staged file into permanent storage; the staged copy stays until the caller removes it
 * @returns the new relative path
 */
export const copyStagedFile = async (stagedPath: string, targetDir: string): Promise<string> => {
  const source = resolveStoredPath(stagedPath);
  const relativePath = toRelative(targetDir, path.basename(stagedPath));
  const target = resolveStoredPath(relativePath);
  await ensureDir(path.dirname(target));
  await fs.promises.copyFile(source, target);
  return relativePath;
};

/**
 * Delete a stored file; a file that is already gone is not an error
 */
export const removeFile = async (relativePath: string): Promise<void> => {
  try {
    await fs.promises.unlink(resolveStoredPath(relativePath));
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return;
    }
    throw error;
  }
};

export const fileExists = async (relativePath: string): Promise<boolean> => {
  try {
    await fs.promises.access(resolveStoredPath(relativePath));
    return true;
  } catch {
    return false;
  }
};

export const getFileUrl = (relativePath: string | null): string | null =>
  relativePath ? `${uploadConfig.baseUrl}/uploads/${relativePath}` : null;
