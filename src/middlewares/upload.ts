import { Request } from 'express';
import multer from 'multer';
import { env } from '../config';
import { AppError } from '../utils';

export const INVENTORY_FIELD = 'inventory';
export const CREDITS_FIELD = 'credits';

const TEXT_MIME_TYPES = [
  'application/csv',
  'application/toml',
  'application/x-toml',
  'application/x-python-code',
  'application/octet-stream',
];
const TEXT_EXTENSIONS = ['.txt', '.csv', '.in', '.toml', '.py'];

/**
 * Accepts plain-text uploads only. software_credits has no extension,
 * so extension-less names are allowed too.
 */
const fileFilter = (_req: Request, file: Express.Multer.File, cb: multer.FileFilterCallback) => {
  const name = file.originalname.toLowerCase();
  const hasExtension = name.includes('.');
  const extensionOk = !hasExtension || TEXT_EXTENSIONS.some((ext) => name.endsWith(ext));

  const mimeOk = file.mimetype.startsWith('text/') || TEXT_MIME_TYPES.includes(file.mimetype);

  if (mimeOk && extensionOk) {
    cb(null, true);
  } else {
    cb(AppError.badRequest(`Unsupported file "${file.originalname}" (expected a text file)`));
  }
};

/**
 * Multer upload middleware
 * - Files are kept in memory: they are small text files parsed once
 * - One inventory file (requirements.txt, .csv, pyproject.toml or setup.py),
 *   one optional credits file
 */
export const uploadCreditsFiles = multer({
  storage: multer.memoryStorage(),
  fileFilter,
  limits: {
    fileSize: env.MAX_UPLOAD_BYTES,
    files: 2,
  },
}).fields([
  { name: INVENTORY_FIELD, maxCount: 1 },
  { name: CREDITS_FIELD, maxCount: 1 },
]);

export default uploadCreditsFiles;
