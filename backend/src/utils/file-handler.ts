import multer from 'multer';
import path from 'path';
import fs from 'fs';
import { v4 as uuidv4 } from 'uuid';

const ALLOWED_MIME_TYPES: Record<string, string> = {
  'image/jpeg': 'image/jpeg',
  'image/jpg': 'image/jpeg',
  'image/pjpeg': 'image/jpeg',
  'image/png': 'image/png',
};

const EXTENSION_MIME_TYPES: Record<string, string> = {
  '.jpg': 'image/jpeg',
  '.jpeg': 'image/jpeg',
  '.png': 'image/png',
};

export class UnsupportedFileTypeError extends Error {
  constructor() {
    super('Only JPEG/PNG images are supported');
    this.name = 'UnsupportedFileTypeError';
  }
}

/** `image/jpeg` or `image/png` for an accepted upload, else null. */
export function imageMimeType(file: { mimetype: string; originalname: string }): string | null {
  return ALLOWED_MIME_TYPES[file.mimetype.toLowerCase()]
    ?? EXTENSION_MIME_TYPES[path.extname(file.originalname).toLowerCase()]
    ?? null;
}

export interface UploadOptions {
  dir: string;
  maxFileSizeMB: number;
}

export function createUpload(opts: UploadOptions): multer.Multer {
  const storage = multer.diskStorage({
    destination: (_req, _file, cb) => {
      fs.mkdir(opts.dir, { recursive: true }, err => cb(err, opts.dir));
    },
    filename: (_req, file, cb) => {
      const ext = path.extname(file.originalname).toLowerCase();
      cb(null, `${uuidv4()}${ext}`);
    },
  });

  const fileFilter = (_req: Express.Request, file: Express.Multer.File, cb: multer.FileFilterCallback) => {
    if (imageMimeType(file)) {
      cb(null, true);
    } else {
      cb(new UnsupportedFileTypeError());
    }
  };

  return multer({
    storage,
    fileFilter,
    limits: { fileSize: opts.maxFileSizeMB * 1024 * 1024, files: 1 },
  });
}
