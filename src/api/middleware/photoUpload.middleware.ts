import { Request, Response, NextFunction, RequestHandler } from 'express';
import multer from 'multer';
import { Errors } from '../../utils/errors.js';

/**
 * Single `photo` field kept in memory: the bytes are uploaded and may also be
 * sent inline to the comparator. Multer errors become 400s here.
 */
export function createPhotoUpload(maxSize: number): RequestHandler {
  const upload = multer({
    storage: multer.memoryStorage(),
    limits: {
      fileSize: maxSize,
      files: 1,
    },
  }).single('photo');

  return (req: Request, res: Response, next: NextFunction) => {
    upload(req, res, (error: unknown) => {
      if (error instanceof multer.MulterError) {
        next(Errors.badRequest(error.message, error.field ?? 'photo'));
        return;
      }
      next(error);
    });
  };
}
