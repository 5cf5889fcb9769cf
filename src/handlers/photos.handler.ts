import { Request, Response, NextFunction } from 'express';
import type {} from 'multer';
import { PhotoSubmissionService } from '../services/submission/photoSubmission.service.js';
import { Errors } from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import { isUuid } from '../utils/validation.js';
import {
  CompletionResponse,
  ValidationResponse,
  toCompletionResponse,
  toValidationResponse,
} from './responses.js';

export type SubmitPhotoResponse =
  | { validation: ValidationResponse }
  | { completion: CompletionResponse; validation: ValidationResponse };

export class PhotosHandler {
  constructor(private readonly submissionService: PhotoSubmissionService) {}

  private validateSubmitRequest(
    userId: string | undefined,
    challengeId: unknown,
    file: Express.Multer.File | undefined
  ): { userId: string; challengeId: string; file: Express.Multer.File } {
    if (!userId) {
      throw Errors.unauthorized();
    }

    if (typeof challengeId !== 'string' || challengeId.trim() === '') {
      throw Errors.badRequest('challenge_id is required', 'challenge_id');
    }

    if (!isUuid(challengeId.trim())) {
      throw Errors.badRequest('challenge_id must be a valid UUID', 'challenge_id');
    }

    if (!file) {
      throw Errors.badRequest('No photo provided', 'photo');
    }

    if (file.size === 0 || file.buffer.length === 0) {
      throw Errors.badRequest('Photo is empty', 'photo');
    }

    return { userId, challengeId: challengeId.trim(), file };
  }

  async submitPhoto(
    req: Request,
    res: Response<SubmitPhotoResponse>,
    next: NextFunction
  ): Promise<void> {
    try {
      const { userId, challengeId, file } = this.validateSubmitRequest(
        req.userId,
        req.body?.challenge_id,
        req.file
      );

      const outcome = await this.submissionService.submit({
        userId,
        challengeId,
        filename: file.originalname,
        payload: file.buffer,
      });

      if (outcome.kind === 'rejected') {
        logger.info({ challengeId }, 'Photo did not match the challenge');
        res.status(200).json({ validation: toValidationResponse(outcome.validation) });
        return;
      }

      logger.info(
        { challengeId, completionId: outcome.completion.id },
        'Photo accepted, completion recorded'
      );
      res.status(201).json({
        completion: toCompletionResponse(outcome.completion),
        validation: toValidationResponse(outcome.validation),
      });
    } catch (error) {
      next(error);
    }
  }
}
