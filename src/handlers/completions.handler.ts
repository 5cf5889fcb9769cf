import { Request, Response, NextFunction } from 'express';
import { CompletionsRepository } from '../db/repositories/completions.repository.js';
import { ProfilesRepository } from '../db/repositories/profiles.repository.js';
import { Errors } from '../utils/errors.js';
import { isUuid } from '../utils/validation.js';
import {
  CompletionResponse,
  CompletionSummaryResponse,
  toCompletionResponse,
  toCompletionSummaryResponse,
} from './responses.js';

export interface CompletionDetailResponse {
  completion: CompletionResponse;
  validation: {
    similarity_score: number;
    confidence_score: number;
    is_approved: boolean;
  } | null;
}

export interface StatsResponse {
  total_completions: number;
}

export class CompletionsHandler {
  constructor(
    private readonly completionsRepo: CompletionsRepository,
    private readonly profilesRepo: ProfilesRepository
  ) {}

  private requireUser(req: Request): string {
    if (!req.userId) {
      throw Errors.unauthorized();
    }
    return req.userId;
  }

  async getMyCompletions(
    req: Request,
    res: Response<CompletionSummaryResponse[]>,
    next: NextFunction
  ): Promise<void> {
    try {
      const userId = this.requireUser(req);
      const completions = await this.completionsRepo.findByUser(userId);

      res.json(completions.map((c) => toCompletionSummaryResponse(c)));
    } catch (error) {
      next(error);
    }
  }

  async getMyCompletion(
    req: Request,
    res: Response<CompletionDetailResponse>,
    next: NextFunction
  ): Promise<void> {
    try {
      const userId = this.requireUser(req);
      const { challengeId } = req.params;
      if (!isUuid(challengeId)) {
        throw Errors.badRequest('challengeId must be a valid UUID', 'challengeId');
      }

      const completion = await this.completionsRepo.findByUserAndChallenge(userId, challengeId);
      if (!completion) {
        throw Errors.notFound('Completion');
      }
      const validation = await this.completionsRepo.findValidation(completion.id);

      // Stored prompt and raw comparator response stay server side
      res.json({
        completion: toCompletionResponse(completion),
        validation: validation
          ? {
              similarity_score: validation.similarity_score,
              confidence_score: validation.confidence_score,
              is_approved: Boolean(validation.is_approved),
            }
          : null,
      });
    } catch (error) {
      next(error);
    }
  }

  async getMyStats(req: Request, res: Response<StatsResponse>, next: NextFunction): Promise<void> {
    try {
      const userId = this.requireUser(req);
      const total = await this.profilesRepo.getTotalCompletions(userId);

      res.json({ total_completions: total });
    } catch (error) {
      next(error);
    }
  }
}
