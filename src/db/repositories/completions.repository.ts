import { randomUUID } from 'crypto';
import { DatabaseAdapter, isUniqueViolation } from '../adapters/DatabaseAdapter.js';
import {
  Completion,
  CompletionWithScores,
  PhotoValidation,
} from '../types/photohunt.types.js';
import { Errors } from '../../utils/errors.js';

export interface RecordApprovalInput {
  userId: string;
  challengeId: string;
  // Durable URLs only; presigned links must never be persisted
  submittedImageUrl: string;
  referenceImageUrl: string;
  similarityScore: number;
  confidenceScore: number;
  notes: string;
  prompt: string;
  rawResponse: string;
}

export interface RecordApprovalResult {
  completion: Completion;
  // Image the completion pointed at before this approval, if any
  previousImageUrl: string | null;
  // True when the completion went from not valid (or absent) to valid
  newlyCompleted: boolean;
}

export class CompletionsRepository {
  constructor(private readonly db: DatabaseAdapter) {}

  /**
   * Create or overwrite the user's completion for a challenge together with its
   * validation record, in one transaction holding the completion row lock.
   * The profile counter moves only on the not-valid to valid transition.
   */
  async recordApproval(input: RecordApprovalInput): Promise<RecordApprovalResult> {
    try {
      return await this.db.transaction(async (trx) => {
        const existing: Completion | undefined = await trx('completions')
          .where({ user_id: input.userId, challenge_id: input.challengeId })
          .forUpdate()
          .first();

        const fields = {
          submitted_image: input.submittedImageUrl,
          is_valid: true,
          validation_score: input.similarityScore,
          validation_notes: input.notes,
        };

        let completion: Completion;
        if (existing) {
          [completion] = await trx('completions')
            .where('id', existing.id)
            .update({ ...fields, updated_at: trx.fn.now() })
            .returning('*');
        } else {
          // Creation requires the challenge to still be active right now
          const challenge = await trx('challenges')
            .where({ id: input.challengeId, is_active: true })
            .forShare()
            .first();
          if (!challenge) {
            throw Errors.notFound('Challenge');
          }

          [completion] = await trx('completions')
            .insert({
              id: randomUUID(),
              user_id: input.userId,
              challenge_id: input.challengeId,
              ...fields,
            })
            .returning('*');
        }

        const validation = {
          reference_image_url: input.referenceImageUrl,
          submitted_image_url: input.submittedImageUrl,
          similarity_score: input.similarityScore,
          confidence_score: input.confidenceScore,
          validation_prompt: input.prompt,
          ai_response: input.rawResponse,
          is_approved: true,
        };
        await trx('photo_validations')
          .insert({ id: randomUUID(), completion_id: completion.id, ...validation })
          .onConflict('completion_id')
          .merge({ ...validation, updated_at: trx.fn.now() });

        const newlyCompleted = !existing || !existing.is_valid;
        if (newlyCompleted) {
          await trx('user_profiles')
            .insert({ id: randomUUID(), user_id: input.userId, total_completions: 1 })
            .onConflict('user_id')
            .merge({
              total_completions: trx.raw('?? + 1', ['user_profiles.total_completions']),
              updated_at: trx.fn.now(),
            });
        }

        return {
          completion,
          previousImageUrl: existing ? existing.submitted_image : null,
          newlyCompleted,
        };
      });
    } catch (error) {
      // A concurrent first submission for the same pair won the insert
      if (isUniqueViolation(error)) {
        throw Errors.conflict('A submission for this challenge is already being recorded');
      }
      throw error;
    }
  }

  async findByUserAndChallenge(userId: string, challengeId: string): Promise<Completion | null> {
    const result = await this.db
      .getKnex()('completions')
      .where({ user_id: userId, challenge_id: challengeId })
      .first();

    return result || null;
  }

  async findValidation(completionId: string): Promise<PhotoValidation | null> {
    const result = await this.db
      .getKnex()('photo_validations')
      .where('completion_id', completionId)
      .first();

    return result || null;
  }

  async findByUser(userId: string): Promise<CompletionWithScores[]> {
    return this.db
      .getKnex()('completions')
      .leftJoin('photo_validations', 'photo_validations.completion_id', 'completions.id')
      .where('completions.user_id', userId)
      .select(
        'completions.*',
        'photo_validations.similarity_score',
        'photo_validations.confidence_score'
      )
      .orderBy('completions.created_at', 'desc');
  }
}
