import { Completion, CompletionWithScores } from '../db/types/photohunt.types.js';
import { Verdict } from '../services/comparator/responseInterpreter.js';

/**
 * The only verdict fields a client ever sees; no image URLs of any kind
 */
export interface ValidationResponse {
  similarity_score: number;
  confidence_score: number;
  is_valid: boolean;
  notes: string;
  key_matches: string[];
  key_differences: string[];
}

export interface CompletionResponse {
  id: string;
  challenge_id: string;
  submitted_image: string;
  validation_score: number | null;
  is_valid: boolean;
  validation_notes: string;
  created_at: Date;
  updated_at: Date;
}

export interface CompletionSummaryResponse extends CompletionResponse {
  similarity_score: number | null;
  confidence_score: number | null;
}

export function toValidationResponse(verdict: Verdict): ValidationResponse {
  return {
    similarity_score: verdict.similarityScore,
    confidence_score: verdict.confidenceScore,
    is_valid: verdict.isValid,
    notes: verdict.notes,
    key_matches: [...verdict.keyMatches],
    key_differences: [...verdict.keyDifferences],
  };
}

export function toCompletionResponse(completion: Completion): CompletionResponse {
  return {
    id: completion.id,
    challenge_id: completion.challenge_id,
    submitted_image: completion.submitted_image,
    validation_score:
      completion.validation_score === null ? null : Number(completion.validation_score),
    // SQLite hands booleans back as 0/1
    is_valid: Boolean(completion.is_valid),
    validation_notes: completion.validation_notes,
    created_at: new Date(completion.created_at),
    updated_at: new Date(completion.updated_at),
  };
}

export function toCompletionSummaryResponse(
  completion: CompletionWithScores
): CompletionSummaryResponse {
  return {
    ...toCompletionResponse(completion),
    similarity_score: completion.similarity_score,
    confidence_score: completion.confidence_score,
  };
}
