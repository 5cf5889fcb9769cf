// Database Models

export interface User {
  id: string;
  email: string;
  name: string;
  created_at: string;
}

export interface Challenge {
  id: string;
  title: string;
  description: string;
  latitude: number;
  longitude: number;
  reference_image: string | null; // durable URL, never presigned
  hint: string | null;
  is_active: boolean;
  created_at: string;
  updated_at: string;
}

export interface Completion {
  id: string;
  user_id: string;
  challenge_id: string;
  submitted_image: string;
  validation_score: number | null;
  is_valid: boolean;
  validation_notes: string;
  created_at: string;
  updated_at: string;
}

export interface PhotoValidation {
  id: string;
  completion_id: string;
  reference_image_url: string;
  submitted_image_url: string;
  similarity_score: number;
  confidence_score: number;
  validation_prompt: string;
  ai_response: string;
  is_approved: boolean;
  created_at: string;
  updated_at: string;
}

export interface UserProfile {
  id: string;
  user_id: string;
  total_completions: number;
  created_at: string;
  updated_at: string;
}

/**
 * Completion joined with the scores of its validation record
 */
export interface CompletionWithScores extends Completion {
  similarity_score: number | null;
  confidence_score: number | null;
}
