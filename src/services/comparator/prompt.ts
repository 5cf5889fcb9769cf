/**
 * Prompt text for the image comparison call. The same wording is rendered into
 * the stored validation record, with durable image URLs in place of the images.
 */

export const COMPARISON_INSTRUCTIONS = `You are an expert photo validation AI. Your task is to compare two images and determine if they show the same subject or location.

The first image is the REFERENCE image of a photo hunt. The second image is the SUBMITTED photo.

Please analyze both images and provide a detailed comparison. Consider:
1. Are they showing the same subject/location?
2. Are the architectural features, landmarks, or key elements the same?
3. Is the lighting, angle, or perspective similar enough to confirm it's the same place?
4. Are there any obvious differences that suggest they're different locations?`;

const RESPONSE_FORMAT = `Respond in the following JSON format:
{
    "similarity_score": 0.85,
    "confidence_score": 0.92,
    "is_valid": true,
    "notes": "The images show the same landmark with a similar angle. The key features match the description.",
    "key_matches": ["Clock tower", "Arched entrance"],
    "key_differences": ["Different time of day"]
}

similarity_score runs from 0.0 to 1.0 (1.0 = identical). confidence_score is your confidence in the assessment from 0.0 to 1.0. is_valid says whether the submitted photo matches the reference.

Be strict but fair in your assessment. The photo should clearly show the same subject/location as the reference image.`;

export function formatInstructions(description: string): string {
  return `PHOTO HUNT DESCRIPTION: ${description}\n\n${RESPONSE_FORMAT}`;
}

export function renderPromptText(
  referenceImage: string,
  submittedImage: string,
  description: string
): string {
  return [
    COMPARISON_INSTRUCTIONS,
    `REFERENCE IMAGE: ${referenceImage}`,
    `SUBMITTED IMAGE: ${submittedImage}`,
    formatInstructions(description),
  ].join('\n\n');
}
