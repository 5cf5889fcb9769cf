import OpenAI from 'openai';
import { ComparatorConfig } from '../../config/index.js';
import { ComparatorError } from '../../utils/errors.js';
import { trackAsync } from '../../utils/performance.js';
import { COMPARISON_INSTRUCTIONS, formatInstructions } from './prompt.js';

export type SubmittedImage =
  | { kind: 'url'; url: string }
  // No fetchable URL exists; the bytes travel inside the request
  | { kind: 'inline'; data: Buffer; mimeType: string };

export interface ComparisonRequest {
  referenceUrl: string;
  submitted: SubmittedImage;
  description: string;
}

export interface ComparisonResult {
  rawText: string;
}

export interface ImageComparator {
  compare(request: ComparisonRequest): Promise<ComparisonResult>;
}

/**
 * Vision-model comparison through the OpenAI chat completions API.
 * One call per comparison: the SDK's own retries are disabled and every
 * failure surfaces as ComparatorError.
 */
export class OpenAIImageComparator implements ImageComparator {
  private readonly client: OpenAI;

  constructor(
    private readonly config: ComparatorConfig,
    client?: OpenAI
  ) {
    this.client =
      client ??
      new OpenAI({
        apiKey: config.apiKey,
        timeout: config.timeoutMs,
        maxRetries: 0,
      });
  }

  async compare(request: ComparisonRequest): Promise<ComparisonResult> {
    const submittedUrl =
      request.submitted.kind === 'url'
        ? request.submitted.url
        : `data:${request.submitted.mimeType};base64,${request.submitted.data.toString('base64')}`;

    const completion = await trackAsync(
      'image comparison',
      async () =>
        this.client.chat.completions.create(
          {
            model: this.config.model,
            temperature: this.config.temperature,
            messages: [
              {
                role: 'user',
                content: [
                  { type: 'text', text: COMPARISON_INSTRUCTIONS },
                  { type: 'image_url', image_url: { url: request.referenceUrl } },
                  { type: 'image_url', image_url: { url: submittedUrl } },
                  { type: 'text', text: formatInstructions(request.description) },
                ],
              },
            ],
          },
          { timeout: this.config.timeoutMs, maxRetries: 0 }
        ),
      { model: this.config.model, submitted: request.submitted.kind }
    ).catch((error: unknown) => {
      throw new ComparatorError('Image comparison request failed', { cause: error });
    });

    const rawText = completion.choices[0]?.message?.content?.trim();
    if (!rawText) {
      throw new ComparatorError('Image comparator returned an empty response');
    }

    return { rawText };
  }
}
