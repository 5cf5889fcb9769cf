import { ChallengesRepository } from '../../db/repositories/challenges.repository.js';
import {
  CompletionsRepository,
  RecordApprovalResult,
} from '../../db/repositories/completions.repository.js';
import { Completion } from '../../db/types/photohunt.types.js';
import { ComparatorError, Errors, StorageError } from '../../utils/errors.js';
import { logger, Logger } from '../../utils/logger.js';
import { ImageComparator, SubmittedImage } from '../comparator/imageComparator.service.js';
import { renderPromptText } from '../comparator/prompt.js';
import {
  Verdict,
  fallbackVerdict,
  interpretComparatorResponse,
} from '../comparator/responseInterpreter.js';
import {
  ALLOWED_IMAGE_EXTENSIONS,
  ImageExtension,
  contentTypeFor,
  imageExtensionOf,
} from '../storage/imageFormats.js';
import { MediaStorage } from '../storage/localMedia.service.js';
import { BlobStore } from '../storage/s3BlobStore.service.js';

const SUBMISSIONS_FOLDER = 'submissions';

export type SubmissionStage =
  | 'received'
  | 'stored'
  | 'presigned'
  | 'compared'
  | 'interpreted'
  | 'committed'
  | 'rolled_back';

export interface PhotoSubmission {
  userId: string;
  challengeId: string;
  filename: string;
  payload: Buffer;
}

export type SubmissionOutcome =
  | { kind: 'rejected'; validation: Verdict }
  | { kind: 'accepted'; completion: Completion; validation: Verdict };

interface Evaluation {
  verdict: Verdict;
  rawText: string;
}

export interface PhotoSubmissionOptions {
  presignTtlSeconds: number;
}

/**
 * Runs one photo submission end to end: store the photo, have the comparator
 * judge it against the challenge reference, then either commit the completion
 * or roll back by removing the stored photo.
 */
export class PhotoSubmissionService {
  constructor(
    private readonly challengesRepo: ChallengesRepository,
    private readonly completionsRepo: CompletionsRepository,
    private readonly blobStore: BlobStore,
    private readonly localMedia: MediaStorage,
    private readonly comparator: ImageComparator,
    private readonly options: PhotoSubmissionOptions
  ) {}

  async submit(submission: PhotoSubmission): Promise<SubmissionOutcome> {
    const log = logger.child({
      userId: submission.userId,
      challengeId: submission.challengeId,
    });
    this.advance(log, 'received');

    const challenge = await this.challengesRepo.findActiveById(submission.challengeId);
    if (!challenge) {
      throw Errors.notFound('Challenge');
    }

    const extension = imageExtensionOf(submission.filename);
    if (!extension) {
      throw Errors.badRequest(
        `Unsupported image format. Allowed: ${ALLOWED_IMAGE_EXTENSIONS.join(', ')}`,
        'photo'
      );
    }

    const referenceImage = challenge.reference_image;
    if (!referenceImage) {
      log.warn('Challenge has no reference image, rejecting without comparison');
      this.advance(log, 'rolled_back');
      return { kind: 'rejected', validation: fallbackVerdict() };
    }

    const storedUrl = await this.store(submission.payload, extension, log);
    this.advance(log, 'stored', { url: storedUrl });

    const { verdict, rawText } = await this.evaluate(
      referenceImage,
      storedUrl,
      submission.payload,
      extension,
      challenge.description,
      log
    ).catch(async (error: unknown) => {
      await this.discard(storedUrl, log);
      throw error;
    });
    this.advance(log, 'interpreted', { isValid: verdict.isValid });

    if (!verdict.isValid) {
      await this.discard(storedUrl, log);
      this.advance(log, 'rolled_back');
      return { kind: 'rejected', validation: verdict };
    }

    let result: RecordApprovalResult;
    try {
      result = await this.completionsRepo.recordApproval({
        userId: submission.userId,
        challengeId: submission.challengeId,
        submittedImageUrl: storedUrl,
        referenceImageUrl: referenceImage,
        similarityScore: verdict.similarityScore,
        confidenceScore: verdict.confidenceScore,
        notes: verdict.notes,
        prompt: renderPromptText(referenceImage, storedUrl, challenge.description),
        rawResponse: rawText,
      });
    } catch (error) {
      await this.discard(storedUrl, log);
      throw error;
    }
    this.advance(log, 'committed', {
      completionId: result.completion.id,
      newlyCompleted: result.newlyCompleted,
    });

    if (result.previousImageUrl && result.previousImageUrl !== storedUrl) {
      await this.discard(result.previousImageUrl, log);
    }

    return { kind: 'accepted', completion: result.completion, validation: verdict };
  }

  private advance(log: Logger, stage: SubmissionStage, details?: Record<string, unknown>): void {
    log.debug({ stage, ...details }, `Submission ${stage}`);
  }

  /**
   * Object store first; any failure there, transient or not, falls back to local media
   */
  private async store(payload: Buffer, extension: ImageExtension, log: Logger): Promise<string> {
    const result = await this.blobStore.upload(payload, SUBMISSIONS_FOLDER, extension);
    if (result.kind === 'uploaded') {
      return result.url;
    }

    log.warn({ err: result.error }, 'Object store upload failed, falling back to local media');
    try {
      return await this.localMedia.save(payload, SUBMISSIONS_FOLDER, extension);
    } catch (error) {
      log.error({ err: error }, 'Local media fallback failed');
      throw Errors.internal('Failed to store submitted photo');
    }
  }

  /**
   * Storage and comparator failures end in the fallback verdict
   */
  private async evaluate(
    referenceImage: string,
    storedUrl: string,
    payload: Buffer,
    extension: ImageExtension,
    description: string,
    log: Logger
  ): Promise<Evaluation> {
    try {
      const referenceUrl = await this.accessUrl(referenceImage);
      if (!referenceUrl) {
        log.warn({ referenceImage }, 'Reference image has no fetchable URL');
        return { verdict: fallbackVerdict(), rawText: '' };
      }

      const submittedUrl = await this.accessUrl(storedUrl);
      const submitted: SubmittedImage = submittedUrl
        ? { kind: 'url', url: submittedUrl }
        : { kind: 'inline', data: payload, mimeType: contentTypeFor(extension) };
      this.advance(log, 'presigned', { submitted: submitted.kind });

      const { rawText } = await this.comparator.compare({ referenceUrl, submitted, description });
      this.advance(log, 'compared');

      return { verdict: interpretComparatorResponse(rawText), rawText };
    } catch (error) {
      if (error instanceof ComparatorError || error instanceof StorageError) {
        log.error({ err: error }, 'Photo comparison failed, using fallback verdict');
        return { verdict: fallbackVerdict(), rawText: '' };
      }
      throw error;
    }
  }

  /**
   * URL the comparator can fetch right now: presigned for our bucket, absolute for
   * local media (null without a public base), unchanged for anything else
   */
  private async accessUrl(url: string): Promise<string | null> {
    if (this.localMedia.isLocal(url)) {
      return this.localMedia.absoluteUrl(url);
    }
    if (this.blobStore.owns(url)) {
      return this.blobStore.presign(this.blobStore.extractKey(url), this.options.presignTtlSeconds);
    }
    return url;
  }

  // Best effort; failures are logged by the stores and never reach the caller
  private async discard(url: string, log: Logger): Promise<void> {
    let deleted: boolean;
    if (this.localMedia.isLocal(url)) {
      deleted = await this.localMedia.delete(url);
    } else if (this.blobStore.owns(url)) {
      deleted = await this.blobStore.delete(this.blobStore.extractKey(url));
    } else {
      log.warn({ url }, 'Stored photo is not managed by this service, leaving it in place');
      return;
    }

    if (!deleted) {
      log.warn({ url }, 'Could not remove stored photo');
    }
  }
}
