import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { SqliteAdapter } from '../../src/db/adapters/SqliteAdapter.js';
import { ChallengesRepository } from '../../src/db/repositories/challenges.repository.js';
import { CompletionsRepository } from '../../src/db/repositories/completions.repository.js';
import { ProfilesRepository } from '../../src/db/repositories/profiles.repository.js';
import { PhotoSubmissionService } from '../../src/services/submission/photoSubmission.service.js';
import { ImageComparator } from '../../src/services/comparator/imageComparator.service.js';
import { fallbackVerdict } from '../../src/services/comparator/responseInterpreter.js';
import { ComparatorError, Errors } from '../../src/utils/errors.js';
import { createTestDatabase, seedChallenge, seedUser } from '../utils/test-db.js';
import {
  APPROVING_REPLY,
  BUCKET_URL,
  FakeBlobStore,
  FakeMediaStorage,
  REJECTING_REPLY,
  fakeComparator,
} from '../utils/fakes.js';

describe('PhotoSubmissionService', () => {
  let db: SqliteAdapter;
  let completionsRepo: CompletionsRepository;
  let profilesRepo: ProfilesRepository;
  let blobStore: FakeBlobStore;
  let media: FakeMediaStorage;
  let userId: string;
  let challengeId: string;

  const payload = Buffer.from('jpeg-bytes');

  const createService = (comparator: ImageComparator, localMedia = media) =>
    new PhotoSubmissionService(
      new ChallengesRepository(db),
      completionsRepo,
      blobStore,
      localMedia,
      comparator,
      { presignTtlSeconds: 900 }
    );

  const submission = (overrides: { challengeId?: string; filename?: string } = {}) => ({
    userId,
    challengeId: overrides.challengeId ?? challengeId,
    filename: overrides.filename ?? 'tower.jpg',
    payload,
  });

  beforeEach(async () => {
    db = await createTestDatabase();
    completionsRepo = new CompletionsRepository(db);
    profilesRepo = new ProfilesRepository(db);
    blobStore = new FakeBlobStore();
    media = new FakeMediaStorage();
    userId = await seedUser(db);
    challengeId = await seedChallenge(db, {
      description: 'The clock tower on the market square',
      referenceImage: `${BUCKET_URL}/challenges/tower.jpg`,
    });
  });

  afterEach(async () => {
    await db.close();
  });

  describe('before any storage', () => {
    it('should reject an unknown challenge with 404', async () => {
      const { comparator } = fakeComparator(APPROVING_REPLY);

      await expect(
        createService(comparator).submit(
          submission({ challengeId: '00000000-0000-4000-8000-00000000ffff' })
        )
      ).rejects.toMatchObject({ statusCode: 404, message: 'Challenge not found' });
      expect(blobStore.uploads).toHaveLength(0);
    });

    it('should treat an inactive challenge as missing', async () => {
      const inactive = await seedChallenge(db, { isActive: false });
      const { comparator } = fakeComparator(APPROVING_REPLY);

      await expect(
        createService(comparator).submit(submission({ challengeId: inactive }))
      ).rejects.toMatchObject({ statusCode: 404 });
      expect(blobStore.uploads).toHaveLength(0);
    });

    it('should reject an unsupported image format', async () => {
      const { comparator } = fakeComparator(APPROVING_REPLY);

      await expect(
        createService(comparator).submit(submission({ filename: 'tower.bmp' }))
      ).rejects.toMatchObject({
        statusCode: 400,
        field: 'photo',
        message: 'Unsupported image format. Allowed: jpg, jpeg, png, gif, webp',
      });
      expect(blobStore.uploads).toHaveLength(0);
    });

    it('should reject with the fallback verdict when the challenge has no reference image', async () => {
      const noReference = await seedChallenge(db, { referenceImage: null });
      const { comparator, compare } = fakeComparator(APPROVING_REPLY);

      const outcome = await createService(comparator).submit(
        submission({ challengeId: noReference })
      );

      expect(outcome).toEqual({ kind: 'rejected', validation: fallbackVerdict() });
      expect(blobStore.uploads).toHaveLength(0);
      expect(compare).not.toHaveBeenCalled();
    });
  });

  describe('approval', () => {
    it('should commit the completion with the durable URL and presign for the comparator', async () => {
      const { comparator, compare } = fakeComparator(APPROVING_REPLY);

      const outcome = await createService(comparator).submit(submission({ filename: 'TOWER.JPG' }));

      expect(compare).toHaveBeenCalledWith({
        referenceUrl: `${BUCKET_URL}/challenges/tower.jpg?expires=900`,
        submitted: { kind: 'url', url: `${BUCKET_URL}/submissions/upload-1.jpg?expires=900` },
        description: 'The clock tower on the market square',
      });

      expect(outcome.kind).toBe('accepted');
      if (outcome.kind !== 'accepted') return;
      expect(outcome.completion.submitted_image).toBe(`${BUCKET_URL}/submissions/upload-1.jpg`);
      expect(outcome.validation).toEqual({
        similarityScore: 0.88,
        confidenceScore: 0.9,
        isValid: true,
        notes: 'Same clock tower',
        keyMatches: ['Clock face'],
        keyDifferences: [],
      });

      const record = await completionsRepo.findValidation(outcome.completion.id);
      expect(record?.ai_response).toBe(APPROVING_REPLY);
      expect(record?.submitted_image_url).toBe(`${BUCKET_URL}/submissions/upload-1.jpg`);
      expect(record?.validation_prompt).toContain(
        `REFERENCE IMAGE: ${BUCKET_URL}/challenges/tower.jpg\n\nSUBMITTED IMAGE: ${BUCKET_URL}/submissions/upload-1.jpg\n\n`
      );
      expect(record?.validation_prompt).not.toContain('expires=');

      expect(blobStore.deleted).toEqual([]);
      expect(await profilesRepo.getTotalCompletions(userId)).toBe(1);
    });

    it('should delete the replaced photo on resubmission', async () => {
      const { comparator } = fakeComparator(APPROVING_REPLY);
      const service = createService(comparator);

      await service.submit(submission());
      const outcome = await service.submit(submission());

      expect(outcome.kind).toBe('accepted');
      expect(blobStore.deleted).toEqual(['submissions/upload-1.jpg']);
      expect(await profilesRepo.getTotalCompletions(userId)).toBe(1);

      const completion = await completionsRepo.findByUserAndChallenge(userId, challengeId);
      expect(completion?.submitted_image).toBe(`${BUCKET_URL}/submissions/upload-2.jpg`);
    });

    it('should pass a reference image outside the bucket through unchanged', async () => {
      const foreign = await seedChallenge(db, {
        referenceImage: 'https://images.example.com/tower.jpg',
      });
      const { comparator, compare } = fakeComparator(APPROVING_REPLY);

      await createService(comparator).submit(submission({ challengeId: foreign }));

      expect(compare.mock.calls[0][0].referenceUrl).toBe('https://images.example.com/tower.jpg');
    });
  });

  describe('rejection', () => {
    it('should discard the stored photo and record nothing when the photo does not match', async () => {
      const { comparator } = fakeComparator(REJECTING_REPLY);

      const outcome = await createService(comparator).submit(submission());

      expect(outcome).toEqual({
        kind: 'rejected',
        validation: {
          similarityScore: 0.2,
          confidenceScore: 0.85,
          isValid: false,
          notes: 'A different building',
          keyMatches: [],
          keyDifferences: ['No clock tower'],
        },
      });
      expect(blobStore.deleted).toEqual(['submissions/upload-1.jpg']);
      await expect(completionsRepo.findByUserAndChallenge(userId, challengeId)).resolves.toBeNull();
      expect(await profilesRepo.getTotalCompletions(userId)).toBe(0);
    });

    it('should keep an earlier approval when a later photo is rejected', async () => {
      const approving = createService(fakeComparator(APPROVING_REPLY).comparator);
      const rejecting = createService(fakeComparator(REJECTING_REPLY).comparator);

      await approving.submit(submission());
      await rejecting.submit(submission());

      const completion = await completionsRepo.findByUserAndChallenge(userId, challengeId);
      expect(completion?.submitted_image).toBe(`${BUCKET_URL}/submissions/upload-1.jpg`);
      expect(Boolean(completion?.is_valid)).toBe(true);
      expect(blobStore.deleted).toEqual(['submissions/upload-2.jpg']);
    });

    it('should use the fallback verdict when the comparator fails', async () => {
      const compare = vi.fn().mockRejectedValue(new ComparatorError('timeout'));

      const outcome = await createService({ compare }).submit(submission());

      expect(outcome).toEqual({ kind: 'rejected', validation: fallbackVerdict() });
      expect(blobStore.deleted).toEqual(['submissions/upload-1.jpg']);
    });

    it('should use the fallback verdict when presigning fails', async () => {
      blobStore.failPresign = true;
      const { comparator, compare } = fakeComparator(APPROVING_REPLY);

      const outcome = await createService(comparator).submit(submission());

      expect(outcome).toEqual({ kind: 'rejected', validation: fallbackVerdict() });
      expect(compare).not.toHaveBeenCalled();
      expect(blobStore.deleted).toEqual(['submissions/upload-1.jpg']);
    });

    it('should use the fallback verdict for an unreadable reply', async () => {
      const { comparator } = fakeComparator('I cannot help with that.');

      const outcome = await createService(comparator).submit(submission());

      expect(outcome).toEqual({ kind: 'rejected', validation: fallbackVerdict() });
    });

    it('should discard the stored photo and rethrow unexpected errors', async () => {
      const compare = vi.fn().mockRejectedValue(new Error('bug'));

      await expect(createService({ compare }).submit(submission())).rejects.toThrow('bug');
      expect(blobStore.deleted).toEqual(['submissions/upload-1.jpg']);
    });

    it('should discard the stored photo when the commit fails', async () => {
      vi.spyOn(completionsRepo, 'recordApproval').mockRejectedValueOnce(
        Errors.conflict('A submission for this challenge is already being recorded')
      );
      const { comparator } = fakeComparator(APPROVING_REPLY);

      await expect(createService(comparator).submit(submission())).rejects.toMatchObject({
        statusCode: 409,
      });
      expect(blobStore.deleted).toEqual(['submissions/upload-1.jpg']);
    });
  });

  describe('storage fallback', () => {
    beforeEach(() => {
      blobStore.failUploads = true;
    });

    it('should store locally and send the photo inline without a public media URL', async () => {
      const { comparator, compare } = fakeComparator(APPROVING_REPLY);

      const outcome = await createService(comparator).submit(submission());

      expect(media.saved).toEqual([payload]);
      expect(compare.mock.calls[0][0].submitted).toEqual({
        kind: 'inline',
        data: payload,
        mimeType: 'image/jpeg',
      });
      expect(outcome.kind).toBe('accepted');
      if (outcome.kind === 'accepted') {
        expect(outcome.completion.submitted_image).toBe('/media/submissions/local-1.jpg');
      }
    });

    it('should send an absolute media URL when one is configured', async () => {
      const served = new FakeMediaStorage('https://api.example.com');
      const { comparator, compare } = fakeComparator(APPROVING_REPLY);

      await createService(comparator, served).submit(submission({ filename: 'tower.png' }));

      expect(compare.mock.calls[0][0].submitted).toEqual({
        kind: 'url',
        url: 'https://api.example.com/media/submissions/local-1.png',
      });
    });

    it('should delete a rejected local photo from local media', async () => {
      const { comparator } = fakeComparator(REJECTING_REPLY);

      await createService(comparator).submit(submission());

      expect(media.deleted).toEqual(['/media/submissions/local-1.jpg']);
      expect(blobStore.deleted).toEqual([]);
    });

    it('should fail with 500 when local media fails too', async () => {
      media.failSaves = true;
      const { comparator, compare } = fakeComparator(APPROVING_REPLY);

      await expect(createService(comparator).submit(submission())).rejects.toMatchObject({
        statusCode: 500,
        message: 'Failed to store submitted photo',
      });
      expect(compare).not.toHaveBeenCalled();
    });
  });
});
