import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { LocalMediaService } from '../../src/services/storage/localMedia.service.js';

describe('LocalMediaService', () => {
  let root: string;
  let media: LocalMediaService;

  beforeEach(async () => {
    root = await fs.mkdtemp(path.join(os.tmpdir(), 'photo-hunt-media-'));
    media = new LocalMediaService({ root, urlPrefix: '/media' });
  });

  afterEach(async () => {
    await fs.rm(root, { recursive: true, force: true });
  });

  it('should write the bytes under the folder and return a media URL', async () => {
    const url = await media.save(Buffer.from('png-bytes'), 'submissions', 'png');

    expect(url).toMatch(/^\/media\/submissions\/[0-9a-f-]{36}\.png$/);
    const written = await fs.readFile(path.join(root, url.slice('/media/'.length)));
    expect(written.toString()).toBe('png-bytes');
  });

  it('should delete a saved file', async () => {
    const url = await media.save(Buffer.from('png-bytes'), 'submissions', 'png');

    await expect(media.delete(url)).resolves.toBe(true);
    await expect(fs.readdir(path.join(root, 'submissions'))).resolves.toEqual([]);
  });

  it('should report a missing file instead of throwing', async () => {
    await expect(media.delete('/media/submissions/missing.png')).resolves.toBe(false);
  });

  it('should refuse paths that leave the media root', async () => {
    const outside = path.join(path.dirname(root), 'outside.txt');

    await expect(media.delete('/media/../outside.txt')).resolves.toBe(false);
    await expect(media.delete('https://example.com/a.png')).resolves.toBe(false);
    await expect(fs.access(outside)).rejects.toThrow();
  });

  it('should recognise its own URLs', () => {
    expect(media.isLocal('/media/submissions/a.png')).toBe(true);
    expect(media.isLocal('/mediafiles/a.png')).toBe(false);
    expect(media.isLocal('https://example.com/media/a.png')).toBe(false);
  });

  it('should build absolute URLs only with a public base', () => {
    expect(media.absoluteUrl('/media/submissions/a.png')).toBeNull();

    const served = new LocalMediaService({
      root,
      urlPrefix: '/media',
      publicBaseUrl: 'https://api.example.com',
    });
    expect(served.absoluteUrl('/media/submissions/a.png')).toBe(
      'https://api.example.com/media/submissions/a.png'
    );
  });
});
