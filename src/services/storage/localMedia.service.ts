import { randomUUID } from 'crypto';
import fs from 'fs/promises';
import path from 'path';
import { MediaConfig } from '../../config/index.js';
import { StorageError } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';

export interface MediaStorage {
  save(payload: Buffer, folder: string, extension: string): Promise<string>;
  // Absolute URL for a local media URL, or null when no public base is configured
  absoluteUrl(url: string): string | null;
  isLocal(url: string): boolean;
  // Never throws
  delete(url: string): Promise<boolean>;
}

/**
 * Disk storage under the media root, served by the API under the media URL prefix.
 * Used when the object store refuses an upload.
 */
export class LocalMediaService implements MediaStorage {
  private readonly root: string;

  constructor(private readonly config: MediaConfig) {
    this.root = path.resolve(config.root);
  }

  async save(payload: Buffer, folder: string, extension: string): Promise<string> {
    const relative = `${folder}/${randomUUID()}.${extension}`;
    const target = this.resolve(relative);
    if (!target) {
      throw new StorageError(`Invalid media folder: ${folder}`);
    }

    try {
      await fs.mkdir(path.dirname(target), { recursive: true });
      await fs.writeFile(target, payload);
    } catch (error) {
      throw new StorageError(`Failed to write ${relative} to local media`, { cause: error });
    }

    logger.debug(`Saved to local media: ${relative}`);
    return `${this.config.urlPrefix}/${relative}`;
  }

  absoluteUrl(url: string): string | null {
    if (!this.config.publicBaseUrl) {
      return null;
    }
    return `${this.config.publicBaseUrl}${url}`;
  }

  isLocal(url: string): boolean {
    return url.startsWith(`${this.config.urlPrefix}/`);
  }

  async delete(url: string): Promise<boolean> {
    const target = this.isLocal(url)
      ? this.resolve(url.slice(this.config.urlPrefix.length + 1))
      : null;
    if (!target) {
      logger.warn({ url }, 'Refusing to delete path outside local media');
      return false;
    }

    try {
      await fs.unlink(target);
      logger.debug(`Deleted from local media: ${url}`);
      return true;
    } catch (error) {
      logger.warn({ err: error, url }, 'Failed to delete local media file');
      return false;
    }
  }

  private resolve(relative: string): string | null {
    const target = path.resolve(this.root, relative);
    return target.startsWith(`${this.root}${path.sep}`) ? target : null;
  }
}
