import { randomUUID } from 'crypto';
import {
  S3Client,
  PutObjectCommand,
  GetObjectCommand,
  DeleteObjectCommand,
  ObjectCannedACL,
} from '@aws-sdk/client-s3';
import { getSignedUrl } from '@aws-sdk/s3-request-presigner';
import { StorageConfig } from '../../config/index.js';
import { StorageError } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';
import { contentTypeFor, isImageExtension } from './imageFormats.js';

/**
 * Error codes S3 and S3-compatible stores return when a bucket refuses the ACL
 * header (object ownership enforced, ACLs disabled, or unsupported by the server)
 */
const ACL_REJECTION_CODES = new Set([
  'AccessControlListNotSupported',
  'AccessDenied',
  'InvalidRequest',
  'NotImplemented',
]);

export type UploadResult =
  | { kind: 'uploaded'; key: string; url: string }
  | { kind: 'failed'; error: StorageError };

export interface BlobStore {
  upload(payload: Buffer, folder: string, extension: string): Promise<UploadResult>;
  presign(key: string, ttlSeconds: number): Promise<string>;
  extractKey(url: string): string;
  // Whether a remote URL points into this store's bucket
  owns(url: string): boolean;
  // Never throws
  delete(key: string): Promise<boolean>;
}

function isAclRejection(error: unknown): boolean {
  return error instanceof Error && ACL_REJECTION_CODES.has(error.name);
}

function encodeKey(key: string): string {
  return key.split('/').map(encodeURIComponent).join('/');
}

function decodeKey(path: string): string {
  return path.split('/').map(decodeURIComponent).join('/');
}

export class S3BlobStoreService implements BlobStore {
  private readonly client: S3Client;
  private readonly publicBaseUrl: string;

  constructor(
    private readonly config: StorageConfig,
    client?: S3Client
  ) {
    this.client =
      client ??
      new S3Client({
        endpoint: config.endpoint,
        region: config.region,
        credentials: {
          accessKeyId: config.accessKeyId,
          secretAccessKey: config.secretAccessKey,
        },
        forcePathStyle: config.forcePathStyle,
      });

    this.publicBaseUrl =
      config.publicBaseUrl ??
      (config.endpoint
        ? `${config.endpoint.replace(/\/+$/, '')}/${config.bucket}`
        : `https://${config.bucket}.s3.${config.region}.amazonaws.com`);
  }

  /**
   * Upload with the configured ACL; a bucket that rejects the ACL gets exactly one
   * more attempt without it. Failures come back as a result, not an exception.
   */
  async upload(payload: Buffer, folder: string, extension: string): Promise<UploadResult> {
    const key = `${folder}/${randomUUID()}.${extension}`;
    const contentType = isImageExtension(extension)
      ? contentTypeFor(extension)
      : 'application/octet-stream';
    const acl = this.config.defaultAcl;

    try {
      await this.put(key, payload, contentType, acl);
    } catch (error) {
      if (!acl || !isAclRejection(error)) {
        logger.error({ err: error, key }, 'Object store upload failed');
        return {
          kind: 'failed',
          error: new StorageError(`Failed to upload ${key}`, { cause: error }),
        };
      }

      logger.warn({ err: error, key, acl }, 'Bucket rejected ACL, retrying upload without it');
      try {
        await this.put(key, payload, contentType, undefined);
      } catch (retryError) {
        logger.error({ err: retryError, key }, 'Object store upload without ACL failed');
        return {
          kind: 'failed',
          error: new StorageError(`Failed to upload ${key}`, { cause: retryError }),
        };
      }
    }

    logger.debug(`Uploaded to object store: ${key}`);
    return { kind: 'uploaded', key, url: this.publicUrl(key) };
  }

  async presign(key: string, ttlSeconds: number): Promise<string> {
    try {
      return await getSignedUrl(
        this.client,
        new GetObjectCommand({ Bucket: this.config.bucket, Key: key }),
        { expiresIn: ttlSeconds }
      );
    } catch (error) {
      throw new StorageError(`Failed to presign ${key}`, { cause: error });
    }
  }

  /**
   * Object key behind a public, path-style or virtual-host (presigned) URL
   */
  extractKey(url: string): string {
    const prefix = `${this.publicBaseUrl}/`;
    if (url.startsWith(prefix)) {
      return decodeKey(url.slice(prefix.length).split(/[?#]/)[0]);
    }

    let parsed: URL;
    try {
      parsed = new URL(url);
    } catch {
      return decodeKey(url.replace(/^\/+/, '').split(/[?#]/)[0]);
    }

    let path = parsed.pathname.replace(/^\/+/, '');
    const bucketPrefix = `${this.config.bucket}/`;
    if (!parsed.hostname.startsWith(`${this.config.bucket}.`) && path.startsWith(bucketPrefix)) {
      path = path.slice(bucketPrefix.length);
    }
    return decodeKey(path);
  }

  owns(url: string): boolean {
    if (url.startsWith(`${this.publicBaseUrl}/`)) {
      return true;
    }

    let parsed: URL;
    try {
      parsed = new URL(url);
    } catch {
      return false;
    }

    if (parsed.hostname.startsWith(`${this.config.bucket}.s3.`)) {
      return true;
    }
    if (this.config.endpoint && parsed.origin === new URL(this.config.endpoint).origin) {
      return parsed.pathname.startsWith(`/${this.config.bucket}/`);
    }
    return false;
  }

  async delete(key: string): Promise<boolean> {
    try {
      await this.client.send(
        new DeleteObjectCommand({
          Bucket: this.config.bucket,
          Key: key,
        })
      );
      logger.debug(`Deleted from object store: ${key}`);
      return true;
    } catch (error) {
      logger.warn({ err: error, key }, 'Failed to delete object');
      return false;
    }
  }

  private publicUrl(key: string): string {
    return `${this.publicBaseUrl}/${encodeKey(key)}`;
  }

  private async put(
    key: string,
    payload: Buffer,
    contentType: string,
    acl: ObjectCannedACL | undefined
  ): Promise<void> {
    // Each attempt gets its own copy of the bytes
    await this.client.send(
      new PutObjectCommand({
        Bucket: this.config.bucket,
        Key: key,
        Body: Buffer.from(payload),
        ContentType: contentType,
        ...(acl ? { ACL: acl } : {}),
      })
    );
  }
}
