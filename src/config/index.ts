import dotenv from 'dotenv';
import { ObjectCannedACL } from '@aws-sdk/client-s3';

// Load environment variables
dotenv.config();

type NodeEnv = 'development' | 'production' | 'test';

export interface StorageConfig {
  bucket: string;
  region: string;
  accessKeyId: string;
  secretAccessKey: string;
  endpoint?: string;
  forcePathStyle: boolean;
  // Canned ACL applied on upload; unset means no ACL header at all
  defaultAcl?: ObjectCannedACL;
  // Public URL prefix for stored objects (CDN or custom domain)
  publicBaseUrl?: string;
}

export interface ComparatorConfig {
  apiKey: string;
  model: string;
  timeoutMs: number;
  temperature: number;
}

export interface MediaConfig {
  // Local fallback directory for images the object store refused
  root: string;
  urlPrefix: string;
  // When set, local media URLs are made absolute with it for the comparator
  publicBaseUrl?: string;
}

/**
 * Application configuration parsed and validated at startup
 */
export interface Config {
  // Server
  port: number;
  nodeEnv: NodeEnv;
  corsOrigin: string;
  uploadMaxSize: number; // in bytes

  // Database
  databaseUrl: string;

  // Auth
  jwtSecret: string;

  // LOG_LEVEL and SERVICE_NAME are read by utils/logger.ts, which loads before config

  storage: StorageConfig;
  comparator: ComparatorConfig;
  media: MediaConfig;

  presignTtlSeconds: number;
}

const NODE_ENVS: readonly NodeEnv[] = ['development', 'production', 'test'];

function isNodeEnv(value: string): value is NodeEnv {
  return NODE_ENVS.some((env) => env === value);
}

function isCannedAcl(value: string): value is ObjectCannedACL {
  return Object.values<string>(ObjectCannedACL).includes(value);
}

/**
 * Parse and validate environment variables.
 * Throws an error listing every missing or invalid variable.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Readonly<Config> {
  const errors: string[] = [];

  // Helper to get required env var
  const getRequired = (key: string): string => {
    const value = env[key];
    if (!value || value.trim() === '') {
      errors.push(`Missing required environment variable: ${key}`);
      return '';
    }
    return value;
  };

  // Helper to parse a number with a fallback
  const getNumber = (key: string, fallback?: number): number => {
    const value = env[key];
    if (!value || value.trim() === '') {
      if (fallback === undefined) {
        errors.push(`Missing required environment variable: ${key}`);
        return 0;
      }
      return fallback;
    }
    const parsed = parseInt(value, 10);
    if (isNaN(parsed) || parsed < 0) {
      errors.push(`Invalid number for ${key}: ${value}`);
      return 0;
    }
    return parsed;
  };

  const nodeEnvRaw = env.NODE_ENV || 'development';
  let nodeEnv: NodeEnv = 'development';
  if (isNodeEnv(nodeEnvRaw)) {
    nodeEnv = nodeEnvRaw;
  } else {
    errors.push(`Invalid NODE_ENV: ${nodeEnvRaw}. Must be development, production, or test`);
  }

  const aclRaw = env.S3_DEFAULT_ACL?.trim();
  let defaultAcl: ObjectCannedACL | undefined;
  if (aclRaw) {
    if (isCannedAcl(aclRaw)) {
      defaultAcl = aclRaw;
    } else {
      errors.push(`Invalid S3_DEFAULT_ACL: ${aclRaw}`);
    }
  }

  const config: Config = {
    port: getNumber('PORT', 3000),
    nodeEnv,
    corsOrigin: env.CORS_ORIGIN || '*',
    uploadMaxSize: getNumber('UPLOAD_MAX_SIZE', 10 * 1024 * 1024),
    databaseUrl: getRequired('DATABASE_URL'),
    jwtSecret: getRequired('JWT_SECRET'),
    storage: {
      bucket: getRequired('S3_BUCKET'),
      region: env.S3_REGION || 'us-east-1',
      accessKeyId: getRequired('S3_ACCESS_KEY_ID'),
      secretAccessKey: getRequired('S3_SECRET_ACCESS_KEY'),
      endpoint: env.S3_ENDPOINT || undefined,
      forcePathStyle: env.S3_FORCE_PATH_STYLE === 'true',
      defaultAcl,
      publicBaseUrl: env.S3_PUBLIC_BASE_URL?.replace(/\/+$/, '') || undefined,
    },
    comparator: {
      apiKey: getRequired('OPENAI_API_KEY'),
      model: env.OPENAI_MODEL || 'gpt-4o',
      timeoutMs: getNumber('COMPARATOR_TIMEOUT_MS', 60000),
      temperature: 0.1,
    },
    media: {
      root: env.MEDIA_ROOT || './media',
      urlPrefix: (env.MEDIA_URL_PREFIX || '/media').replace(/\/+$/, ''),
      publicBaseUrl: env.MEDIA_PUBLIC_BASE_URL?.replace(/\/+$/, '') || undefined,
    },
    presignTtlSeconds: getNumber('PRESIGN_TTL_SECONDS', 900),
  };

  // Throw if any errors
  if (errors.length > 0) {
    throw new Error(`Configuration validation failed:\n${errors.join('\n')}`);
  }

  return Object.freeze(config);
}
