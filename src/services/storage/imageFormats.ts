import path from 'path';

const CONTENT_TYPES = {
  jpg: 'image/jpeg',
  jpeg: 'image/jpeg',
  png: 'image/png',
  gif: 'image/gif',
  webp: 'image/webp',
} as const;

export type ImageExtension = keyof typeof CONTENT_TYPES;

export const ALLOWED_IMAGE_EXTENSIONS = Object.keys(CONTENT_TYPES);

/**
 * Lower-cased extension of a file name, or null when it is not an accepted image type
 */
export function imageExtensionOf(filename: string): ImageExtension | null {
  const ext = path.extname(filename).slice(1).toLowerCase();
  return isImageExtension(ext) ? ext : null;
}

export function isImageExtension(value: string): value is ImageExtension {
  return Object.prototype.hasOwnProperty.call(CONTENT_TYPES, value);
}

export function contentTypeFor(extension: ImageExtension): string {
  return CONTENT_TYPES[extension];
}
