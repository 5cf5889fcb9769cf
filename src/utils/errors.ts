/**
 * REST API Error Class
 * All errors that reach the client should be converted to this type
 */
export class ApiError extends Error {
  constructor(
    public readonly statusCode: number,
    message: string,
    public readonly field?: string
  ) {
    super(message);
    this.name = 'ApiError';
    Error.captureStackTrace(this, this.constructor);
  }
}

export const Errors = {
  // 400 Bad Request
  badRequest: (message: string, field?: string) => new ApiError(400, message, field),

  // 401 Unauthorized
  unauthorized: (message = 'Authentication required') => new ApiError(401, message),

  // 404 Not Found
  notFound: (resource: string) => new ApiError(404, `${resource} not found`),

  // 409 Conflict
  conflict: (message: string) => new ApiError(409, message),

  // 500 Internal Server Error
  internal: (message = 'Internal server error') => new ApiError(500, message),
};

/**
 * Object store or local media failure. Never sent to clients as-is.
 */
export class StorageError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'StorageError';
  }
}

/**
 * Failure talking to the image comparator (network, auth, timeout, empty reply).
 */
export class ComparatorError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ComparatorError';
  }
}
