import { HttpException } from '@nestjs/common';

/**
 * Status codes used by the gateway's error taxonomy.
 *
 * The credential and not-modified sentinels resolve their status from here
 * rather than from literals scattered through the pipeline.
 */
export const ERROR_STATUS = {
  INVALID_SECRET: 403,
  NOT_MODIFIED: 304,
  INVALID_URL: 404,
  UNREACHABLE: 404,
  PROCESSING_FAILED: 500,
  UNEXPECTED: 500,
  TIMEOUT: 503,
  SHUTTING_DOWN: 503,
} as const;

export const PUBLIC_MESSAGES = {
  INVALID_URL: 'Invalid image url',
  UNREACHABLE: 'Image is unreachable',
  PROCESSING_FAILED: 'Error occurred while processing image',
  TIMEOUT: 'Timeout',
  UNEXPECTED: 'Internal error',
  SHUTTING_DOWN: 'Service unavailable',
} as const;

/**
 * Error raised anywhere in the request pipeline.
 *
 * `message` holds the internal diagnostic and is only ever logged;
 * `publicMessage` is the only text written to the client.
 */
export class ImageProxyError extends Error {
  override readonly name = 'ImageProxyError';

  constructor(
    readonly statusCode: number,
    internalMessage: string,
    readonly publicMessage: string,
    options?: { cause?: unknown },
  ) {
    super(internalMessage, options);
  }

  get internalMessage(): string {
    return this.message;
  }

  static invalidUrl(internalMessage: string, cause?: unknown): ImageProxyError {
    return new ImageProxyError(
      ERROR_STATUS.INVALID_URL,
      internalMessage,
      PUBLIC_MESSAGES.INVALID_URL,
      { cause },
    );
  }

  static unreachable(internalMessage: string, cause?: unknown): ImageProxyError {
    return new ImageProxyError(
      ERROR_STATUS.UNREACHABLE,
      internalMessage,
      PUBLIC_MESSAGES.UNREACHABLE,
      { cause },
    );
  }

  static processingFailed(internalMessage: string, cause?: unknown): ImageProxyError {
    return new ImageProxyError(
      ERROR_STATUS.PROCESSING_FAILED,
      internalMessage,
      PUBLIC_MESSAGES.PROCESSING_FAILED,
      { cause },
    );
  }

  static timeout(internalMessage: string): ImageProxyError {
    return new ImageProxyError(ERROR_STATUS.TIMEOUT, internalMessage, PUBLIC_MESSAGES.TIMEOUT);
  }

  static shuttingDown(internalMessage: string): ImageProxyError {
    return new ImageProxyError(
      ERROR_STATUS.SHUTTING_DOWN,
      internalMessage,
      PUBLIC_MESSAGES.SHUTTING_DOWN,
    );
  }

  static unexpected(cause: unknown): ImageProxyError {
    return new ImageProxyError(
      ERROR_STATUS.UNEXPECTED,
      `Unexpected error: ${describeError(cause)}`,
      PUBLIC_MESSAGES.UNEXPECTED,
      { cause },
    );
  }
}

/** Raised when the `Authorization` header does not carry the configured secret. */
export const INVALID_SECRET_ERROR: ImageProxyError = Object.freeze(
  new ImageProxyError(ERROR_STATUS.INVALID_SECRET, 'Invalid secret', 'Forbidden'),
);

/** Raised when the client's `If-None-Match` equals the computed ETag. */
export const NOT_MODIFIED_ERROR: ImageProxyError = Object.freeze(
  new ImageProxyError(ERROR_STATUS.NOT_MODIFIED, 'Not modified', 'Not modified'),
);

export function isImageProxyError(value: unknown): value is ImageProxyError {
  return value instanceof ImageProxyError;
}

export function describeError(value: unknown): string {
  if (value instanceof Error) {
    return value.message;
  }
  return String(value);
}

/**
 * Normalize anything caught at the recovery boundary into an ImageProxyError.
 * Framework HTTP exceptions (unknown routes, wrong methods) keep their status.
 */
export function toImageProxyError(value: unknown): ImageProxyError {
  if (isImageProxyError(value)) {
    return value;
  }

  if (value instanceof HttpException) {
    return new ImageProxyError(value.getStatus(), value.message, value.message, {
      cause: value,
    });
  }

  return ImageProxyError.unexpected(value);
}
