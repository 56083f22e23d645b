import type { OutcomeErrorCode } from '@efaktur/contracts';

/**
 * Error codes owned by the validator. Most map one-to-one onto outcome codes;
 * CANCELLED and CONFIGURATION_ERROR never reach an outcome.
 */
export type EFakturErrorCode = OutcomeErrorCode | 'CANCELLED' | 'CONFIGURATION_ERROR';

/**
 * Base error class for the e-Faktur validator
 */
export class EFakturError extends Error {
  readonly code: EFakturErrorCode;
  readonly context?: Record<string, unknown>;

  constructor(
    message: string,
    code: EFakturErrorCode,
    context?: Record<string, unknown>,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'EFakturError';
    this.code = code;
    if (context !== undefined) {
      this.context = context;
    }

    // Maintains proper stack trace for where error was thrown
    Error.captureStackTrace?.(this, this.constructor);
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      context: this.context,
    };
  }
}

/**
 * The upload is neither a PDF nor a JPEG/PNG image
 */
export class UnsupportedFormatError extends EFakturError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'UNSUPPORTED_FORMAT', context);
    this.name = 'UnsupportedFormatError';
  }
}

/**
 * The document or image container cannot be opened at all
 */
export class CorruptInputError extends EFakturError {
  constructor(message: string, context?: Record<string, unknown>, options?: { cause?: unknown }) {
    super(message, 'CORRUPT_INPUT', context, options);
    this.name = 'CorruptInputError';
  }
}

/**
 * No raster region yielded a usable lookup URL
 */
export class QrNotFoundError extends EFakturError {
  readonly attempts: number;

  constructor(attempts: number, context?: Record<string, unknown>) {
    super('No valid QR code found in the document', 'QR_NOT_FOUND', { ...context, attempts });
    this.name = 'QrNotFoundError';
    this.attempts = attempts;
  }
}

/**
 * The authority could not be reached (connection failure or timeout)
 */
export class NetworkError extends EFakturError {
  readonly reason: 'timeout' | 'connection';

  constructor(
    message: string,
    reason: 'timeout' | 'connection',
    context?: Record<string, unknown>,
    options?: { cause?: unknown },
  ) {
    super(message, 'NETWORK_ERROR', { ...context, reason }, options);
    this.name = 'NetworkError';
    this.reason = reason;
  }
}

/**
 * The authority answered with a non-2xx status
 */
export class HttpError extends EFakturError {
  readonly status: number;

  constructor(status: number, statusText: string, context?: Record<string, unknown>) {
    super(
      `Authority responded with HTTP ${status}${statusText ? ` ${statusText}` : ''}`,
      'HTTP_ERROR',
      { ...context, status },
    );
    this.name = 'HttpError';
    this.status = status;
  }
}

/**
 * The authority payload is not well-formed XML (or exceeds the size bound)
 */
export class MalformedResponseError extends EFakturError {
  constructor(message: string, context?: Record<string, unknown>, options?: { cause?: unknown }) {
    super(message, 'MALFORMED_RESPONSE', context, options);
    this.name = 'MalformedResponseError';
  }
}

/**
 * An upload exceeded the configured size limit
 */
export class PayloadTooLargeError extends EFakturError {
  readonly limitBytes: number;

  constructor(limitBytes: number) {
    super(`Upload exceeds the maximum size of ${limitBytes} bytes`, 'PAYLOAD_TOO_LARGE', {
      limitBytes,
    });
    this.name = 'PayloadTooLargeError';
    this.limitBytes = limitBytes;
  }
}

/**
 * The caller aborted the run
 */
export class CancelledError extends EFakturError {
  constructor(stage: string, options?: { cause?: unknown }) {
    super(`Validation cancelled during ${stage}`, 'CANCELLED', { stage }, options);
    this.name = 'CancelledError';
  }
}

/**
 * Error thrown for configuration issues
 */
export class ConfigurationError extends EFakturError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'CONFIGURATION_ERROR', context);
    this.name = 'ConfigurationError';
  }
}

/**
 * Narrow an unknown thrown value to an EFakturError
 */
export function isEFakturError(error: unknown): error is EFakturError {
  return error instanceof EFakturError;
}

/**
 * Throw CancelledError when the signal has been aborted
 */
export function throwIfCancelled(signal: AbortSignal | undefined, stage: string): void {
  if (signal?.aborted) {
    throw new CancelledError(stage, { cause: signal.reason });
  }
}
