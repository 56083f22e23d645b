import type { IncomingHttpHeaders } from 'node:http';
import type { Readable } from 'node:stream';
import busboy from 'busboy';
import { CancelledError, PayloadTooLargeError } from '@efaktur/shared';

/** Multipart field carrying the document */
export const UPLOAD_FIELD = 'file';

/**
 * The request is not a usable multipart upload
 */
export class InvalidUploadError extends Error {
  readonly errorCode = 'INVALID_UPLOAD';

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'InvalidUploadError';
  }
}

export interface Upload {
  content: Uint8Array;
  fileName?: string;
  mediaType?: string;
}

export interface ReadUploadOptions {
  maxBytes: number;
  signal?: AbortSignal;
}

/**
 * Read the `file` part of a multipart/form-data request body.
 *
 * Other fields and parts are drained and ignored.
 *
 * @throws InvalidUploadError when the body is not multipart or has no file part
 * @throws PayloadTooLargeError when the file exceeds `maxBytes`
 */
export function readUpload(
  request: Readable & { headers: IncomingHttpHeaders },
  options: ReadUploadOptions,
): Promise<Upload> {
  return new Promise((resolve, reject) => {
    let parser: busboy.Busboy;
    try {
      parser = busboy({
        headers: request.headers,
        limits: { files: 1, fileSize: options.maxBytes, fields: 20 },
      });
    } catch (error) {
      reject(new InvalidUploadError('Expected a multipart/form-data upload', { cause: error }));
      return;
    }

    let upload: Upload | undefined;
    let failure: Error | undefined;
    let pending: Promise<void> = Promise.resolve();

    const fail = (error: Error): void => {
      failure ??= error;
      request.unpipe(parser);
      request.resume();
      reject(failure);
    };

    const onAbort = (): void => {
      fail(new CancelledError('upload', { cause: options.signal?.reason }));
    };
    options.signal?.addEventListener('abort', onAbort, { once: true });

    parser.on('file', (name, stream, info) => {
      if (name !== UPLOAD_FIELD || upload !== undefined) {
        stream.resume();
        return;
      }

      const chunks: Buffer[] = [];
      stream.on('data', (chunk: Buffer) => {
        chunks.push(chunk);
      });
      stream.on('limit', () => {
        fail(new PayloadTooLargeError(options.maxBytes));
      });
      pending = new Promise((done) => {
        stream.on('end', () => {
          if (!stream.truncated) {
            const received: Upload = { content: Buffer.concat(chunks) };
            if (info.filename) {
              received.fileName = info.filename;
            }
            if (info.mimeType) {
              received.mediaType = info.mimeType;
            }
            upload = received;
          }
          done();
        });
      });
    });

    parser.on('error', (error: unknown) => {
      fail(new InvalidUploadError('Malformed multipart body', { cause: error }));
    });

    parser.on('close', () => {
      options.signal?.removeEventListener('abort', onAbort);
      void pending.then(() => {
        if (failure !== undefined) return;
        if (upload === undefined) {
          reject(new InvalidUploadError(`Missing file in form field "${UPLOAD_FIELD}"`));
          return;
        }
        resolve(upload);
      });
    });

    request.pipe(parser);
  });
}
