import { createServer, type IncomingMessage, type Server, type ServerResponse } from 'node:http';
import { INTERNAL_ERROR_MESSAGE, type ValidateRequest } from '@efaktur/kernel';
import type { ValidationOutcome } from '@efaktur/contracts';
import { CancelledError, createSilentLogger, PayloadTooLargeError, type Logger } from '@efaktur/shared';
import { InvalidUploadError, readUpload } from './read-upload.js';
import { errorBody, serializeOutcome } from './serialize-outcome.js';

export const HEALTH_MESSAGE = 'E-Faktur Validation Service is running';
export const VALIDATE_PATH = '/validate-efaktur';

/**
 * The part of the pipeline the HTTP surface depends on
 */
export interface Validator {
  validate(request: ValidateRequest): Promise<ValidationOutcome>;
}

export interface AppOptions {
  validator: Validator;
  maxUploadBytes: number;
  logger?: Logger;
}

const JSON_HEADERS = { 'Content-Type': 'application/json; charset=utf-8' };

function corsHeaders(request: IncomingMessage): Record<string, string> {
  const requested = request.headers['access-control-request-headers'];
  return {
    'Access-Control-Allow-Origin': '*',
    'Access-Control-Allow-Methods': 'GET, POST, OPTIONS',
    'Access-Control-Allow-Headers': typeof requested === 'string' ? requested : '*',
    'Access-Control-Max-Age': '600',
  };
}

function sendJson(
  request: IncomingMessage,
  response: ServerResponse,
  statusCode: number,
  body: unknown,
  extraHeaders: Record<string, string> = {},
): void {
  response.writeHead(statusCode, { ...JSON_HEADERS, ...corsHeaders(request), ...extraHeaders });
  response.end(JSON.stringify(body));
}

function firstHeader(value: string | string[] | undefined): string | undefined {
  return Array.isArray(value) ? value[0] : value;
}

/**
 * Create the request listener for the validation service.
 *
 * Routes: `GET /` health check, `POST /validate-efaktur` multipart upload,
 * `OPTIONS` preflight on any path.
 */
export function createRequestHandler(
  options: AppOptions,
): (request: IncomingMessage, response: ServerResponse) => Promise<void> {
  const logger = options.logger ?? createSilentLogger();

  const handleValidate = async (request: IncomingMessage, response: ServerResponse): Promise<void> => {
    const controller = new AbortController();
    response.on('close', () => {
      if (!response.writableFinished) {
        controller.abort(new Error('Client disconnected'));
      }
    });

    try {
      const upload = await readUpload(request, {
        maxBytes: options.maxUploadBytes,
        signal: controller.signal,
      });

      const validateRequest: ValidateRequest = { file: upload.content, signal: controller.signal };
      if (upload.fileName !== undefined) {
        validateRequest.fileName = upload.fileName;
      }
      if (upload.mediaType !== undefined) {
        validateRequest.mediaType = upload.mediaType;
      }
      const correlationId = firstHeader(request.headers['x-correlation-id']);
      if (correlationId !== undefined && correlationId.length > 0) {
        validateRequest.correlationId = correlationId;
      }

      const outcome = await options.validator.validate(validateRequest);
      const { statusCode, body } = serializeOutcome(outcome);
      sendJson(request, response, statusCode, body, {
        'X-Run-Id': outcome.runId,
        'X-Correlation-Id': outcome.correlationId,
      });
    } catch (error) {
      if (error instanceof CancelledError) {
        logger.info('Client disconnected; validation abandoned', { stage: error.context?.['stage'] });
        return;
      }
      if (error instanceof PayloadTooLargeError) {
        sendJson(request, response, 413, errorBody(error.message, error.code), { Connection: 'close' });
        return;
      }
      if (error instanceof InvalidUploadError) {
        sendJson(request, response, 400, errorBody(error.message, error.errorCode));
        return;
      }
      throw error;
    }
  };

  return async (request, response) => {
    const path = new URL(request.url ?? '/', 'http://localhost').pathname;
    const method = request.method ?? 'GET';

    try {
      if (method === 'OPTIONS') {
        response.writeHead(204, corsHeaders(request));
        response.end();
        return;
      }

      if (path === '/') {
        if (method !== 'GET' && method !== 'HEAD') {
          sendJson(request, response, 405, errorBody('Method not allowed', 'METHOD_NOT_ALLOWED'), {
            Allow: 'GET, HEAD, OPTIONS',
          });
          return;
        }
        sendJson(request, response, 200, { message: HEALTH_MESSAGE });
        return;
      }

      if (path === VALIDATE_PATH) {
        if (method !== 'POST') {
          sendJson(request, response, 405, errorBody('Method not allowed', 'METHOD_NOT_ALLOWED'), {
            Allow: 'POST, OPTIONS',
          });
          return;
        }
        await handleValidate(request, response);
        return;
      }

      sendJson(request, response, 404, errorBody('Not found', 'NOT_FOUND'));
    } catch (error) {
      logger.error('Request failed', {
        method,
        path,
        error: error instanceof Error ? error.message : String(error),
      });
      if (!response.headersSent) {
        sendJson(request, response, 500, errorBody(INTERNAL_ERROR_MESSAGE, 'INTERNAL_ERROR'));
      } else {
        response.destroy();
      }
    }
  };
}

/**
 * Create an HTTP server around the request handler.
 */
export function createAppServer(options: AppOptions): Server {
  const handler = createRequestHandler(options);
  return createServer((request, response) => {
    void handler(request, response);
  });
}

/**
 * Start listening. Rejects when the socket cannot be bound (port in use,
 * permission denied).
 */
export function listen(server: Server, port: number, host: string): Promise<void> {
  return new Promise((resolve, reject) => {
    const onError = (error: Error): void => {
      server.off('listening', onListening);
      reject(error);
    };
    const onListening = (): void => {
      server.off('error', onError);
      resolve();
    };
    server.once('error', onError);
    server.once('listening', onListening);
    server.listen(port, host);
  });
}
