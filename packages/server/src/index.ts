/**
 * @efaktur/server
 *
 * HTTP surface: health check, multipart validation endpoint and the
 * outcome-to-JSON mapping.
 *
 * @packageDocumentation
 */

export {
  createAppServer,
  createRequestHandler,
  HEALTH_MESSAGE,
  listen,
  VALIDATE_PATH,
  type AppOptions,
  type Validator,
} from './app.js';
export { createProviders, type ProviderSet } from './create-providers.js';
export { InvalidUploadError, readUpload, UPLOAD_FIELD, type ReadUploadOptions, type Upload } from './read-upload.js';
export {
  errorBody,
  httpStatusForError,
  serializeFieldSet,
  serializeFieldValue,
  serializeOutcome,
  type ErrorResponseBody,
  type ValidationResponseBody,
  type WireDeviation,
  type WireDeviationType,
} from './serialize-outcome.js';
