/**
 * @efaktur/steps-authority
 *
 * Authoritative record fetcher boundary and the DJP XML parser.
 *
 * @packageDocumentation
 */

export {
  createAuthorityFetcher,
  createFixtureRecordFetcher,
  DEFAULT_AUTHORITY_TIMEOUT_MS,
  DEFAULT_MAX_REDIRECTS,
  DEFAULT_MAX_RESPONSE_BYTES,
  type AuthorityFetcherConfig,
} from './fetch-record.js';

export {
  parseAuthorityRecord,
  AUTHORITY_ROOT_ELEMENT,
  AUTHORITY_FIELD_ELEMENTS,
  AUTHORITY_PARSERS,
  type ParseAuthorityRecordOptions,
} from './parse-record.js';
