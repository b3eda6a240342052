export { defineAdapter, adapterKey } from './factory.js';
export type {
  SourceKind,
  PostingStatus,
  ScrapedPosting,
  Posting,
  PostingDraft,
  PostingResult,
  BoardTarget,
  SourceLogger,
  AcquireContext,
  SourceAdapter,
  AdapterManifest,
  AdapterDefinition,
} from './types.js';
export { buildJobId, buildPosting, collectPostings, inferRemotePolicy, normalizeText } from './posting.js';
export { FetchClient } from './fetch-client.js';
export type { FetchClientOptions } from './fetch-client.js';
export { TransportError, DecodeError, InvalidBoardUrlError, serializeError, toError } from './errors.js';
export type { DecodeKind, SerializedError } from './errors.js';
export { decodeEscapedHtml, htmlToText, extractRequirements } from './html.js';
export {
  sourceKindSchema,
  postingStatusSchema,
  companyIdSchema,
  postingRecordSchema,
  validatePostingRecords,
  toPostingRecord,
  fromPostingRecord,
} from './schema.js';
export type { PostingRecord, ValidatePostingRecordsOptions } from './schema.js';
export { isRecord, asString, asNumber, asStringArray } from './guards.js';
