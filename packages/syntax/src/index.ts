/**
 * @quire/syntax — validators and codecs for protocol identifiers.
 *
 * Every `validateX` function returns a Result holding the canonical form of
 * the input or a {@link FormatError}; `parseX` functions return the decoded
 * structure; `isValidX` functions answer yes or no.
 *
 * @packageDocumentation
 */

// ─── Errors ─────────────────────────────────────────────────────────────────────

export { formatFailure, withFormat } from './errors';
export type { FormatError, FormatName, FormatRule } from './errors';

// ─── Identifiers ────────────────────────────────────────────────────────────────

export { parseDid, validateDid, isValidDid, MAX_DID_LENGTH } from './did';
export type { Did } from './did';

export {
  validateHandle,
  isValidHandle,
  checkLabel,
  DISALLOWED_TLDS,
  MAX_HANDLE_LENGTH,
  MAX_LABEL_LENGTH,
} from './handle';
export type { HandleOptions } from './handle';

export { parseNsid, validateNsid, isValidNsid, MAX_NSID_LENGTH } from './nsid';
export type { Nsid } from './nsid';

export {
  parseTid,
  validateTid,
  isValidTid,
  encodeTid,
  TidGenerator,
  TID_LENGTH,
  MAX_CLOCK_ID,
  MAX_TID_TIMESTAMP,
} from './tid';
export type { Tid, TidGeneratorOptions } from './tid';

export { parseRecordKey, validateRecordKey, isValidRecordKey, MAX_RECORD_KEY_LENGTH } from './record-key';
export type { RecordKey } from './record-key';

export {
  parseCid,
  decodeCid,
  formatCid,
  validateCid,
  isValidCid,
  cidEquals,
  createCid,
  HASH_ALGORITHMS,
  CODEC_RAW,
  CODEC_DAG_PB,
  CODEC_DAG_CBOR,
  CODEC_DAG_JSON,
} from './cid';
export type { Cid, Multihash } from './cid';

export { parseLanguage, validateLanguage, isValidLanguage } from './language';
export type { LanguageTag } from './language';

export { parseDatetime, validateDatetime, isValidDatetime } from './datetime';
export type { Datetime } from './datetime';

export {
  parseAtUri,
  validateAtUri,
  isValidAtUri,
  validateAtIdentifier,
  isValidAtIdentifier,
  validateUri,
  isValidUri,
  MAX_AT_URI_LENGTH,
} from './at-uri';
export type { AtUri } from './at-uri';

// ─── Codecs ─────────────────────────────────────────────────────────────────────

export {
  encodeBase32,
  decodeBase32,
  encodeBase58btc,
  decodeBase58btc,
  encodeBase64,
  decodeBase64,
  toHex,
  fromHex,
  encodeVarint,
  decodeVarint,
  bytesEqual,
} from './encoding';
