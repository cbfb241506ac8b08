/**
 * Parsing Module
 *
 * @module services/parsing
 */

export { FatalParseError, type ParseErrorCode, type ParseWarning } from './errors.js';
export { fileSource, bufferSource, readPrefix, type ByteSource } from './byte-source.js';
export { detectDelimiter, DELIMITER_CANDIDATES, DEFAULT_DELIMITER } from './delimiter.js';
export { canonicalJson } from './json-parser.js';
export { RowSource, createRowSource, type ScanResult, type RowSourceOptions } from './parser.js';
export { detectTableConfig } from './detect.js';
