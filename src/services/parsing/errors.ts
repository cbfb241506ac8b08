/**
 * Parsing errors
 *
 * @module services/parsing/errors
 */

export type ParseErrorCode =
  | 'READ_FAILED'
  | 'MALFORMED_CSV'
  | 'MISSING_HEADER'
  | 'EMPTY_HEADER'
  | 'DUPLICATE_HEADER'
  | 'INVALID_JSON'
  | 'NOT_AN_ARRAY'
  | 'NOT_AN_OBJECT';

/**
 * Malformed framing. The whole file is rejected: no row of it is validated
 * or loaded.
 */
export class FatalParseError extends Error {
  constructor(
    message: string,
    public readonly code: ParseErrorCode,
    /** Data row the problem was found at, when it belongs to one */
    public readonly rowNumber?: number,
    public readonly cause?: unknown
  ) {
    super(message);
    this.name = 'FatalParseError';
  }
}

/**
 * Non-fatal framing issue, e.g. a CSV record with more fields than the header
 */
export interface ParseWarning {
  row_number: number;
  message: string;
}
