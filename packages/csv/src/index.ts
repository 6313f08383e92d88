/**
 * @settlekit/csv — CSV boundary of the replay.
 *
 * Parses input rows into well-formed TransactionRecords and renders
 * final account state. The state engine never sees a raw row.
 */

// Record parser
export {
  parseRecordRow,
  readRecords,
  RecordParseError,
  RecordStreamError,
  RawRowSchema,
  REQUIRED_COLUMNS,
} from "./record-parser.js";
export type {
  RecordParseErrorCode,
  RecordStreamErrorCode,
  RecordParseResult,
  ReadRecordsOptions,
  ParsedRow,
  RawRow,
} from "./record-parser.js";

// Output writer
export {
  OUTPUT_HEADER,
  formatAccountRow,
  formatAccountsCsv,
  writeAccountsCsv,
} from "./output-writer.js";
