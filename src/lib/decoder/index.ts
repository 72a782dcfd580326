export { defineSchema, fieldRange, TYPE_WIDTH } from './schema'
export type { FieldDefinition, SchemaOptions } from './schema'
export { decodeHeader, getNumber, getString } from './headerDecoder'
export { decodeIbmFloat32 } from './numeric'
export { TraceCursor } from './traceCursor'
export type { TraceCursorOptions } from './traceCursor'
export { readAll } from './textBlock'
export { extractHeaderOnly, extractWithTraceSummary, readBlock, summarizeTraces } from './facade'
export type { HeaderWithSummary, TraceSummaryOptions } from './facade'
export { bufferSource, fileSource, limitSource, readFully } from './source'
export { getCharset, isCharsetSupported, SingleByteCharset } from './charset'
export {
  ExtractionError,
  SchemaError,
  CharsetUnavailableError,
  TruncatedHeaderError,
  UnsupportedSampleFormatError,
  TraceError,
  TruncatedTraceError,
  MalformedTraceError,
} from './errors'
export {
  SEGY_BINARY_HEADER_REV0,
  SEGY_BINARY_HEADER_REV1,
  SEGY_TRACE_HEADER,
  selectBinaryHeaderSchema,
  dataSampleCodeName,
  sampleFormatFor,
} from './builtins/segy'
export type { DataSampleCodeName } from './builtins/segy'
export type {
  ByteSource,
  DecodedField,
  DecodedHeader,
  DecodedValue,
  DecodeType,
  ExtractedRecord,
  FieldRange,
  FieldSpec,
  FormatSchema,
  ParseResult,
  SampleFormat,
  SeismicTrace,
  TraceCursorState,
  TraceSummary,
} from './types'
