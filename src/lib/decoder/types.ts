export type DecodeType =
  | 'Int8'
  | 'Int16BE'
  | 'Int32BE'
  | 'IBMFloat32'
  | 'IEEEFloat32'
  | 'FixedString'

// Every numeric decode type doubles as a trace sample format
export type SampleFormat = Exclude<DecodeType, 'FixedString'>

export type DecodedValue = number | string

export interface FieldRange {
  readonly start: number  // inclusive byte offset within the block
  readonly end: number    // exclusive
}

export interface FieldSpec {
  readonly name: string
  readonly range: FieldRange
  readonly type: DecodeType
}

export interface FormatSchema {
  readonly name: string
  readonly fields: readonly FieldSpec[]
  readonly size: number        // bytes the block occupies in the stream
  readonly extent: number      // largest field end; a block must be at least this long
  readonly countField?: string // integer field holding the sample count of the record that follows
}

export interface DecodedField {
  name: string
  value: DecodedValue
  type: DecodeType
  offset: number  // byte offset relative to block start
  size: number    // byte length of this field
}

export interface DecodedHeader {
  readonly schema: string
  readonly fields: readonly DecodedField[]
  readonly values: Readonly<Record<string, DecodedValue>>
}

export interface SeismicTrace {
  index: number          // zero-based position in the trace region
  header: DecodedHeader
  samples: number[]
  bytesConsumed: number  // cursor position after this trace
}

export type TraceCursorState = 'ready' | 'active' | 'exhausted' | 'failed'

export interface TraceSummary {
  count: number
  min: number | null  // null until a sample has been read
  max: number | null
  complete: boolean   // false when the walk stopped on a structural error
  error?: Error
}

export interface ByteSource {
  // Returns up to `length` bytes; an empty result means end of stream
  read(length: number): Uint8Array
  close?(): void
}

export interface ExtractedRecord {
  mimeOverride: string
  dcmiType: string
  content: string
}

export interface ParseResult {
  record: ExtractedRecord
  header?: DecodedHeader
  summary?: TraceSummary
}
