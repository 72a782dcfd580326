import type { ByteSource, FormatSchema, SampleFormat, SeismicTrace, TraceCursorState } from './types'
import type { SingleByteCharset } from './charset'
import { getCharset } from './charset'
import { decodeHeader } from './headerDecoder'
import { MalformedTraceError, SchemaError, TraceError, TruncatedTraceError } from './errors'
import { readNumber } from './numeric'
import { TYPE_WIDTH } from './schema'
import { readFully } from './source'

export interface TraceCursorOptions {
  schema: FormatSchema         // trace sub-header layout; must declare a countField
  charset: SingleByteCharset | string
  sampleFormat?: SampleFormat  // defaults to IBMFloat32
  baseOffset?: number          // absolute stream offset of the first trace
}

/**
 * Forward-only reader of trace records (sub-header + sample block).
 *
 * ready ──next()──▶ active ──next()──▶ active ...
 *   │                 │
 *   └──── clean end ──┴──▶ exhausted   (next() keeps returning null)
 *   └──── short read ─┴──▶ failed      (next() rethrows the same error)
 *
 * There is no seek or restart; a new walk needs a new cursor over a source
 * positioned at the start of the trace region. The cursor never closes the
 * source.
 */
export class TraceCursor implements Iterable<SeismicTrace> {
  private readonly source: ByteSource
  private readonly schema: FormatSchema
  private readonly countField: string
  private readonly charset: SingleByteCharset
  private readonly sampleFormat: SampleFormat
  private readonly sampleWidth: number

  private cursorState: TraceCursorState = 'ready'
  private consumed: number
  private traceIndex = 0
  private failure: TraceError | null = null

  constructor(source: ByteSource, options: TraceCursorOptions) {
    const { countField } = options.schema
    if (countField === undefined) {
      throw new SchemaError(`${options.schema.name}: trace schema needs a count field`)
    }
    this.source = source
    this.schema = options.schema
    this.countField = countField
    this.charset = typeof options.charset === 'string' ? getCharset(options.charset) : options.charset
    this.sampleFormat = options.sampleFormat ?? 'IBMFloat32'
    this.sampleWidth = TYPE_WIDTH[this.sampleFormat]
    this.consumed = options.baseOffset ?? 0
  }

  get state(): TraceCursorState {
    return this.cursorState
  }

  /** Absolute offset just past the last byte read. */
  get bytesConsumed(): number {
    return this.consumed
  }

  /** Traces returned so far. */
  get count(): number {
    return this.traceIndex
  }

  get error(): TraceError | null {
    return this.failure
  }

  next(): SeismicTrace | null {
    if (this.cursorState === 'exhausted') return null
    if (this.failure) throw this.failure

    const start = this.consumed
    const headerSize = this.schema.size
    const headerBytes = readFully(this.source, headerSize)

    if (headerBytes.length === 0) {
      this.cursorState = 'exhausted'
      return null
    }
    if (headerBytes.length < headerSize) {
      this.consumed += headerBytes.length
      return this.fail(new TruncatedTraceError(this.traceIndex, start, 'header', headerSize, headerBytes.length))
    }
    this.consumed += headerSize

    const header = decodeHeader(this.schema, headerBytes, this.charset)
    const sampleCount = header.values[this.countField]
    if (typeof sampleCount !== 'number' || !Number.isInteger(sampleCount) || sampleCount < 0) {
      return this.fail(new MalformedTraceError(this.traceIndex, start, `${this.countField} is ${sampleCount}`))
    }

    const sampleBytes = sampleCount * this.sampleWidth
    const data = readFully(this.source, sampleBytes)
    this.consumed += data.length
    if (data.length < sampleBytes) {
      return this.fail(new TruncatedTraceError(this.traceIndex, start, 'samples', sampleBytes, data.length))
    }

    const view = new DataView(data.buffer, data.byteOffset, data.byteLength)
    const samples = new Array<number>(sampleCount)
    for (let i = 0; i < sampleCount; i++) {
      samples[i] = readNumber(view, i * this.sampleWidth, this.sampleFormat)
    }

    this.cursorState = 'active'
    return {
      index: this.traceIndex++,
      header,
      samples,
      bytesConsumed: this.consumed,
    }
  }

  *[Symbol.iterator](): Iterator<SeismicTrace> {
    for (let trace = this.next(); trace; trace = this.next()) {
      yield trace
    }
  }

  private fail(error: TraceError): never {
    this.cursorState = 'failed'
    this.failure = error
    throw error
  }
}
