import type { ByteSource, DecodedHeader, FormatSchema, SampleFormat, TraceSummary } from './types'
import type { SingleByteCharset } from './charset'
import { getCharset } from './charset'
import { decodeHeader } from './headerDecoder'
import { TraceError, TruncatedHeaderError } from './errors'
import { TraceCursor } from './traceCursor'
import { readFully } from './source'

export interface TraceSummaryOptions {
  // Fixed sample format, or one derived from the decoded file header
  sampleFormat?: SampleFormat | ((header: DecodedHeader) => SampleFormat)
  baseOffset?: number  // absolute offset of the header block in the stream
  verbose?: boolean
}

export interface HeaderWithSummary {
  header: DecodedHeader
  summary: TraceSummary
}

/** Reads exactly `schema.size` bytes or throws TruncatedHeaderError. */
export function readBlock(source: ByteSource, schema: FormatSchema): Uint8Array {
  const block = readFully(source, schema.size)
  if (block.length < schema.size) {
    throw new TruncatedHeaderError(schema.name, schema.size, block.length)
  }
  return block
}

export function extractHeaderOnly(
  source: ByteSource,
  schema: FormatSchema,
  charset: SingleByteCharset | string,
): DecodedHeader {
  const cs = typeof charset === 'string' ? getCharset(charset) : charset
  return decodeHeader(schema, readBlock(source, schema), cs)
}

/**
 * Folds every trace of `cursor` into a count and a min/max over all samples.
 * Only the current trace is held in memory. A TraceError ends the fold with
 * `complete: false`; traces read before it are still counted.
 */
export function summarizeTraces(cursor: TraceCursor, verbose = false): TraceSummary {
  let min: number | null = null
  let max: number | null = null

  try {
    for (const trace of cursor) {
      for (const sample of trace.samples) {
        if (min === null || sample < min) min = sample
        if (max === null || sample > max) max = sample
      }
    }
  } catch (err) {
    if (!(err instanceof TraceError)) throw err
    if (verbose) {
      console.error(`[TRACE] Stopped after ${cursor.count} traces: ${err.message}`)
    }
    return { count: cursor.count, min, max, complete: false, error: err }
  }

  return { count: cursor.count, min, max, complete: true }
}

export function extractWithTraceSummary(
  source: ByteSource,
  headerSchema: FormatSchema,
  traceSchema: FormatSchema,
  charset: SingleByteCharset | string,
  options: TraceSummaryOptions = {},
): HeaderWithSummary {
  const cs = typeof charset === 'string' ? getCharset(charset) : charset
  const header = extractHeaderOnly(source, headerSchema, cs)

  const { sampleFormat } = options
  const cursor = new TraceCursor(source, {
    schema: traceSchema,
    charset: cs,
    sampleFormat: typeof sampleFormat === 'function' ? sampleFormat(header) : sampleFormat,
    baseOffset: (options.baseOffset ?? 0) + headerSchema.size,
  })

  return { header, summary: summarizeTraces(cursor, options.verbose) }
}
