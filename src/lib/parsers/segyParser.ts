import type { ByteSource, DecodedHeader, ParseResult, SampleFormat, TraceSummary } from '../decoder/types'
import type { SingleByteCharset } from '../decoder/charset'
import type { GeoParser } from './types'
import { DCMI_DATASET, DEFAULT_SEGY_CHARSET } from './types'
import { getCharset } from '../decoder/charset'
import { decodeHeader, getNumber } from '../decoder/headerDecoder'
import { summarizeTraces } from '../decoder/facade'
import { TraceCursor } from '../decoder/traceCursor'
import { readAll } from '../decoder/textBlock'
import { limitSource, readFully } from '../decoder/source'
import { TruncatedHeaderError, UnsupportedSampleFormatError } from '../decoder/errors'
import {
  BINARY_HEADER_LENGTH,
  END_TEXT_STANZA,
  SEGY_TRACE_HEADER,
  TEXT_HEADER_LENGTH,
  dataSampleCodeName,
  sampleFormatFor,
  selectBinaryHeaderSchema,
} from '../decoder/builtins/segy'

export const SEGY_MIME = 'application/segy'

export interface SegyParseOptions {
  charset?: string
  traceSummary?: boolean
  verbose?: boolean
}

function readTextBlock(source: ByteSource, charset: SingleByteCharset, what: string): string {
  const text = readAll(limitSource(source, TEXT_HEADER_LENGTH), charset)
  // Single-byte charsets: one character per byte
  if (text.length < TEXT_HEADER_LENGTH) {
    throw new TruncatedHeaderError(what, TEXT_HEADER_LENGTH, text.length)
  }
  return text
}

function readExtendedTextHeaders(source: ByteSource, charset: SingleByteCharset, header: DecodedHeader): string[] {
  const declared = header.values.extendedTextHeaderCount
  if (typeof declared !== 'number' || declared === 0) return []

  const blocks: string[] = []
  if (declared > 0) {
    for (let i = 0; i < declared; i++) {
      blocks.push(readTextBlock(source, charset, `SEG-Y extended textual header ${i + 1}`))
    }
    return blocks
  }

  // Negative count: variable number of blocks, the last one holds the end stanza
  for (;;) {
    const block = readTextBlock(source, charset, `SEG-Y extended textual header ${blocks.length + 1}`)
    blocks.push(block)
    if (block.includes(END_TEXT_STANZA)) return blocks
  }
}

function describeSummary(summary: TraceSummary): string {
  let text = `Traces: ${summary.count}`
  if (summary.min !== null && summary.max !== null) {
    text += ` Min: ${summary.min} Max: ${summary.max} Diff: ${summary.max - summary.min}`
  }
  if (!summary.complete && summary.error) {
    text += ` Incomplete: ${summary.error.message}`
  }
  return text
}

/**
 * SEG-Y seismic files: EBCDIC textual header, binary header, then traces.
 *
 * The content is the data sample code name followed by the textual header
 * (plus any extended textual headers) as decoded. With `traceSummary` on,
 * every trace is folded into a count and sample min/max appended to it.
 */
export class SegyParser implements GeoParser<SegyParseOptions> {
  readonly name = 'SEG-Y'
  readonly supportedTypes: readonly string[] = [SEGY_MIME, 'application/sgy', 'application/seg']

  private readonly defaults: Required<SegyParseOptions>

  constructor(defaults: SegyParseOptions = {}) {
    this.defaults = {
      charset: defaults.charset ?? DEFAULT_SEGY_CHARSET,
      traceSummary: defaults.traceSummary ?? false,
      verbose: defaults.verbose ?? false,
    }
  }

  parse(source: ByteSource, options: SegyParseOptions = {}): ParseResult {
    // Resolve before touching the stream
    const charset = getCharset(options.charset ?? this.defaults.charset)
    const traceSummary = options.traceSummary ?? this.defaults.traceSummary
    const verbose = options.verbose ?? this.defaults.verbose

    const text = readTextBlock(source, charset, 'SEG-Y textual header')

    const block = readFully(source, BINARY_HEADER_LENGTH)
    if (block.length < BINARY_HEADER_LENGTH) {
      throw new TruncatedHeaderError('SEG-Y binary header', BINARY_HEADER_LENGTH, block.length)
    }
    const schema = selectBinaryHeaderSchema(block)
    const header = decodeHeader(schema, block, charset)
    if (verbose) console.error(`[SEGY] Binary header decoded with ${schema.name}`)

    const extended = readExtendedTextHeaders(source, charset, header)
    const sampleCode = getNumber(header, 'dataSampleCode')

    let content = `${dataSampleCodeName(sampleCode)} ${text}${extended.join('')} `
    let summary: TraceSummary | undefined

    if (traceSummary) {
      summary = this.summarize(source, charset, sampleCode, extended.length, verbose)
      content += describeSummary(summary)
    }

    return {
      record: { mimeOverride: SEGY_MIME, dcmiType: DCMI_DATASET, content },
      header,
      ...(summary ? { summary } : {}),
    }
  }

  private summarize(
    source: ByteSource,
    charset: SingleByteCharset,
    sampleCode: number,
    extendedCount: number,
    verbose: boolean,
  ): TraceSummary {
    let sampleFormat: SampleFormat
    try {
      sampleFormat = sampleFormatFor(sampleCode)
    } catch (err) {
      if (!(err instanceof UnsupportedSampleFormatError)) throw err
      if (verbose) console.error(`[SEGY] ${err.message}; skipping trace summary`)
      return { count: 0, min: null, max: null, complete: false, error: err }
    }

    const cursor = new TraceCursor(source, {
      schema: SEGY_TRACE_HEADER,
      charset,
      sampleFormat,
      baseOffset: TEXT_HEADER_LENGTH * (1 + extendedCount) + BINARY_HEADER_LENGTH,
    })
    const summary = summarizeTraces(cursor, verbose)
    if (verbose) console.error(`[SEGY] Summarized ${summary.count} traces, ${cursor.bytesConsumed} bytes`)
    return summary
  }
}
