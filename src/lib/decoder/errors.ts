// ─── Error Types ──────────────────────────────────────────────

export class ExtractionError extends Error {
  public readonly code: string
  public override readonly cause?: unknown

  constructor(message: string, code: string, cause?: unknown) {
    super(message)
    this.name = 'ExtractionError'
    this.code = code
    this.cause = cause
  }
}

/** Malformed schema definition. Raised while building a schema, never while decoding. */
export class SchemaError extends ExtractionError {
  constructor(message: string) {
    super(message, 'SCHEMA_INVALID')
    this.name = 'SchemaError'
  }
}

export class CharsetUnavailableError extends ExtractionError {
  public readonly charset: string

  constructor(charset: string) {
    super(`Charset ${charset} is not supported`, 'CHARSET_UNAVAILABLE')
    this.name = 'CharsetUnavailableError'
    this.charset = charset
  }
}

/** The stream ended before a declared header block was fully present. */
export class TruncatedHeaderError extends ExtractionError {
  public readonly expected: number
  public readonly actual: number

  constructor(what: string, expected: number, actual: number) {
    super(`${what} truncated: expected ${expected} bytes, got ${actual}`, 'HEADER_TRUNCATED')
    this.name = 'TruncatedHeaderError'
    this.expected = expected
    this.actual = actual
  }
}

export class UnsupportedSampleFormatError extends ExtractionError {
  public readonly sampleCode: number

  constructor(sampleCode: number) {
    super(`Data sample code ${sampleCode} cannot be decoded`, 'SAMPLE_FORMAT_UNSUPPORTED')
    this.name = 'UnsupportedSampleFormatError'
    this.sampleCode = sampleCode
  }
}

// ─── Trace Errors ─────────────────────────────────────────────
// Raised by the trace cursor. Traces returned before the error stay valid.

export class TraceError extends ExtractionError {
  public readonly traceIndex: number
  public readonly offset: number

  constructor(message: string, code: string, traceIndex: number, offset: number) {
    super(message, code)
    this.name = 'TraceError'
    this.traceIndex = traceIndex
    this.offset = offset
  }
}

export class TruncatedTraceError extends TraceError {
  constructor(traceIndex: number, offset: number, part: 'header' | 'samples', expected: number, actual: number) {
    super(
      `Trace ${traceIndex} truncated in ${part} at offset ${offset}: expected ${expected} bytes, got ${actual}`,
      'TRACE_TRUNCATED',
      traceIndex,
      offset,
    )
    this.name = 'TruncatedTraceError'
  }
}

export class MalformedTraceError extends TraceError {
  constructor(traceIndex: number, offset: number, detail: string) {
    super(`Trace ${traceIndex} at offset ${offset} is malformed: ${detail}`, 'TRACE_MALFORMED', traceIndex, offset)
    this.name = 'MalformedTraceError'
  }
}
