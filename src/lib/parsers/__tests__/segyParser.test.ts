import { describe, it, expect, vi, afterEach } from 'vitest'
import fs from 'node:fs'
import os from 'node:os'
import path from 'node:path'
import type { SampleFormat } from '../../decoder/types'
import { SegyParser, SEGY_MIME } from '../segyParser'
import { parseFile } from '../index'
import { bufferSource } from '../../decoder/source'
import { CharsetUnavailableError, TruncatedHeaderError, UnsupportedSampleFormatError } from '../../decoder/errors'
import { SEGY_BINARY_HEADER_REV0, SEGY_BINARY_HEADER_REV1, SEGY_TRACE_HEADER } from '../../decoder/builtins/segy'
import { concat, encodeHeader, encodeText, encodeTrace } from '../../decoder/__tests__/helpers/encode'
import { countingSource } from '../../decoder/__tests__/helpers/sources'

const TEXT = ('C 1 CLIENT: TEST SURVEY'.padEnd(80) + 'C 2 LINE: 7'.padEnd(80)).padEnd(3200)

function textHeader(text = TEXT): Uint8Array {
  return encodeText(text.padEnd(3200), 'Cp1047')
}

function binaryHeader({ rev1 = true, code = 1, extended = 0 } = {}): Uint8Array {
  const common = { lineNumber: 7, sampleInterval: 4000, samplesPerTrace: 2, dataSampleCode: code }
  return rev1
    ? encodeHeader(SEGY_BINARY_HEADER_REV1, {
      ...common,
      formatRevision: 0x0100,
      fixedLengthTraceFlag: 1,
      extendedTextHeaderCount: extended,
    }, 'Cp1047')
    : encodeHeader(SEGY_BINARY_HEADER_REV0, common, 'Cp1047')
}

function segyTrace(samples: number[], format: SampleFormat = 'IBMFloat32', width = 4): Uint8Array {
  return encodeTrace(SEGY_TRACE_HEADER, { ensembleNumber: 1, sourceX: 100, sourceY: 200 }, samples, format, width)
}

afterEach(() => {
  vi.restoreAllMocks()
})

describe('SegyParser', () => {
  const parser = new SegyParser()

  it('lists the SEG-Y media types', () => {
    expect(parser.supportedTypes).toEqual(['application/segy', 'application/sgy', 'application/seg'])
  })

  it('builds the record from the sample code and textual header', () => {
    const data = concat(textHeader(), binaryHeader(), segyTrace([1, 2]))
    const result = parser.parse(bufferSource(data))

    expect(result.record).toEqual({
      mimeOverride: SEGY_MIME,
      dcmiType: 'Dataset',
      content: `IBM_FLOAT ${TEXT} `,
    })
    expect(result.summary).toBeUndefined()
  })

  it('decodes the rev 1 binary header', () => {
    const result = parser.parse(bufferSource(concat(textHeader(), binaryHeader())))
    expect(result.header?.schema).toBe('SEG-Y binary header rev 1')
    expect(result.header?.values).toEqual({
      lineNumber: 7,
      sampleInterval: 4000,
      samplesPerTrace: 2,
      dataSampleCode: 1,
      formatRevision: 256,
      fixedLengthTraceFlag: 1,
      extendedTextHeaderCount: 0,
    })
  })

  it('decodes a rev 0 binary header', () => {
    const result = parser.parse(bufferSource(concat(textHeader(), binaryHeader({ rev1: false, code: 3 }))))
    expect(result.header?.schema).toBe('SEG-Y binary header rev 0')
    expect(result.header?.values).toEqual({ lineNumber: 7, sampleInterval: 4000, samplesPerTrace: 2, dataSampleCode: 3 })
    expect(result.record.content.startsWith('INTEGER_2BYTE C 1 CLIENT')).toBe(true)
  })

  it('appends a trace summary when enabled', () => {
    const data = concat(textHeader(), binaryHeader(), segyTrace([1, -118.625]), segyTrace([100, 0.5]))
    const result = parser.parse(bufferSource(data), { traceSummary: true })

    expect(result.summary).toEqual({ count: 2, min: -118.625, max: 100, complete: true })
    expect(result.record.content).toBe(`IBM_FLOAT ${TEXT} Traces: 2 Min: -118.625 Max: 100 Diff: 218.625`)
  })

  it('summarizes IEEE float samples', () => {
    const data = concat(textHeader(), binaryHeader({ code: 5 }), segyTrace([0.25, -3.5], 'IEEEFloat32'))
    const result = parser.parse(bufferSource(data), { traceSummary: true })
    expect(result.summary).toEqual({ count: 1, min: -3.5, max: 0.25, complete: true })
  })

  it('keeps the traces read before a truncated one', () => {
    const second = segyTrace([100, 5])
    const data = concat(textHeader(), binaryHeader(), segyTrace([1, -118.625]), second.subarray(0, second.length - 4))
    const result = parser.parse(bufferSource(data), { traceSummary: true })

    expect(result.summary).toMatchObject({ count: 1, min: -118.625, max: 1, complete: false })
    expect(result.record.content).toBe(
      `IBM_FLOAT ${TEXT} Traces: 1 Min: -118.625 Max: 1 Diff: 119.625`
      + ' Incomplete: Trace 1 truncated in samples at offset 3848: expected 8 bytes, got 4',
    )
  })

  it('skips the summary for sample codes it cannot decode', () => {
    const data = concat(textHeader(), binaryHeader({ code: 4 }), segyTrace([1, 2]))
    const result = parser.parse(bufferSource(data), { traceSummary: true })

    expect(result.summary?.error).toBeInstanceOf(UnsupportedSampleFormatError)
    expect(result.record.content).toBe(
      `FIXED_POINT_WITH_GAIN ${TEXT} Traces: 0 Incomplete: Data sample code 4 cannot be decoded`,
    )
  })

  it('appends declared extended textual headers', () => {
    const extended = 'C 1 EXTENDED HEADER'.padEnd(3200)
    const trace = segyTrace([1, 2])
    const data = concat(textHeader(), binaryHeader({ extended: 1 }), textHeader(extended), trace.subarray(0, trace.length - 1))
    const result = parser.parse(bufferSource(data), { traceSummary: true })

    expect(result.record.content).toBe(
      `IBM_FLOAT ${TEXT}${extended} Traces: 0`
      + ' Incomplete: Trace 0 truncated in samples at offset 6800: expected 8 bytes, got 7',
    )
  })

  it('reads a variable number of extended headers up to the end stanza', () => {
    const first = 'C 1 MORE TEXT'.padEnd(3200)
    const last = '((SEG: Test ver 1.0))'.padEnd(80) + '((EndText))'.padEnd(3120)
    const data = concat(textHeader(), binaryHeader({ extended: -1 }), textHeader(first), textHeader(last), segyTrace([3]))
    const result = parser.parse(bufferSource(data), { traceSummary: true })

    expect(result.record.content.startsWith(`IBM_FLOAT ${TEXT}${first}${last} `)).toBe(true)
    expect(result.summary).toEqual({ count: 1, min: 3, max: 3, complete: true })
  })

  it('fails on a truncated textual header', () => {
    const source = bufferSource(textHeader().subarray(0, 100))
    expect(() => parser.parse(source)).toThrow(TruncatedHeaderError)
    expect(() => parser.parse(bufferSource(textHeader().subarray(0, 100))))
      .toThrow('SEG-Y textual header truncated: expected 3200 bytes, got 100')
  })

  it('fails on a truncated binary header', () => {
    const data = concat(textHeader(), binaryHeader().subarray(0, 200))
    expect(() => parser.parse(bufferSource(data)))
      .toThrow('SEG-Y binary header truncated: expected 400 bytes, got 200')
  })

  it('rejects an unavailable charset before reading', () => {
    const source = countingSource(concat(textHeader(), binaryHeader()))
    expect(() => parser.parse(source, { charset: 'Cp037' })).toThrow(CharsetUnavailableError)
    expect(source.reads).toBe(0)
  })

  it('uses constructor defaults unless overridden', () => {
    const summarizing = new SegyParser({ traceSummary: true })
    const data = concat(textHeader(), binaryHeader(), segyTrace([1, 2]))
    expect(summarizing.parse(bufferSource(data)).summary?.count).toBe(1)
    expect(summarizing.parse(bufferSource(data), { traceSummary: false }).summary).toBeUndefined()
  })

  it('logs progress when verbose', () => {
    const log = vi.spyOn(console, 'error').mockImplementation(() => {})
    const data = concat(textHeader(), binaryHeader(), segyTrace([1, 2]))
    parser.parse(bufferSource(data), { traceSummary: true, verbose: true })

    expect(log).toHaveBeenCalledWith('[SEGY] Binary header decoded with SEG-Y binary header rev 1')
    expect(log).toHaveBeenCalledWith('[SEGY] Summarized 1 traces, 3848 bytes')
  })
})

describe('parseFile', () => {
  it('parses a SEG-Y file from disk', () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'geo-segy-'))
    try {
      const file = path.join(dir, 'line7.sgy')
      fs.writeFileSync(file, concat(textHeader(), binaryHeader(), segyTrace([1, 2])))
      const result = parseFile(new SegyParser(), file, { traceSummary: true })
      expect(result.summary).toEqual({ count: 1, min: 1, max: 2, complete: true })
    } finally {
      fs.rmSync(dir, { recursive: true, force: true })
    }
  })
})
