import type { FormatSchema, SampleFormat } from '../types'
import { defineSchema } from '../schema'
import { UnsupportedSampleFormatError } from '../errors'

export const TEXT_HEADER_LENGTH = 3200
export const BINARY_HEADER_LENGTH = 400
export const TRACE_HEADER_LENGTH = 240

export const END_TEXT_STANZA = '((EndText))'

// Byte offsets of the revision number within the binary header
const REVISION_OFFSET = 300
const REVISION_1 = 0x0100

// --- Binary header revisions ---

export const SEGY_BINARY_HEADER_REV0: FormatSchema = defineSchema('SEG-Y binary header rev 0', [
  ['lineNumber', 4, 8, 'Int32BE'],
  ['sampleInterval', 16, 18, 'Int16BE'],
  ['samplesPerTrace', 20, 22, 'Int16BE'],
  ['dataSampleCode', 24, 26, 'Int16BE'],
], { size: BINARY_HEADER_LENGTH })

export const SEGY_BINARY_HEADER_REV1: FormatSchema = defineSchema('SEG-Y binary header rev 1', [
  ['lineNumber', 4, 8, 'Int32BE'],
  ['sampleInterval', 16, 18, 'Int16BE'],
  ['samplesPerTrace', 20, 22, 'Int16BE'],
  ['dataSampleCode', 24, 26, 'Int16BE'],
  ['formatRevision', 300, 302, 'Int16BE'],
  ['fixedLengthTraceFlag', 302, 304, 'Int16BE'],
  ['extendedTextHeaderCount', 304, 306, 'Int16BE'],
], { size: BINARY_HEADER_LENGTH })

export const SEGY_TRACE_HEADER: FormatSchema = defineSchema('SEG-Y trace header', [
  ['ensembleNumber', 20, 24, 'Int32BE'],
  ['sourceX', 72, 76, 'Int32BE'],
  ['sourceY', 76, 80, 'Int32BE'],
  ['numberOfSamples', 114, 116, 'Int16BE'],
  ['cdpX', 180, 184, 'Int32BE'],
  ['cdpY', 184, 188, 'Int32BE'],
], { size: TRACE_HEADER_LENGTH, countField: 'numberOfSamples' })

/** Picks the binary header layout from the raw block's revision bytes. */
export function selectBinaryHeaderSchema(block: Uint8Array): FormatSchema {
  if (block.length < REVISION_OFFSET + 2) return SEGY_BINARY_HEADER_REV0
  const revision = (block[REVISION_OFFSET] << 8) | block[REVISION_OFFSET + 1]
  return revision >= REVISION_1 ? SEGY_BINARY_HEADER_REV1 : SEGY_BINARY_HEADER_REV0
}

// --- Data sample codes ---

export type DataSampleCodeName =
  | 'IBM_FLOAT'
  | 'INTEGER_4BYTE'
  | 'INTEGER_2BYTE'
  | 'FIXED_POINT_WITH_GAIN'
  | 'IEEE_FLOAT'
  | 'INTEGER_1BYTE'
  | 'UNKNOWN'

const DATA_SAMPLE_CODES: Record<number, { name: DataSampleCodeName; format: SampleFormat | null }> = {
  1: { name: 'IBM_FLOAT', format: 'IBMFloat32' },
  2: { name: 'INTEGER_4BYTE', format: 'Int32BE' },
  3: { name: 'INTEGER_2BYTE', format: 'Int16BE' },
  4: { name: 'FIXED_POINT_WITH_GAIN', format: null },
  5: { name: 'IEEE_FLOAT', format: 'IEEEFloat32' },
  8: { name: 'INTEGER_1BYTE', format: 'Int8' },
}

export function dataSampleCodeName(code: number): DataSampleCodeName {
  return DATA_SAMPLE_CODES[code]?.name ?? 'UNKNOWN'
}

export function sampleFormatFor(code: number): SampleFormat {
  const format = DATA_SAMPLE_CODES[code]?.format
  if (!format) throw new UnsupportedSampleFormatError(code)
  return format
}
