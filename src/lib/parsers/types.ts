import type { ByteSource, ParseResult } from '../decoder/types'

export interface GeoParser<Options> {
  readonly name: string
  readonly supportedTypes: readonly string[]
  parse(source: ByteSource, options?: Options): ParseResult
}

export const DCMI_DATASET = 'Dataset'

export const DEFAULT_SEGY_CHARSET = 'Cp1047'
export const DEFAULT_LAS_CHARSET = 'US-ASCII'
