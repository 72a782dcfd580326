import type { ParseResult } from '../decoder/types'
import type { Config } from '../../config'
import type { GeoParser } from './types'
import { fileSource } from '../decoder/source'
import { LasParser } from './lasParser'
import { SegyParser } from './segyParser'

export { LasParser, LAS_MIME } from './lasParser'
export type { LasParseOptions } from './lasParser'
export { SegyParser, SEGY_MIME } from './segyParser'
export type { SegyParseOptions } from './segyParser'
export { DCMI_DATASET, DEFAULT_LAS_CHARSET, DEFAULT_SEGY_CHARSET } from './types'
export type { GeoParser } from './types'

export function createParsers(config: Config): { segy: SegyParser; las: LasParser } {
  return {
    segy: new SegyParser({
      charset: config.SEGY_CHARSET,
      traceSummary: config.SEGY_TRACE_SUMMARY,
      verbose: config.VERBOSE,
    }),
    las: new LasParser({ charset: config.LAS_CHARSET, verbose: config.VERBOSE }),
  }
}

/** Parses the file at `path`, closing it on every exit path. */
export function parseFile<Options>(parser: GeoParser<Options>, path: string, options?: Options): ParseResult {
  const source = fileSource(path)
  try {
    return parser.parse(source, options)
  } finally {
    source.close()
  }
}
