import type { ByteSource, ParseResult } from '../decoder/types'
import type { GeoParser } from './types'
import { DCMI_DATASET, DEFAULT_LAS_CHARSET } from './types'
import { getCharset } from '../decoder/charset'
import { readAll } from '../decoder/textBlock'

export const LAS_MIME = 'text/las'

export interface LasParseOptions {
  charset?: string
  verbose?: boolean
}

/** CWLS Log ASCII Standard well-log files: the whole file is the content. */
export class LasParser implements GeoParser<LasParseOptions> {
  readonly name = 'LAS'
  readonly supportedTypes: readonly string[] = [LAS_MIME]

  private readonly defaults: Required<LasParseOptions>

  constructor(defaults: LasParseOptions = {}) {
    this.defaults = {
      charset: defaults.charset ?? DEFAULT_LAS_CHARSET,
      verbose: defaults.verbose ?? false,
    }
  }

  parse(source: ByteSource, options: LasParseOptions = {}): ParseResult {
    const charset = getCharset(options.charset ?? this.defaults.charset)
    const verbose = options.verbose ?? this.defaults.verbose

    const content = readAll(source, charset)
    if (verbose) console.error(`[LAS] Read ${content.length} characters as ${charset.name}`)

    return {
      record: { mimeOverride: LAS_MIME, dcmiType: DCMI_DATASET, content },
    }
  }
}
