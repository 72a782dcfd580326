import cp1047 from './tables/cp1047.json'
import { CharsetUnavailableError } from '../errors'

const REPLACEMENT = 0xfffd

/** Byte-to-code-point table decoder for 8-bit charsets. */
export class SingleByteCharset {
  readonly name: string
  readonly codePoints: readonly number[]

  constructor(name: string, codePoints: readonly number[]) {
    if (codePoints.length !== 256) {
      throw new Error(`Charset ${name} table has ${codePoints.length} entries, expected 256`)
    }
    this.name = name
    this.codePoints = codePoints
  }

  decode(bytes: Uint8Array): string {
    let out = ''
    // fromCharCode in slices keeps the argument list bounded
    for (let i = 0; i < bytes.length; i += 8192) {
      const slice = bytes.subarray(i, i + 8192)
      out += String.fromCharCode(...Array.from(slice, (b) => this.codePoints[b] ?? REPLACEMENT))
    }
    return out
  }
}

function table(map: (byte: number) => number): number[] {
  return Array.from({ length: 256 }, (_, b) => map(b))
}

const CHARSETS: SingleByteCharset[] = [
  new SingleByteCharset('Cp1047', cp1047.codePoints),
  new SingleByteCharset('US-ASCII', table((b) => (b < 0x80 ? b : REPLACEMENT))),
  new SingleByteCharset('ISO-8859-1', table((b) => b)),
]

const ALIASES: Record<string, string> = {
  cp1047: 'Cp1047',
  ibm1047: 'Cp1047',
  'ibm-1047': 'Cp1047',
  ebcdic: 'Cp1047',
  'us-ascii': 'US-ASCII',
  ascii: 'US-ASCII',
  'iso-8859-1': 'ISO-8859-1',
  latin1: 'ISO-8859-1',
  'latin-1': 'ISO-8859-1',
}

export function isCharsetSupported(name: string): boolean {
  return ALIASES[name.trim().toLowerCase()] !== undefined
}

export function getCharset(name: string): SingleByteCharset {
  const canonical = ALIASES[name.trim().toLowerCase()]
  const charset = CHARSETS.find((c) => c.name === canonical)
  if (!charset) throw new CharsetUnavailableError(name)
  return charset
}
