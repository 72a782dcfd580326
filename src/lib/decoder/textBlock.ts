import type { ByteSource } from './types'
import type { SingleByteCharset } from './charset'
import { getCharset } from './charset'
import { READ_CHUNK } from './source'

/**
 * Reads `source` to its end and decodes it as one block of text.
 *
 * The charset is resolved before the first read, so an unknown charset
 * fails with CharsetUnavailableError and leaves the source untouched. Pass a
 * `limitSource` to read a fixed-length block in front of binary data.
 */
export function readAll(source: ByteSource, charset: SingleByteCharset | string): string {
  const cs = typeof charset === 'string' ? getCharset(charset) : charset

  const chunks: Uint8Array[] = []
  let total = 0
  for (let chunk = source.read(READ_CHUNK); chunk.length > 0; chunk = source.read(READ_CHUNK)) {
    chunks.push(chunk.slice())
    total += chunk.length
  }

  const bytes = new Uint8Array(total)
  let pos = 0
  for (const chunk of chunks) {
    bytes.set(chunk, pos)
    pos += chunk.length
  }
  return cs.decode(bytes)
}
