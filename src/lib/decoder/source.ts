import fs from 'node:fs'
import type { ByteSource } from './types'

/** Upper bound on the bytes requested from a source in one read. */
export const READ_CHUNK = 64 * 1024

export function bufferSource(data: Uint8Array): ByteSource {
  let pos = 0
  return {
    read(length: number): Uint8Array {
      const end = Math.min(pos + Math.max(0, length), data.length)
      const chunk = data.subarray(pos, end)
      pos = end
      return chunk
    },
  }
}

/**
 * Synchronous reader over an open file descriptor. The caller that opened it
 * owns `close()`.
 */
export function fileSource(path: string): ByteSource & { close(): void } {
  let fd: number | null = fs.openSync(path, 'r')

  return {
    read(length: number): Uint8Array {
      if (fd === null) throw new Error(`File source for ${path} is closed`)
      const buf = Buffer.alloc(Math.min(Math.max(0, length), READ_CHUNK))
      let filled = 0
      // readSync may return short counts before end of file
      while (filled < buf.length) {
        const n = fs.readSync(fd, buf, filled, buf.length - filled, null)
        if (n === 0) break
        filled += n
      }
      return new Uint8Array(buf.buffer, buf.byteOffset, filled)
    },
    close(): void {
      if (fd === null) return
      const open = fd
      fd = null
      fs.closeSync(open)
    },
  }
}

/** Exposes at most `limit` further bytes of `source`. Closing is left to the owner of `source`. */
export function limitSource(source: ByteSource, limit: number): ByteSource {
  let remaining = Math.max(0, limit)
  return {
    read(length: number): Uint8Array {
      const chunk = source.read(Math.min(length, remaining))
      remaining -= chunk.length
      return chunk
    },
  }
}

/**
 * Reads until `length` bytes are collected or the source ends, in reads of
 * at most {@link READ_CHUNK} bytes. Only the bytes that arrived are allocated.
 */
export function readFully(source: ByteSource, length: number): Uint8Array {
  const wanted = Math.max(0, length)
  const first = source.read(Math.min(wanted, READ_CHUNK))
  if (first.length === wanted || first.length === 0) return first

  const chunks: Uint8Array[] = [first]
  let filled = first.length
  while (filled < wanted) {
    const chunk = source.read(Math.min(wanted - filled, READ_CHUNK))
    if (chunk.length === 0) break
    chunks.push(chunk)
    filled += chunk.length
  }

  const out = new Uint8Array(filled)
  let pos = 0
  for (const chunk of chunks) {
    out.set(chunk, pos)
    pos += chunk.length
  }
  return out
}
