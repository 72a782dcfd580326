import type { SampleFormat } from './types'

/**
 * Converts an IBM System/360 single-precision bit pattern to a number.
 *
 * Layout: sign bit, 7-bit excess-64 base-16 exponent, 24-bit fraction.
 * value = sign * fraction * 16^(exponent - 64 - 6) with the fraction read as
 * an unsigned integer. A zero fraction yields 0 whatever the sign and exponent.
 */
export function decodeIbmFloat32(bits: number): number {
  const fraction = bits & 0x00ffffff
  if (fraction === 0) return 0

  const sign = bits >>> 31 ? -1 : 1
  const exponent = ((bits >>> 24) & 0x7f) - 64
  return sign * fraction * Math.pow(16, exponent - 6)
}

export function readNumber(view: DataView, offset: number, type: SampleFormat): number {
  switch (type) {
    case 'Int8': return view.getInt8(offset)
    case 'Int16BE': return view.getInt16(offset, false)
    case 'Int32BE': return view.getInt32(offset, false)
    case 'IBMFloat32': return decodeIbmFloat32(view.getUint32(offset, false))
    case 'IEEEFloat32': return view.getFloat32(offset, false)
  }
}
