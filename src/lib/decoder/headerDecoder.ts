import type { DecodedField, DecodedHeader, DecodedValue, FieldSpec, FormatSchema } from './types'
import type { SingleByteCharset } from './charset'
import { getCharset } from './charset'
import { TruncatedHeaderError } from './errors'
import { readNumber } from './numeric'

function decodeField(view: DataView, block: Uint8Array, spec: FieldSpec, charset: SingleByteCharset): DecodedValue {
  const { start, end } = spec.range
  if (spec.type === 'FixedString') {
    // Text is kept byte for byte; callers trim if they want to
    return charset.decode(block.subarray(start, end))
  }
  return readNumber(view, start, spec.type)
}

/**
 * Decodes every field of `schema` from `block`, in schema order.
 *
 * Either all fields decode or the call throws; a block shorter than the
 * schema's extent raises {@link TruncatedHeaderError}.
 */
export function decodeHeader(
  schema: FormatSchema,
  block: Uint8Array,
  charset: SingleByteCharset | string,
): DecodedHeader {
  const cs = typeof charset === 'string' ? getCharset(charset) : charset
  if (block.length < schema.extent) {
    throw new TruncatedHeaderError(schema.name, schema.extent, block.length)
  }

  const view = new DataView(block.buffer, block.byteOffset, block.byteLength)
  const fields: DecodedField[] = []
  const values: Record<string, DecodedValue> = {}

  for (const spec of schema.fields) {
    const value = decodeField(view, block, spec, cs)
    fields.push(Object.freeze({
      name: spec.name,
      value,
      type: spec.type,
      offset: spec.range.start,
      size: spec.range.end - spec.range.start,
    }))
    values[spec.name] = value
  }

  return Object.freeze({
    schema: schema.name,
    fields: Object.freeze(fields),
    values: Object.freeze(values),
  })
}

export function getNumber(header: DecodedHeader, name: string): number {
  const value = header.values[name]
  if (typeof value !== 'number') {
    throw new TypeError(`Field ${name} of ${header.schema} is not numeric`)
  }
  return value
}

export function getString(header: DecodedHeader, name: string): string {
  const value = header.values[name]
  if (typeof value !== 'string') {
    throw new TypeError(`Field ${name} of ${header.schema} is not a string`)
  }
  return value
}
