import type { DecodeType, FieldRange, FieldSpec, FormatSchema } from './types'
import { SchemaError } from './errors'

// Byte width of each numeric type; FixedString takes its width from the range
export const TYPE_WIDTH: Readonly<Record<Exclude<DecodeType, 'FixedString'>, number>> = {
  Int8: 1,
  Int16BE: 2,
  Int32BE: 4,
  IBMFloat32: 4,
  IEEEFloat32: 4,
}

const INTEGER_TYPES: ReadonlySet<DecodeType> = new Set(['Int8', 'Int16BE', 'Int32BE'])

// --- Declarative field definitions ---

export type FieldDefinition = [name: string, start: number, end: number, type: DecodeType]

export interface SchemaOptions {
  size?: number
  countField?: string
}

export function fieldRange(start: number, end: number): FieldRange {
  if (!Number.isInteger(start) || !Number.isInteger(end) || start < 0) {
    throw new SchemaError(`Invalid field range [${start}, ${end})`)
  }
  if (start >= end) {
    throw new SchemaError(`Field range start ${start} must be before end ${end}`)
  }
  return Object.freeze({ start, end })
}

export function isIntegerType(type: DecodeType): boolean {
  return INTEGER_TYPES.has(type)
}

function toFieldSpec(schemaName: string, [name, start, end, type]: FieldDefinition): FieldSpec {
  if (!name) throw new SchemaError(`${schemaName}: field name must not be empty`)
  // Decoded values are keyed by field name on a plain object
  if (name === '__proto__') throw new SchemaError(`${schemaName}: field name __proto__ is reserved`)
  let range: FieldRange
  try {
    range = fieldRange(start, end)
  } catch (err) {
    throw new SchemaError(`${schemaName}.${name}: ${err instanceof Error ? err.message : String(err)}`)
  }
  if (type !== 'FixedString') {
    const width = TYPE_WIDTH[type]
    if (end - start !== width) {
      throw new SchemaError(
        `${schemaName}.${name}: ${type} needs ${width} bytes but range [${start}, ${end}) spans ${end - start}`,
      )
    }
  }
  return Object.freeze({ name, range, type })
}

/**
 * Builds an immutable schema from field definitions, in declaration order.
 *
 * Rejects empty or reversed ranges, the field name `__proto__`, numeric
 * fields whose range does not match the type's width, duplicate names, a
 * `size` smaller than the furthest field end, and a `countField` that is
 * missing or not an integer field. None of these checks look at input data.
 */
export function defineSchema(
  name: string,
  definitions: FieldDefinition[],
  options: SchemaOptions = {},
): FormatSchema {
  const seen = new Set<string>()
  const fields = definitions.map((def) => {
    const spec = toFieldSpec(name, def)
    if (seen.has(spec.name)) throw new SchemaError(`${name}: duplicate field ${spec.name}`)
    seen.add(spec.name)
    return spec
  })

  const extent = fields.reduce((max, f) => Math.max(max, f.range.end), 0)
  const size = options.size ?? extent
  if (!Number.isInteger(size) || size < extent) {
    throw new SchemaError(`${name}: block size ${size} is smaller than field extent ${extent}`)
  }

  const { countField } = options
  if (countField !== undefined) {
    const spec = fields.find((f) => f.name === countField)
    if (!spec) throw new SchemaError(`${name}: count field ${countField} is not declared`)
    if (!isIntegerType(spec.type)) {
      throw new SchemaError(`${name}: count field ${countField} must be an integer type, not ${spec.type}`)
    }
  }

  return Object.freeze({
    name,
    fields: Object.freeze(fields),
    size,
    extent,
    ...(countField !== undefined ? { countField } : {}),
  })
}
