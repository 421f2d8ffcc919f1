import type {
  AnyRecord,
  DecodedRecord,
  DecodedScalar,
  DecodedValue,
  FieldDescriptor,
  Fields,
  RecordSchema,
  Tree,
  TreeMap,
} from './types'
import { FieldDecodeError, SchemaError, SwitchOsError } from './errors'
import { isTreeMap, parseQuasiJson } from './quasiJson'
import {
  combineUint64,
  hexToBitshiftOption,
  hexToBoolList,
  hexToBoolOption,
  hexToDbm,
  hexToIp,
  hexToMac,
  hexToOption,
  hexToPartnerIp,
  hexToPartnerMac,
  hexToSfpType,
  hexToStr,
  processInt,
} from './transforms'
import type { Bitmask } from './transforms'

/** Used when a response carries no list to infer the port count from. */
export const DEFAULT_PORT_COUNT = 10

type Scalar = number | bigint | string

function describe(value: Tree | undefined): string {
  if (value === undefined || value === null) return 'nothing'
  if (Array.isArray(value)) return 'a list'
  if (isTreeMap(value)) return 'an object'
  if (typeof value === 'bigint') return `integer ${value} (wider than 53 bits)`
  return typeof value === 'string' ? `string '${value}'` : `number ${value}`
}

function asNumber(value: Scalar): number {
  if (typeof value !== 'number') throw new TypeError(`expected a number, got ${describe(value)}`)
  return value
}

function asBitmask(value: Scalar): Bitmask {
  if (typeof value === 'string') throw new TypeError(`expected a bitmask, got ${describe(value)}`)
  return value
}

function asHex(value: Scalar): string {
  if (typeof value !== 'string') throw new TypeError(`expected a hex string, got ${describe(value)}`)
  return value
}

function asScalar(value: Tree): Scalar {
  if (typeof value === 'number' || typeof value === 'bigint' || typeof value === 'string') return value
  throw new TypeError(`expected a number or string, got ${describe(value)}`)
}

/** Length of the first list-valued entry in insertion order. */
export function inferPortCount(map: TreeMap): number {
  for (const value of map.values()) {
    if (Array.isArray(value)) return value.length > 0 ? value.length : DEFAULT_PORT_COUNT
  }
  return DEFAULT_PORT_COUNT
}

// The first alias present in the map wins, even when its value is null.
function resolve(field: FieldDescriptor, map: TreeMap): [string, Tree] | null {
  for (const key of field.keys) {
    const value = map.get(key)
    if (value !== undefined) return [key, value]
  }
  return null
}

class RecordDecoder {
  constructor(
    private readonly schema: RecordSchema,
    private readonly map: TreeMap,
    private readonly portCount: number,
  ) {}

  decode(): AnyRecord {
    const record: Record<string, DecodedValue> = {}
    for (const field of this.schema.fields) {
      const hit = resolve(field, this.map)
      if (!hit) {
        record[field.name] = null
        continue
      }
      const [key, raw] = hit
      if (raw === null) {
        record[field.name] = null
        continue
      }
      this.checkContainer(field, key, raw)
      try {
        record[field.name] = this.transform(field, raw)
      } catch (err) {
        if (err instanceof SwitchOsError) throw err
        throw new FieldDecodeError(this.schema.name, field.name, key, err)
      }
    }
    return record
  }

  private checkContainer(field: FieldDescriptor, key: string, raw: Tree): void {
    const perPort = 'perPort' in field && field.perPort === true
    const expected = perPort ? 'a per-port list' : 'a single value'
    const actual = isTreeMap(raw) ? 'an object' : Array.isArray(raw) ? 'a list' : 'a single value'
    if (expected !== actual) {
      throw new SchemaError(
        `${this.schema.name}: field '${field.name}' (${key}) is declared as ${expected} but the response has ${actual}`,
      )
    }
  }

  private companion(key: string): Tree {
    return this.map.get(key) ?? 0
  }

  private each<T extends DecodedScalar>(raw: Tree, fn: (value: Scalar, index: number) => T): T | T[] {
    if (Array.isArray(raw)) return raw.map((item, i) => fn(asScalar(item), i))
    return fn(asScalar(raw), 0)
  }

  private transform(field: FieldDescriptor, raw: Tree): DecodedValue {
    switch (field.kind) {
      case 'bool':
        return hexToBoolList(asBitmask(asScalar(raw)), field.ports ?? this.portCount)
      case 'scalar_bool':
        return asScalar(raw) !== 0
      case 'int':
        return this.each(raw, (v) => processInt(asNumber(v), field.signedBits, field.scale))
      case 'uint64':
        return this.combine(field.high, raw)
      case 'str':
        return this.each(raw, (v) => hexToStr(asHex(v)))
      case 'option':
        return this.each(raw, (v) => hexToOption(asNumber(v), field.options))
      case 'bool_option':
        return hexToBoolOption(asBitmask(asScalar(raw)), field.options, field.ports ?? this.portCount)
      case 'bitshift_option': {
        const pair = this.companion(field.pair)
        if (typeof pair !== 'number' && typeof pair !== 'bigint') {
          throw new TypeError(`companion '${field.pair}' must be a bitmask, got ${describe(pair)}`)
        }
        return hexToBitshiftOption(asBitmask(asScalar(raw)), pair, field.options, field.ports ?? this.portCount)
      }
      case 'mac':
        return hexToMac(asHex(asScalar(raw)))
      case 'partner_mac':
        return this.each(raw, (v) => hexToPartnerMac(asHex(v)))
      case 'ip':
        return hexToIp(asNumber(asScalar(raw)))
      case 'partner_ip':
        return this.each(raw, (v) => hexToPartnerIp(asNumber(v)))
      case 'sfp_type':
        return this.each(raw, (v) => hexToSfpType(asHex(v)))
      case 'dbm':
        return this.each(raw, (v) => hexToDbm(asNumber(v), field.scale))
      default: {
        const unknown: never = field
        throw new SchemaError(`unknown field kind in ${JSON.stringify(unknown)}`)
      }
    }
  }

  private combine(highKey: string, raw: Tree): number | number[] {
    const high = this.companion(highKey)
    if (isTreeMap(high)) {
      throw new TypeError(`companion '${highKey}' must be a number or list, got an object`)
    }
    if (!Array.isArray(raw)) {
      if (Array.isArray(high)) throw new TypeError(`companion '${highKey}' is a list but the low value is not`)
      return combineUint64(asNumber(asScalar(raw)), asNumber(asScalar(high)))
    }
    return raw.map((low, i) => {
      const hi = Array.isArray(high) ? high[i] ?? 0 : high
      return combineUint64(asNumber(asScalar(low)), asNumber(asScalar(hi)))
    })
  }
}

function requireMap(schema: RecordSchema, tree: Tree, what: string): TreeMap {
  if (!isTreeMap(tree)) {
    throw new SchemaError(`${schema.name}: expected ${what} to be an object, got ${describe(tree)}`)
  }
  return tree
}

/**
 * Decodes one response object. Fields whose keys are all absent, or whose
 * first present key holds null, come back as null; per-port fields take `portCount` positions, inferred from the
 * response when not given.
 */
export function decodeOne<F extends Fields>(schema: RecordSchema<F>, tree: Tree, portCount?: number): DecodedRecord<F>
export function decodeOne(schema: RecordSchema, tree: Tree, portCount?: number): AnyRecord {
  const map = requireMap(schema, tree, 'the response')
  return new RecordDecoder(schema, map, portCount ?? inferPortCount(map)).decode()
}

/**
 * Decodes a table response: a list of entry objects, or an empty list or object
 * for no entries. The port count inferred from the first entry applies to all.
 */
export function decodeList<F extends Fields>(schema: RecordSchema<F>, tree: Tree): DecodedRecord<F>[]
export function decodeList(schema: RecordSchema, tree: Tree): AnyRecord[] {
  if (isTreeMap(tree)) {
    if (tree.size === 0) return []
    throw new SchemaError(`${schema.name}: expected a list of entries, got a non-empty object`)
  }
  if (!Array.isArray(tree)) {
    throw new SchemaError(`${schema.name}: expected a list of entries, got ${describe(tree)}`)
  }
  if (tree.length === 0) return []

  const entries = tree.map((entry, i) => requireMap(schema, entry, `entry ${i}`))
  const portCount = inferPortCount(entries[0])
  return entries.map((entry) => new RecordDecoder(schema, entry, portCount).decode())
}

export function parseRecord<F extends Fields>(schema: RecordSchema<F>, text: string): DecodedRecord<F> {
  return decodeOne(schema, parseQuasiJson(text))
}

export function parseRecordList<F extends Fields>(schema: RecordSchema<F>, text: string): DecodedRecord<F>[] {
  return decodeList(schema, parseQuasiJson(text))
}
