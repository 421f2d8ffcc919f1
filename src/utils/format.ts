import type { AnyRecord, DecodedScalar, DecodedValue, FieldDescriptor } from '../lib/swos/types'
import { portName } from '../lib/swos/sample'

export interface PortPoint {
  port: string
  value: number
}

export function formatScalar(value: DecodedScalar): string {
  if (value === null) return '—'
  if (typeof value === 'boolean') return value ? 'yes' : 'no'
  if (value === '') return '""'
  return String(value)
}

export function formatValue(value: DecodedValue): string {
  if (Array.isArray(value)) return `[${value.map(formatScalar).join(', ')}]`
  return formatScalar(value)
}

/** Separates device-wide values from per-port sequences, keeping field order. */
export function splitRecord(record: AnyRecord): {
  scalars: Array<[string, DecodedScalar]>
  perPort: Array<[string, DecodedScalar[]]>
} {
  const scalars: Array<[string, DecodedScalar]> = []
  const perPort: Array<[string, DecodedScalar[]]> = []
  for (const [name, value] of Object.entries(record)) {
    if (Array.isArray(value)) perPort.push([name, value])
    else scalars.push([name, value])
  }
  return { scalars, perPort }
}

export function portCountOf(record: AnyRecord): number {
  return Math.max(0, ...splitRecord(record).perPort.map(([, values]) => values.length))
}

/** Names of per-port fields holding numbers only, the ones worth charting. */
export function numericFields(record: AnyRecord): string[] {
  return splitRecord(record)
    .perPort.filter(([, values]) => values.length > 0 && values.every((v) => typeof v === 'number'))
    .map(([name]) => name)
}

/** Row labels: the record's own port names when it carries them. */
export function portLabels(record: AnyRecord): string[] {
  const count = portCountOf(record)
  const names = record.name
  return Array.from({ length: count }, (_, i) => {
    const own = Array.isArray(names) ? names[i] : undefined
    return typeof own === 'string' && own !== '' ? own : portName(i + 1, count)
  })
}

export function portSeries(record: AnyRecord, field: string): PortPoint[] {
  const values = record[field]
  if (!Array.isArray(values)) return []
  const labels = portLabels(record)
  return values.map((v, i) => ({ port: labels[i] ?? String(i + 1), value: typeof v === 'number' ? v : 0 }))
}

export function describeField(field: FieldDescriptor): string {
  const parts: string[] = []
  if ('perPort' in field && field.perPort) parts.push('per port')
  switch (field.kind) {
    case 'bool':
    case 'bool_option':
      if (field.ports !== undefined) parts.push(`${field.ports} ports`)
      break
    case 'bitshift_option':
      parts.push(`pair ${field.pair}`)
      if (field.ports !== undefined) parts.push(`${field.ports} ports`)
      break
    case 'int':
      if (field.signedBits !== undefined) parts.push(`signed ${field.signedBits}-bit`)
      if (field.scale !== undefined) parts.push(`÷ ${field.scale}`)
      break
    case 'uint64':
      parts.push(`high ${field.high}`)
      break
    case 'dbm':
      parts.push(`÷ ${field.scale ?? 10000}`)
      break
    default:
      break
  }
  if ('options' in field) parts.push(field.options.join(' | '))
  return parts.join(', ')
}
