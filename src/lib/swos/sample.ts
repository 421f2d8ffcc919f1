import type { Endpoint, FieldDescriptor } from './types'
import devices from './devices.json'

/** Total port count (copper plus SFP) per switch model. */
export const DEVICE_PORT_COUNTS: Readonly<Record<string, number>> = devices

export const DEVICE_MODELS = Object.keys(DEVICE_PORT_COUNTS).sort()

const STRING_PAD_BYTES = 20
const SAMPLE_MAC = '001122334455'
const SAMPLE_IP = '0x0101a8c0' // 192.168.1.1

const SYSTEM_STRINGS: Record<string, string> = {
  identity: 'TestSwitch',
  serial: 'SN00000001',
  model: 'CSS326',
  version: '2.18',
}

type Mode = Endpoint['mode']

/** Most models put their SFP cages last; with more than four ports the last two are named SFP1+ and SFP2+. */
export function portName(port: number, portCount: number): string {
  if (portCount > 4 && port > portCount - 2) return `SFP${port - (portCount - 2)}+`
  return `Port${port}`
}

export function hexEncode(text: string, padTo = STRING_PAD_BYTES): string {
  const hex = Array.from(new TextEncoder().encode(text), (b) => b.toString(16).padStart(2, '0')).join('')
  return hex.padEnd(padTo * 2, '0')
}

/** Bitmask with the low `ports` bits set, as a hex literal. */
export function fullMask(ports: number): string {
  if (ports <= 0) return '0x0'
  const head = (2 ** (ports % 4) - 1).toString(16)
  const body = 'f'.repeat(Math.floor(ports / 4))
  return `0x${head === '0' ? '' : head}${body}`
}

function quoted(hex: string): string {
  return `'${hex}'`
}

function list(portCount: number, item: (index: number) => string): string {
  return `[${Array.from({ length: portCount }, (_, i) => item(i)).join(',')}]`
}

/** The key the firmware sends today: the last alias, which is its `iXX` id. */
function wireKey(field: FieldDescriptor): string {
  return field.keys[field.keys.length - 1]
}

function scalarString(field: FieldDescriptor, mode: Mode): string {
  if (mode === 'table') return quoted(hexEncode(''))
  return quoted(hexEncode(SYSTEM_STRINGS[field.name] ?? 'Test'))
}

function portString(field: FieldDescriptor, index: number, portCount: number): string {
  if (field.name === 'name') return quoted(hexEncode(portName(index + 1, portCount)))
  if (field.name === 'vendor') return quoted(hexEncode('Vendor'))
  return quoted(hexEncode(''))
}

function renderValue(field: FieldDescriptor, portCount: number, mode: Mode): string {
  switch (field.kind) {
    case 'bool':
      return fullMask(field.ports ?? portCount)
    case 'scalar_bool':
      return '0x01'
    case 'bool_option':
    case 'bitshift_option':
      return '0x00'
    case 'mac':
      return quoted(SAMPLE_MAC)
    case 'ip':
      return SAMPLE_IP
    case 'str':
      return field.perPort
        ? list(portCount, (i) => portString(field, i, portCount))
        : scalarString(field, mode)
    case 'sfp_type':
      return field.perPort ? list(portCount, () => quoted(hexEncode(''))) : quoted(hexEncode(''))
    case 'partner_mac':
      return field.perPort ? list(portCount, () => quoted(SAMPLE_MAC)) : quoted('000000000000')
    case 'partner_ip':
      return field.perPort ? list(portCount, () => SAMPLE_IP) : '0x00000000'
    case 'int':
    case 'uint64':
    case 'option':
    case 'dbm':
      return field.perPort ? list(portCount, () => '0x00') : '0x0000'
  }
}

function renderObject(fields: readonly FieldDescriptor[], portCount: number, mode: Mode, separator: string): string {
  const parts: string[] = []
  for (const field of fields) {
    parts.push(`${wireKey(field)}:${renderValue(field, portCount, mode)}`)
    if (field.kind === 'uint64') {
      parts.push(`${field.high}:${field.perPort ? list(portCount, () => '0x00') : '0x0000'}`)
    }
    if (field.kind === 'bitshift_option') {
      parts.push(`${field.pair}:0x00`)
    }
  }
  return `{${parts.join(separator)}}`
}

/**
 * Synthesizes a response the way the firmware writes it: hex numbers,
 * single-quoted hex strings, bitmasks with every port set. Table endpoints
 * get `entries` identical rows.
 */
export function generateResponse(endpoint: Endpoint, portCount: number, entries = 1): string {
  if (endpoint.mode === 'table') {
    const rows = Array.from({ length: entries }, () => renderObject(endpoint.schema.fields, portCount, 'table', ', '))
    return `[${rows.join(',\n')}]`
  }
  return renderObject(endpoint.schema.fields, portCount, 'record', ',')
}
