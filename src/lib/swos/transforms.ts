// Value transforms for the firmware's encodings. Each takes one raw value and
// throws a plain Error when it cannot be converted; the decoder attaches the
// schema and field to whatever is thrown here.

const HEX_STRING = /^(?:[0-9a-fA-F]{2})*$/
const SFP_WAVELENGTH = /\{([0-9a-fA-F]+)\}/g
const TRAILING_NULS = /\0+$/

const utf8 = new TextDecoder('utf-8', { fatal: true })

/** Port bitmasks wider than 53 bits arrive as bigint. */
export type Bitmask = number | bigint

function requireBitmask(value: Bitmask): void {
  if (typeof value === 'bigint' ? value < 0n : !Number.isSafeInteger(value) || value < 0) {
    throw new RangeError(`expected a non-negative integer bitmask, got ${value}`)
  }
}

function requireIndex(value: number): void {
  if (!Number.isSafeInteger(value) || value < 0) {
    throw new RangeError(`expected a non-negative integer index, got ${value}`)
  }
}

/** Bit `i` of a bitmask, exact beyond bit 31. */
export function bitAt(value: Bitmask, i: number): number {
  if (typeof value === 'bigint') return Number((value >> BigInt(i)) & 1n)
  return Math.floor(value / 2 ** i) % 2
}

/** Rounds to `places` decimals, exact halves going to the even neighbour. */
export function roundHalfEven(value: number, places: number): number {
  const factor = 10 ** places
  const scaled = value * factor
  const floor = Math.floor(scaled)
  const diff = scaled - floor
  const rounded = diff > 0.5 || (diff === 0.5 && floor % 2 !== 0) ? floor + 1 : floor
  return rounded / factor
}

export function hexToBytes(value: string): Uint8Array {
  if (!HEX_STRING.test(value)) {
    throw new SyntaxError(`invalid hex string '${value}'`)
  }
  const bytes = new Uint8Array(value.length / 2)
  for (let i = 0; i < bytes.length; i++) {
    bytes[i] = parseInt(value.slice(i * 2, i * 2 + 2), 16)
  }
  return bytes
}

function hexToText(value: string): string {
  return utf8.decode(hexToBytes(value)).replace(TRAILING_NULS, '')
}

export function hexToBoolList(value: Bitmask, length: number): boolean[] {
  requireBitmask(value)
  return Array.from({ length }, (_, i) => bitAt(value, i) === 1)
}

export function hexToStr(value: string): string {
  return hexToText(value).trimEnd()
}

/** Label at `value`, or null when the index is past the end of the table. */
export function hexToOption<L extends string>(value: number, options: readonly L[]): L | null {
  requireIndex(value)
  return value < options.length ? options[value] : null
}

export function hexToMac(value: string): string {
  if (value.length !== 12) {
    throw new SyntaxError(`expected 12 hex digits for a MAC address, got '${value}'`)
  }
  const bytes = hexToBytes(value)
  return Array.from(bytes, (b) => b.toString(16).padStart(2, '0').toUpperCase()).join(':')
}

export function processInt(value: number, signedBits?: number, scale?: number): number {
  if (!Number.isFinite(value)) {
    throw new TypeError(`expected a number, got ${value}`)
  }
  let result = value
  if (signedBits !== undefined) {
    if (!Number.isInteger(signedBits) || signedBits < 1 || signedBits > 32) {
      throw new RangeError(`signed bit width must be between 1 and 32, got ${signedBits}`)
    }
    if (result >= 2 ** (signedBits - 1)) result -= 2 ** signedBits
  }
  if (scale !== undefined) {
    if (scale === 0) throw new RangeError('scale must not be zero')
    result /= scale
  }
  return result
}

/** Little-endian 32-bit address to dotted quad: 0x0101a8c0 is 192.168.1.1. */
export function hexToIp(value: number): string {
  if (!Number.isInteger(value) || value < 0 || value > 0xffffffff) {
    throw new RangeError(`expected a 32-bit address, got ${value}`)
  }
  return [0, 8, 16, 24].map((shift) => (value >>> shift) & 0xff).join('.')
}

/** SFP type text with `{hex}` wavelength runs rendered in decimal, e.g. {0352} becomes 850. */
export function hexToSfpType(value: string): string {
  return hexToText(value).replace(SFP_WAVELENGTH, (_, digits: string) => String(parseInt(digits, 16)))
}

export function hexToPartnerMac(value: string): string {
  if (value === '' || value === '000000000000') return ''
  return hexToMac(value)
}

export function hexToPartnerIp(value: number): string {
  if (value === 0) return ''
  return hexToIp(value)
}

export function hexToBoolOption<L extends string>(
  value: Bitmask,
  options: readonly [L, L],
  length: number,
): L[] {
  requireBitmask(value)
  return Array.from({ length }, (_, i) => options[bitAt(value, i)])
}

/**
 * Per position, bit i of `low` and bit i of `high` form a 2-bit index
 * (`low | high << 1`). Indices past the table select its last label, so a
 * table may list fewer than four labels when the upper states repeat.
 */
export function hexToBitshiftOption<L extends string>(
  low: Bitmask,
  high: Bitmask,
  options: readonly L[],
  length: number,
): L[] {
  requireBitmask(low)
  requireBitmask(high)
  if (options.length === 0) throw new RangeError('option table is empty')
  const last = options.length - 1
  return Array.from({ length }, (_, i) => {
    const index = bitAt(low, i) | (bitAt(high, i) << 1)
    return options[Math.min(index, last)]
  })
}

/** Raw SFP power reading to dBm, rounded to 3 places. 0 means no reading. */
export function hexToDbm(value: number, scale = 10000): number {
  if (value === 0) return 0
  if (!Number.isFinite(value) || value < 0) {
    throw new RangeError(`expected a positive power reading, got ${value}`)
  }
  return roundHalfEven(10 * Math.log10(value / scale), 3)
}

export function combineUint64(low: number, high: number): number {
  if (!Number.isSafeInteger(low) || !Number.isSafeInteger(high) || low < 0 || high < 0) {
    throw new RangeError(`expected non-negative 32-bit halves, got ${low} and ${high}`)
  }
  return low + high * 2 ** 32
}
