import { describe, it, expect } from 'vitest'
import {
  bitAt,
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
  roundHalfEven,
} from '../transforms'
import { hexEncode } from '../sample'
import { SPEEDS } from '../endpoints/link'
import { RSTP_TYPES } from '../endpoints/rstp'

const hex = (text: string) => hexEncode(text, 0)

describe('hexToBoolList', () => {
  it('yields N false values for 0 and N true values for a full mask', () => {
    expect(hexToBoolList(0, 24)).toEqual(Array(24).fill(false))
    expect(hexToBoolList(2 ** 24 - 1, 24)).toEqual(Array(24).fill(true))
  })

  it('maps the least significant bit to position 0', () => {
    expect(hexToBoolList(1, 4)).toEqual([true, false, false, false])
  })

  it('maps a middle bit to its own position only', () => {
    const result = hexToBoolList(2 ** 13, 24)
    expect(result.filter(Boolean)).toHaveLength(1)
    expect(result[13]).toBe(true)
  })

  it('reads bits above 31', () => {
    const result = hexToBoolList(2 ** 40 + 1, 48)
    expect(result[0]).toBe(true)
    expect(result[40]).toBe(true)
    expect(result.filter(Boolean)).toHaveLength(2)
  })

  it('ignores bits beyond the requested length', () => {
    expect(hexToBoolList(0b1111, 2)).toEqual([true, true])
  })

  it('rejects negative and fractional masks', () => {
    expect(() => hexToBoolList(-1, 4)).toThrow(RangeError)
    expect(() => hexToBoolList(1.5, 4)).toThrow(RangeError)
    expect(() => hexToBoolList(-1n, 4)).toThrow(RangeError)
  })

  it('reads every bit of masks wider than 53 bits', () => {
    const result = hexToBoolList((1n << 53n) | 1n, 54)
    expect(result).toHaveLength(54)
    expect(result[0]).toBe(true)
    expect(result[53]).toBe(true)
    expect(result.filter(Boolean)).toHaveLength(2)
  })
})

describe('bitAt', () => {
  it('extracts single bits', () => {
    expect(bitAt(0b1010, 0)).toBe(0)
    expect(bitAt(0b1010, 1)).toBe(1)
    expect(bitAt(0b1010, 3)).toBe(1)
  })

  it('reads bigint masks', () => {
    expect(bitAt(0x20000000000001n, 0)).toBe(1)
    expect(bitAt(0x20000000000001n, 1)).toBe(0)
    expect(bitAt(0x20000000000001n, 53)).toBe(1)
    expect(bitAt(0x20000000000001n, 54)).toBe(0)
  })
})

describe('roundHalfEven', () => {
  it('rounds exact halves to the even neighbour', () => {
    expect(roundHalfEven(0.0625, 3)).toBe(0.062)
    expect(roundHalfEven(0.1875, 3)).toBe(0.188)
    expect(roundHalfEven(-0.0625, 3)).toBe(-0.062)
    expect(roundHalfEven(2.5, 0)).toBe(2)
    expect(roundHalfEven(3.5, 0)).toBe(4)
  })

  it('rounds other values to the nearest', () => {
    expect(roundHalfEven(1.2344, 3)).toBe(1.234)
    expect(roundHalfEven(-3.0103, 3)).toBe(-3.01)
  })
})

describe('hexToStr', () => {
  it('decodes hex to text', () => {
    expect(hexToStr('48656c6c6f')).toBe('Hello')
  })

  it('strips trailing NUL bytes and whitespace', () => {
    expect(hexToStr('48656c6c6f000000')).toBe('Hello')
    expect(hexToStr('4869202000')).toBe('Hi')
  })

  it('decodes multi-byte UTF-8', () => {
    expect(hexToStr('c3a9')).toBe('é')
  })

  it('returns an empty string for empty or all-NUL input', () => {
    expect(hexToStr('')).toBe('')
    expect(hexToStr('0000')).toBe('')
  })

  it('rejects odd-length and non-hex strings', () => {
    expect(() => hexToStr('486')).toThrow("invalid hex string '486'")
    expect(() => hexToStr('zz')).toThrow(SyntaxError)
  })

  it('rejects invalid UTF-8', () => {
    expect(() => hexToStr('ff')).toThrow(TypeError)
  })
})

describe('hexToOption', () => {
  it('returns the label at the index', () => {
    expect(hexToOption(0, SPEEDS)).toBe('10M')
    expect(hexToOption(5, SPEEDS)).toBe('2.5G')
  })

  it('returns null past the end of the table without throwing', () => {
    expect(hexToOption(7, SPEEDS)).toBeNull()
    expect(hexToOption(100, SPEEDS)).toBeNull()
  })

  it('rejects negative indices', () => {
    expect(() => hexToOption(-1, SPEEDS)).toThrow(RangeError)
  })
})

describe('hexToMac', () => {
  it('groups byte pairs with colons', () => {
    expect(hexToMac('001122334455')).toBe('00:11:22:33:44:55')
  })

  it('uppercases lowercase input', () => {
    expect(hexToMac('aabbccddeeff')).toBe('AA:BB:CC:DD:EE:FF')
  })

  it('rejects values that are not 12 hex digits', () => {
    expect(() => hexToMac('0011')).toThrow(SyntaxError)
    expect(() => hexToMac('00112233445g')).toThrow(SyntaxError)
  })
})

describe('hexToPartnerMac', () => {
  it('maps all-zero and empty input to an empty string', () => {
    expect(hexToPartnerMac('000000000000')).toBe('')
    expect(hexToPartnerMac('')).toBe('')
  })

  it('formats other values as a MAC', () => {
    expect(hexToPartnerMac('d4ca6d010203')).toBe('D4:CA:6D:01:02:03')
  })
})

describe('hexToIp', () => {
  it('reads the address little-endian', () => {
    expect(hexToIp(0x0101a8c0)).toBe('192.168.1.1')
    expect(hexToIp(0xfe01000a)).toBe('10.0.1.254')
  })

  it('renders 0 as 0.0.0.0', () => {
    expect(hexToIp(0)).toBe('0.0.0.0')
  })

  it('rejects values outside 32 bits', () => {
    expect(() => hexToIp(2 ** 32)).toThrow(RangeError)
    expect(() => hexToIp(-1)).toThrow(RangeError)
  })
})

describe('hexToPartnerIp', () => {
  it('maps 0 to an empty string', () => {
    expect(hexToPartnerIp(0)).toBe('')
  })

  it('behaves as hexToIp otherwise', () => {
    expect(hexToPartnerIp(0x0101a8c0)).toBe('192.168.1.1')
  })
})

describe('processInt', () => {
  it('passes plain integers through', () => {
    expect(processInt(42)).toBe(42)
  })

  it('applies two\'s-complement correction', () => {
    expect(processInt(0xfff6, 16)).toBe(-10)
    expect(processInt(0x7fff, 16)).toBe(32767)
    expect(processInt(0x8000, 16)).toBe(-32768)
  })

  it('divides by the scale', () => {
    expect(processInt(1200, undefined, 100)).toBe(12)
    expect(processInt(125, undefined, 10)).toBe(12.5)
    expect(processInt(32, undefined, 0.32)).toBeCloseTo(100)
  })

  it('corrects the sign before scaling', () => {
    expect(processInt(0xff9c, 16, 10)).toBe(-10)
  })

  it('rejects bit widths outside 1..32', () => {
    expect(() => processInt(1, 0)).toThrow(RangeError)
    expect(() => processInt(1, 33)).toThrow(RangeError)
  })
})

describe('hexToSfpType', () => {
  it('renders bracketed hex runs as decimal', () => {
    expect(hexToSfpType(hex('SR {0352}'))).toBe('SR 850')
    expect(hexToSfpType(hex('{051e}nm'))).toBe('1310nm')
  })

  it('strips trailing NUL bytes', () => {
    expect(hexToSfpType(hexEncode('1000BASE-T'))).toBe('1000BASE-T')
  })
})

describe('hexToBoolOption', () => {
  it('selects the second label for set bits', () => {
    expect(hexToBoolOption(0b10, ['STP', 'RSTP'], 3)).toEqual(['STP', 'RSTP', 'STP'])
  })
})

describe('hexToBitshiftOption', () => {
  const labels = ['a', 'b', 'c', 'd'] as const

  it('combines low and high bits into a 2-bit index', () => {
    // position 0: low only; 1: high only; 2: both; 3: neither
    expect(hexToBitshiftOption(0b0101, 0b0110, labels, 4)).toEqual(['b', 'c', 'd', 'a'])
  })

  it('clamps indices past the table to the last label', () => {
    expect(hexToBitshiftOption(0b1, 0b1, RSTP_TYPES, 1)).toEqual(['edge'])
  })

  it('yields the first label everywhere for zero masks', () => {
    expect(hexToBitshiftOption(0, 0, RSTP_TYPES, 3)).toEqual(['shared', 'shared', 'shared'])
  })
})

describe('hexToDbm', () => {
  it('maps 0 to 0', () => {
    expect(hexToDbm(0)).toBe(0)
  })

  it('converts relative to the scale and rounds to 3 places', () => {
    expect(hexToDbm(5000)).toBe(-3.01)
    expect(hexToDbm(20000)).toBe(3.01)
    expect(hexToDbm(1, 10000)).toBe(-40)
    expect(hexToDbm(3162)).toBe(-5)
    expect(hexToDbm(50, 100)).toBe(-3.01)
  })

  it('rejects negative readings', () => {
    expect(() => hexToDbm(-1)).toThrow(RangeError)
  })
})

describe('combineUint64', () => {
  it('adds the high word times 2^32', () => {
    expect(combineUint64(5, 1)).toBe(4294967301)
    expect(combineUint64(7, 0)).toBe(7)
  })
})
