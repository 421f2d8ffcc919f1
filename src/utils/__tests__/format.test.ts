import { describe, it, expect } from 'vitest'
import {
  describeField,
  formatValue,
  numericFields,
  portCountOf,
  portLabels,
  portSeries,
  splitRecord,
} from '../format'
import { formatResponse } from '../formatResponse'
import { parseQuasiJson } from '../../lib/swos/quasiJson'
import { statsSchema } from '../../lib/swos/endpoints/stats'
import { linkSchema } from '../../lib/swos/endpoints/link'
import { systemSchema } from '../../lib/swos/endpoints/sys'
import type { FieldDescriptor } from '../../lib/swos/types'

function field(fields: readonly FieldDescriptor[], name: string): FieldDescriptor {
  const found = fields.find((f) => f.name === name)
  if (!found) throw new Error(`no field ${name}`)
  return found
}

describe('formatValue', () => {
  it('renders scalars', () => {
    expect(formatValue(3.5)).toBe('3.5')
    expect(formatValue(true)).toBe('yes')
    expect(formatValue(null)).toBe('—')
    expect(formatValue('')).toBe('""')
  })

  it('renders sequences', () => {
    expect(formatValue([true, false, null])).toBe('[yes, no, —]')
  })
})

describe('splitRecord', () => {
  it('separates scalars from per-port values in field order', () => {
    expect(splitRecord({ a: 1, b: [1, 2], c: null })).toEqual({
      scalars: [['a', 1], ['c', null]],
      perPort: [['b', [1, 2]]],
    })
  })
})

describe('portCountOf', () => {
  it('takes the longest sequence', () => {
    expect(portCountOf({ a: [1, 2, 3], b: [1] })).toBe(3)
    expect(portCountOf({ a: 1 })).toBe(0)
  })
})

describe('numericFields', () => {
  it('keeps non-empty number sequences only', () => {
    expect(numericFields({ x: [1, 2], y: ['a'], z: [true], w: [], s: 5 })).toEqual(['x'])
  })
})

describe('portLabels', () => {
  it('prefers the record\'s own port names', () => {
    expect(portLabels({ name: ['Uplink', '', 'P3'], x: [1, 2, 3] })).toEqual(['Uplink', 'Port2', 'P3'])
  })

  it('generates names otherwise', () => {
    expect(portLabels({ x: [1, 2, 3, 4, 5, 6] })).toEqual(['Port1', 'Port2', 'Port3', 'Port4', 'SFP1+', 'SFP2+'])
  })
})

describe('portSeries', () => {
  it('pairs labels with values, charting non-numbers as 0', () => {
    expect(portSeries({ x: [1, null, 3] }, 'x')).toEqual([
      { port: 'Port1', value: 1 },
      { port: 'Port2', value: 0 },
      { port: 'Port3', value: 3 },
    ])
  })

  it('is empty for scalar or missing fields', () => {
    expect(portSeries({ x: 1 }, 'x')).toEqual([])
    expect(portSeries({}, 'x')).toEqual([])
  })
})

describe('describeField', () => {
  it('summarises kind parameters', () => {
    expect(describeField(field(statsSchema.fields, 'rxRate'))).toBe('per port, ÷ 0.32')
    expect(describeField(field(statsSchema.fields, 'rxBytes'))).toBe('per port, high i02')
    expect(describeField(field(systemSchema.fields, 'cpuTemp'))).toBe('signed 16-bit')
    expect(describeField(field(linkSchema.fields, 'linkState'))).toBe('pair i15, no link | link on | no link | link paused')
    expect(describeField(field(systemSchema.fields, 'mac'))).toBe('')
  })
})

describe('formatResponse', () => {
  it('keeps the response equivalent', async () => {
    const text = "{en:0x3ff,nm:['506f727431','506f727432'],spd:[0x02,0x02]}"
    const formatted = await formatResponse(text)
    expect(parseQuasiJson(formatted)).toEqual(parseQuasiJson(text))
  })

  it('rejects malformed input', async () => {
    await expect(formatResponse('{en:')).rejects.toThrow()
  })
})
