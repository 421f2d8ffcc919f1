import type { RecordOf } from '../types'
import { defineSchema, recordEndpoint } from '../schema'

// One entry per SFP cage, not per switch port.
export const sfpSchema = defineSchema('SfpEndpoint', [
  { name: 'vendor', keys: ['i01'], kind: 'str', perPort: true },
  { name: 'partNumber', keys: ['i02'], kind: 'str', perPort: true },
  { name: 'revision', keys: ['i03'], kind: 'str', perPort: true },
  { name: 'serial', keys: ['i04'], kind: 'str', perPort: true },
  { name: 'date', keys: ['i05'], kind: 'str', perPort: true },
  { name: 'type', keys: ['i06'], kind: 'sfp_type', perPort: true },
  { name: 'temperature', keys: ['i08'], kind: 'int', perPort: true },
  { name: 'voltage', keys: ['i09'], kind: 'int', perPort: true, scale: 1000 },
  { name: 'txBias', keys: ['i0a'], kind: 'int', perPort: true },
  { name: 'txPower', keys: ['i0b'], kind: 'dbm', perPort: true, scale: 10000 },
  { name: 'rxPower', keys: ['i0c'], kind: 'dbm', perPort: true, scale: 10000 },
])

export type SfpRecord = RecordOf<typeof sfpSchema>

export const sfpEndpoint = recordEndpoint('sfp.b', [], sfpSchema)
