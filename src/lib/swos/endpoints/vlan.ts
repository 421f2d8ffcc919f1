import type { RecordOf } from '../types'
import { defineSchema, tableEndpoint } from '../schema'

export const vlanEntrySchema = defineSchema('VlanEntry', [
  { name: 'vlanId', keys: ['i01'], kind: 'int' },
  { name: 'igmpSnooping', keys: ['i03'], kind: 'scalar_bool' },
  { name: 'members', keys: ['i02'], kind: 'bool' },
])

export type VlanEntry = RecordOf<typeof vlanEntrySchema>

export const vlanEndpoint = tableEndpoint('VlanEndpoint', 'vlan.b', [], vlanEntrySchema)
