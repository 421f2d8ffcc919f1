import type { RecordOf } from '../types'
import { defineSchema, tableEndpoint } from '../schema'

export const igmpEntrySchema = defineSchema('IgmpEntry', [
  { name: 'groupAddress', keys: ['i01'], kind: 'ip' },
  { name: 'vlan', keys: ['i03'], kind: 'int' },
  { name: 'memberPorts', keys: ['i02'], kind: 'bool' },
])

export type IgmpEntry = RecordOf<typeof igmpEntrySchema>

export const igmpEndpoint = tableEndpoint('IgmpEndpoint', '!igmp.b', [], igmpEntrySchema)
