import type { RecordOf } from '../types'
import { defineSchema, recordEndpoint } from '../schema'

export const snmpSchema = defineSchema('SnmpEndpoint', [
  { name: 'enabled', keys: ['i01'], kind: 'scalar_bool' },
  { name: 'community', keys: ['i02'], kind: 'str' },
  { name: 'contactInfo', keys: ['i03'], kind: 'str' },
  { name: 'location', keys: ['i04'], kind: 'str' },
])

export type SnmpRecord = RecordOf<typeof snmpSchema>

export const snmpEndpoint = recordEndpoint('snmp.b', [], snmpSchema)
