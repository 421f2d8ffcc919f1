import type { RecordOf } from '../types'
import { defineSchema, recordEndpoint, tableEndpoint } from '../schema'

export const VLAN_MATCH = ['any', 'present', 'not present'] as const
export const ACCOUNT_AS = ['none', '#1', '#2', '#3', '#4'] as const

// Empty MAC/IP and zero numeric criteria mean "match any".
export const aclEntrySchema = defineSchema('AclEntry', [
  { name: 'fromPorts', keys: ['i01'], kind: 'bool' },

  { name: 'macSrc', keys: ['i02'], kind: 'partner_mac' },
  { name: 'macSrcMask', keys: ['i03'], kind: 'mac' },
  { name: 'macDst', keys: ['i04'], kind: 'partner_mac' },
  { name: 'macDstMask', keys: ['i05'], kind: 'mac' },
  { name: 'ethertype', keys: ['i06'], kind: 'int' },

  { name: 'vlan', keys: ['i07'], kind: 'option', options: VLAN_MATCH },
  { name: 'vlanId', keys: ['i08'], kind: 'int' },
  { name: 'priority', keys: ['i09'], kind: 'int' },

  { name: 'ipSrc', keys: ['i0a'], kind: 'partner_ip' },
  { name: 'ipSrcPrefix', keys: ['i0b'], kind: 'int' },
  { name: 'ipSrcPort', keys: ['i0c'], kind: 'int' },
  { name: 'ipDst', keys: ['i0d'], kind: 'partner_ip' },
  { name: 'ipDstPrefix', keys: ['i0e'], kind: 'int' },
  { name: 'ipDstPort', keys: ['i0f'], kind: 'int' },
  { name: 'protocol', keys: ['i10'], kind: 'int' },
  { name: 'dscp', keys: ['i11'], kind: 'int' },

  { name: 'drop', keys: ['i12'], kind: 'scalar_bool' },
  { name: 'mirrorTo', keys: ['i13'], kind: 'int' },
  { name: 'redirectTo', keys: ['i14'], kind: 'int' },
  { name: 'setVlanId', keys: ['i15'], kind: 'int' },
  { name: 'setPriority', keys: ['i16'], kind: 'int' },
  { name: 'setDscp', keys: ['i17'], kind: 'int' },

  { name: 'accountAs', keys: ['i18'], kind: 'option', options: ACCOUNT_AS },
])

export type AclEntry = RecordOf<typeof aclEntrySchema>

export const aclEndpoint = tableEndpoint('AclEndpoint', 'acl.b', [], aclEntrySchema)

/** Per-port packet counts for the four accounting buckets (#1 to #4). */
export const aclStatsSchema = defineSchema('AclStatsEndpoint', [
  { name: 'counter1', keys: ['i01'], kind: 'int', perPort: true },
  { name: 'counter2', keys: ['i02'], kind: 'int', perPort: true },
  { name: 'counter3', keys: ['i03'], kind: 'int', perPort: true },
  { name: 'counter4', keys: ['i04'], kind: 'int', perPort: true },
])

export type AclStatsRecord = RecordOf<typeof aclStatsSchema>

export const aclStatsEndpoint = recordEndpoint('!aclstats.b', ['aclstats.b'], aclStatsSchema)
