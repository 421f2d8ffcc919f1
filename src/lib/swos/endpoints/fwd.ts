import type { RecordOf } from '../types'
import { defineSchema, recordEndpoint } from '../schema'

const VLAN_MODES = ['disabled', 'optional', 'strict'] as const
const VLAN_RECEIVE = ['any', 'only tagged', 'only untagged'] as const

export const forwardingSchema = defineSchema('ForwardingEndpoint', [
  // isolation matrix: ports that may receive traffic from source port N
  { name: 'fromPort1', keys: ['i01'], kind: 'bool' },
  { name: 'fromPort2', keys: ['i02'], kind: 'bool' },
  { name: 'fromPort3', keys: ['i03'], kind: 'bool' },
  { name: 'fromPort4', keys: ['i04'], kind: 'bool' },
  { name: 'fromPort5', keys: ['i05'], kind: 'bool' },
  { name: 'fromPort6', keys: ['i06'], kind: 'bool' },
  { name: 'fromPort7', keys: ['i07'], kind: 'bool' },
  { name: 'fromPort8', keys: ['i08'], kind: 'bool' },
  { name: 'fromPort9', keys: ['i09'], kind: 'bool' },
  { name: 'fromPort10', keys: ['i0a'], kind: 'bool' },

  { name: 'portLock', keys: ['i10'], kind: 'bool' },
  { name: 'lockOnFirst', keys: ['i11'], kind: 'bool' },

  { name: 'mirrorIngress', keys: ['i12'], kind: 'bool' },
  { name: 'mirrorEgress', keys: ['i13'], kind: 'bool' },
  { name: 'mirrorTo', keys: ['i14'], kind: 'bool' },

  { name: 'stormRate', keys: ['i1a'], kind: 'int', perPort: true },
  { name: 'ingressRate', keys: ['i1d'], kind: 'int', perPort: true },
  { name: 'egressRate', keys: ['i1e'], kind: 'int', perPort: true },

  { name: 'limitUnknownUnicast', keys: ['i1b'], kind: 'bool' },
  { name: 'floodUnknownMulticast', keys: ['i1c'], kind: 'bool' },

  { name: 'vlanMode', keys: ['i15'], kind: 'option', perPort: true, options: VLAN_MODES },
  { name: 'vlanReceive', keys: ['i17'], kind: 'option', perPort: true, options: VLAN_RECEIVE },
  { name: 'defaultVlanId', keys: ['i18'], kind: 'int', perPort: true },
  { name: 'forceVlanId', keys: ['i19'], kind: 'bool' },
])

export type ForwardingRecord = RecordOf<typeof forwardingSchema>

export const forwardingEndpoint = recordEndpoint('fwd.b', [], forwardingSchema)
