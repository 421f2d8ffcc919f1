import type { RecordOf } from '../types'
import { defineSchema, recordEndpoint } from '../schema'

const ADDRESS_ACQUISITION = ['DHCP_FALLBACK', 'STATIC', 'DHCP'] as const
const PORT_COST_MODES = ['short', 'long'] as const
const IGMP_VERSIONS = ['v2', 'v3'] as const

export const systemSchema = defineSchema('SystemEndpoint', [
  // general
  { name: 'addressAcquisition', keys: ['iptp', 'i0a'], kind: 'option', options: ADDRESS_ACQUISITION },
  { name: 'staticIp', keys: ['ip', 'i09'], kind: 'ip' },
  { name: 'ip', keys: ['cip', 'i02'], kind: 'ip' },
  { name: 'identity', keys: ['id', 'i05'], kind: 'str' },
  { name: 'serial', keys: ['sid', 'i04'], kind: 'str' },
  { name: 'mac', keys: ['mac', 'i03'], kind: 'mac' },
  { name: 'model', keys: ['brd', 'i07'], kind: 'str' },
  { name: 'version', keys: ['ver', 'i06'], kind: 'str' },
  { name: 'revision', keys: ['rev'], kind: 'str' },
  { name: 'uptime', keys: ['upt', 'i01'], kind: 'int' },
  { name: 'buildNumber', keys: ['i0b'], kind: 'int' },

  // RSTP
  { name: 'bridgePriority', keys: ['i0e'], kind: 'int' },
  { name: 'forwardReservedMulticast', keys: ['i2a'], kind: 'scalar_bool' },
  { name: 'portCostMode', keys: ['i0f'], kind: 'option', options: PORT_COST_MODES },
  { name: 'rootBridgePriority', keys: ['i10'], kind: 'int' },
  { name: 'rootBridgeMac', keys: ['i11'], kind: 'mac' },

  // access control
  { name: 'allowFromIp', keys: ['i19'], kind: 'ip' },
  { name: 'allowFromMask', keys: ['i1a'], kind: 'int' },
  { name: 'allowFromPorts', keys: ['i12'], kind: 'bool' },
  { name: 'allowFromVlan', keys: ['i1b'], kind: 'int' },

  // IGMP
  { name: 'igmpSnooping', keys: ['i17'], kind: 'scalar_bool' },
  { name: 'igmpQuerier', keys: ['i29'], kind: 'scalar_bool' },
  { name: 'igmpFastLeave', keys: ['i27'], kind: 'bool' },
  { name: 'igmpVersion', keys: ['i28'], kind: 'option', options: IGMP_VERSIONS },

  { name: 'mikrotikDiscoveryProtocol', keys: ['i08'], kind: 'bool' },

  // DHCP and PPPoE snooping
  { name: 'dhcpSnoopingTrustedPorts', keys: ['i13'], kind: 'bool' },
  { name: 'dhcpSnoopingAddInfoOption', keys: ['i14'], kind: 'scalar_bool' },

  // health
  { name: 'cpuTemp', keys: ['temp', 'i22'], kind: 'int', signedBits: 16 },
  { name: 'psu1Current', keys: ['p1c', 'i16'], kind: 'int' },
  { name: 'psu1Voltage', keys: ['p1v', 'i15'], kind: 'int', scale: 100 },
  { name: 'psu2Current', keys: ['p2c', 'i1f'], kind: 'int' },
  { name: 'psu2Voltage', keys: ['p2v', 'i1e'], kind: 'int', scale: 100 },
  { name: 'psu1Power', keys: ['p1p'], kind: 'int', scale: 10 },
  { name: 'psu2Power', keys: ['p2p'], kind: 'int', scale: 10 },
  { name: 'powerConsumption', keys: ['i26'], kind: 'int', scale: 10 },
])

export type SystemRecord = RecordOf<typeof systemSchema>

export const systemEndpoint = recordEndpoint('sys.b', [], systemSchema)
