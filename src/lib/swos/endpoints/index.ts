import type { Endpoint } from '../types'
import { linkEndpoint } from './link'
import { systemEndpoint } from './sys'
import { sfpEndpoint } from './sfp'
import { snmpEndpoint } from './snmp'
import { dynamicHostEndpoint, hostEndpoint } from './host'
import { igmpEndpoint } from './igmp'
import { vlanEndpoint } from './vlan'
import { lacpEndpoint } from './lacp'
import { rstpEndpoint } from './rstp'
import { statsEndpoint } from './stats'
import { forwardingEndpoint } from './fwd'
import { aclEndpoint, aclStatsEndpoint } from './acl'

export * from './link'
export * from './sys'
export * from './sfp'
export * from './snmp'
export * from './host'
export * from './igmp'
export * from './vlan'
export * from './lacp'
export * from './rstp'
export * from './stats'
export * from './fwd'
export * from './acl'

export const ENDPOINTS: readonly Endpoint[] = [
  linkEndpoint,
  systemEndpoint,
  sfpEndpoint,
  snmpEndpoint,
  hostEndpoint,
  dynamicHostEndpoint,
  igmpEndpoint,
  vlanEndpoint,
  lacpEndpoint,
  rstpEndpoint,
  statsEndpoint,
  forwardingEndpoint,
  aclEndpoint,
  aclStatsEndpoint,
]
