import type { RecordOf } from '../types'
import { defineSchema, recordEndpoint } from '../schema'

export const RSTP_ROLES = ['disabled', 'alternate', 'root', 'designated', 'backup'] as const
export const RSTP_MODES = ['STP', 'RSTP'] as const
// Index 3 repeats "edge" on the device; clamping to the last label covers it.
export const RSTP_TYPES = ['shared', 'point-to-point', 'edge'] as const
export const RSTP_STATES = ['discarding', 'learning', 'forwarding'] as const

export const rstpSchema = defineSchema('RstpEndpoint', [
  { name: 'rstp', keys: ['i01'], kind: 'bool' },
  { name: 'mode', keys: ['i05'], kind: 'bool_option', options: RSTP_MODES },
  { name: 'role', keys: ['i02'], kind: 'option', perPort: true, options: RSTP_ROLES },
  { name: 'rootPathCost', keys: ['i03'], kind: 'int', perPort: true },
  { name: 'type', keys: ['i06'], kind: 'bitshift_option', pair: 'i07', options: RSTP_TYPES },
  { name: 'state', keys: ['i08'], kind: 'bitshift_option', pair: 'i09', options: RSTP_STATES },
])

export type RstpRecord = RecordOf<typeof rstpSchema>

export const rstpEndpoint = recordEndpoint('rstp.b', [], rstpSchema)
