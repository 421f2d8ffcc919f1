import type { RecordOf } from '../types'
import { defineSchema, recordEndpoint } from '../schema'

export const LACP_MODES = ['passive', 'active', 'static'] as const

export const lacpSchema = defineSchema('LacpEndpoint', [
  { name: 'mode', keys: ['i01'], kind: 'option', perPort: true, options: LACP_MODES },
  { name: 'group', keys: ['i03'], kind: 'int', perPort: true },
  { name: 'trunk', keys: ['i02'], kind: 'int', perPort: true },
  { name: 'partner', keys: ['i04'], kind: 'partner_mac', perPort: true },
])

export type LacpRecord = RecordOf<typeof lacpSchema>

export const lacpEndpoint = recordEndpoint('lacp.b', [], lacpSchema)
