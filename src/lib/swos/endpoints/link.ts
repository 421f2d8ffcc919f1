import type { RecordOf } from '../types'
import { defineSchema, recordEndpoint } from '../schema'

export const SPEEDS = ['10M', '100M', '1G', '10G', '200M', '2.5G', '5G'] as const

// Two bits per port from i06 (low) and i15 (high); state 2 reads as no link too.
const LINK_STATES = ['no link', 'link on', 'no link', 'link paused'] as const

export const linkSchema = defineSchema('LinkEndpoint', [
  { name: 'enabled', keys: ['en', 'i01'], kind: 'bool' },
  { name: 'name', keys: ['nm', 'i0a'], kind: 'str', perPort: true },
  { name: 'linkState', keys: ['lnk', 'i06'], kind: 'bitshift_option', pair: 'i15', options: LINK_STATES },
  { name: 'autoNegotiation', keys: ['an', 'i02'], kind: 'bool' },
  { name: 'speed', keys: ['spdc', 'i08'], kind: 'option', perPort: true, options: SPEEDS },
  { name: 'manSpeed', keys: ['spd', 'i05'], kind: 'option', perPort: true, options: SPEEDS },
  { name: 'fullDuplex', keys: ['dpx', 'i07'], kind: 'bool' },
  { name: 'manFullDuplex', keys: ['dpxc', 'i03'], kind: 'bool' },
  { name: 'flowControlRx', keys: ['fctr', 'i12'], kind: 'bool' },
  { name: 'flowControlTx', keys: ['fctc', 'i16'], kind: 'bool' },
])

export type LinkRecord = RecordOf<typeof linkSchema>

export const linkEndpoint = recordEndpoint('link.b', [], linkSchema)
