import type { RecordOf } from '../types'
import { defineSchema, tableEndpoint } from '../schema'

export const hostEntrySchema = defineSchema('HostEntry', [
  { name: 'port', keys: ['i02'], kind: 'int' },
  { name: 'mac', keys: ['i01'], kind: 'mac' },
])

export type HostEntry = RecordOf<typeof hostEntrySchema>

/** Static MAC table. */
export const hostEndpoint = tableEndpoint('HostEndpoint', 'host.b', [], hostEntrySchema)

/** Learned MAC table. */
export const dynamicHostEndpoint = tableEndpoint('DynamicHostEndpoint', '!dhost.b', [], hostEntrySchema)
