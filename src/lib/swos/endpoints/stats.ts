import type { RecordOf } from '../types'
import { defineSchema, recordEndpoint } from '../schema'

export const statsSchema = defineSchema('StatsEndpoint', [
  // rates
  { name: 'rxRate', keys: ['i21'], kind: 'int', perPort: true, scale: 0.32 },
  { name: 'txRate', keys: ['i22'], kind: 'int', perPort: true, scale: 0.32 },
  { name: 'rxPacketRate', keys: ['i25'], kind: 'int', perPort: true, scale: 2.56 },
  { name: 'txPacketRate', keys: ['i26'], kind: 'int', perPort: true, scale: 2.56 },

  // byte and packet counters
  { name: 'rxBytes', keys: ['i01'], kind: 'uint64', perPort: true, high: 'i02' },
  { name: 'txBytes', keys: ['i0f'], kind: 'uint64', perPort: true, high: 'i10' },
  { name: 'rxTotalPackets', keys: ['i23'], kind: 'int', perPort: true },
  { name: 'txTotalPackets', keys: ['i24'], kind: 'int', perPort: true },
  { name: 'rxUnicasts', keys: ['i05'], kind: 'uint64', perPort: true, high: 'i27' },
  { name: 'txUnicasts', keys: ['i11'], kind: 'uint64', perPort: true, high: 'i28' },
  { name: 'rxBroadcasts', keys: ['i07'], kind: 'uint64', perPort: true, high: 'i29' },
  { name: 'txBroadcasts', keys: ['i14'], kind: 'uint64', perPort: true, high: 'i2a' },
  { name: 'rxMulticasts', keys: ['i08'], kind: 'uint64', perPort: true, high: 'i2b' },
  { name: 'txMulticasts', keys: ['i13'], kind: 'uint64', perPort: true, high: 'i2c' },

  // errors
  { name: 'rxPauses', keys: ['i17'], kind: 'int', perPort: true },
  { name: 'rxErrors', keys: ['i1d'], kind: 'int', perPort: true },
  { name: 'rxFcsErrors', keys: ['i1e'], kind: 'int', perPort: true },
  { name: 'rxJabber', keys: ['i1c'], kind: 'int', perPort: true },
  { name: 'rxRunts', keys: ['i19'], kind: 'int', perPort: true },
  { name: 'rxFragments', keys: ['i1a'], kind: 'int', perPort: true },
  { name: 'rxTooLong', keys: ['i1b'], kind: 'int', perPort: true },
  { name: 'txPauses', keys: ['i16'], kind: 'int', perPort: true },
  { name: 'txFcsErrors', keys: ['i04'], kind: 'int', perPort: true },
  { name: 'txCollisions', keys: ['i1f'], kind: 'int', perPort: true },
  { name: 'txSingleCollisions', keys: ['i15'], kind: 'int', perPort: true },
  { name: 'txMultipleCollisions', keys: ['i18'], kind: 'int', perPort: true },
  { name: 'txExcessiveCollisions', keys: ['i12'], kind: 'int', perPort: true },
  { name: 'txLateCollisions', keys: ['i20'], kind: 'int', perPort: true },
  { name: 'txDeferred', keys: ['i06'], kind: 'int', perPort: true },

  // packet size histogram
  { name: 'hist64', keys: ['i09'], kind: 'int', perPort: true },
  { name: 'hist65To127', keys: ['i0a'], kind: 'int', perPort: true },
  { name: 'hist128To255', keys: ['i0b'], kind: 'int', perPort: true },
  { name: 'hist256To511', keys: ['i0c'], kind: 'int', perPort: true },
  { name: 'hist512To1023', keys: ['i0d'], kind: 'int', perPort: true },
  { name: 'hist1024ToMax', keys: ['i0e'], kind: 'int', perPort: true },
])

export type StatsRecord = RecordOf<typeof statsSchema>

// SwOS Lite prefixes the path with "!"; full SwOS 2.17+ does not.
export const statsEndpoint = recordEndpoint('!stats.b', ['stats.b'], statsSchema)
