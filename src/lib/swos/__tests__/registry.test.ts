import { describe, it, expect, beforeEach } from 'vitest'
import { EndpointRegistry, sourceKeys } from '../registry'
import { SchemaError } from '../errors'
import { linkSchema } from '../endpoints/link'
import { statsEndpoint, statsSchema } from '../endpoints/stats'
import { hostEndpoint } from '../endpoints/host'
import { ENDPOINTS } from '../endpoints'

describe('EndpointRegistry', () => {
  let registry: EndpointRegistry

  beforeEach(() => {
    registry = new EndpointRegistry()
  })

  it('resolves primary paths', () => {
    expect(registry.get('link.b')!.name).toBe('LinkEndpoint')
    expect(registry.get('!dhost.b')!.name).toBe('DynamicHostEndpoint')
    expect(registry.get('host.b')).toBe(hostEndpoint)
  })

  it('resolves alternate paths to the same definition', () => {
    expect(registry.get('stats.b')).toBe(statsEndpoint)
    expect(registry.get('!stats.b')).toBe(statsEndpoint)
    expect(registry.get('aclstats.b')!.name).toBe('AclStatsEndpoint')
  })

  it('returns null for unknown paths', () => {
    expect(registry.get('poe.b')).toBeNull()
  })

  it('lists primary paths before alternates', () => {
    const paths = registry.paths()
    expect(paths).toHaveLength(16)
    expect(paths[0]).toBe('link.b')
    expect(paths.slice(-2)).toEqual(['stats.b', 'aclstats.b'])
  })

  it('lists every definition once', () => {
    expect(registry.definitions()).toHaveLength(ENDPOINTS.length)
    expect(registry.definitions().map((e) => e.mode).filter((m) => m === 'table')).toHaveLength(5)
  })

  it('decodes record endpoints', () => {
    const outcome = registry.decode('stats.b', '{i01:[5,6],i02:1,i21:[32,64]}')
    expect(outcome.mode).toBe('record')
    if (outcome.mode !== 'record') return
    expect(outcome.endpoint).toBe(statsEndpoint)
    expect(outcome.record.rxBytes).toEqual([4294967301, 4294967302])
    expect(outcome.record.txBytes).toBeNull()
  })

  it('decodes table endpoints', () => {
    const outcome = registry.decode('host.b', "[{i01:'0011223344aa',i02:0x03}]")
    expect(outcome.mode).toBe('table')
    if (outcome.mode !== 'table') return
    expect(outcome.entries).toEqual([{ port: 3, mac: '00:11:22:33:44:AA' }])
  })

  it('decodes an empty table response to no entries', () => {
    const outcome = registry.decode('vlan.b', '{}')
    expect(outcome).toMatchObject({ mode: 'table', entries: [] })
  })

  it('rejects unknown paths', () => {
    expect(() => registry.decode('poe.b', '{}')).toThrow(new SchemaError("unknown endpoint path 'poe.b'"))
  })

  it('rejects two definitions claiming one path', () => {
    expect(() => new EndpointRegistry([statsEndpoint, { ...hostEndpoint, path: 'stats.b' }])).toThrow(
      "path 'stats.b' is claimed by both StatsEndpoint and HostEndpoint",
    )
  })
})

describe('sourceKeys', () => {
  it('lists aliases and companions in schema order', () => {
    expect(sourceKeys(linkSchema)).toEqual([
      'en', 'i01', 'nm', 'i0a', 'lnk', 'i06', 'i15', 'an', 'i02', 'spdc', 'i08',
      'spd', 'i05', 'dpx', 'i07', 'dpxc', 'i03', 'fctr', 'i12', 'fctc', 'i16',
    ])
  })

  it('includes high words of 64-bit counters', () => {
    const keys = sourceKeys(statsSchema)
    expect(keys.indexOf('i02')).toBe(keys.indexOf('i01') + 1)
    expect(keys).toContain('i2c')
  })
})
