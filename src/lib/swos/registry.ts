import type { DecodeOutcome, Endpoint, RecordSchema } from './types'
import { SchemaError } from './errors'
import { decodeList, decodeOne } from './decoder'
import { parseQuasiJson } from './quasiJson'
import { ENDPOINTS } from './endpoints'

/** Every response key a schema reads, in schema order, companions included. */
export function sourceKeys(schema: RecordSchema): string[] {
  const keys = new Set<string>()
  for (const field of schema.fields) {
    for (const key of field.keys) keys.add(key)
    if (field.kind === 'uint64') keys.add(field.high)
    if (field.kind === 'bitshift_option') keys.add(field.pair)
  }
  return [...keys]
}

export class EndpointRegistry {
  private byPath = new Map<string, Endpoint>()
  private ordered: Endpoint[] = []

  constructor(endpoints: readonly Endpoint[] = ENDPOINTS) {
    for (const endpoint of endpoints) this.register(endpoint)
  }

  private register(endpoint: Endpoint): void {
    for (const path of [endpoint.path, ...endpoint.alternates]) {
      const existing = this.byPath.get(path)
      if (existing) {
        throw new SchemaError(`path '${path}' is claimed by both ${existing.name} and ${endpoint.name}`)
      }
      this.byPath.set(path, endpoint)
    }
    this.ordered.push(endpoint)
  }

  get(path: string): Endpoint | null {
    return this.byPath.get(path) ?? null
  }

  /** Primary paths first, then alternates, each in registration order. */
  paths(): string[] {
    return [
      ...this.ordered.map((e) => e.path),
      ...this.ordered.flatMap((e) => e.alternates),
    ]
  }

  definitions(): Endpoint[] {
    return [...this.ordered]
  }

  decode(path: string, text: string): DecodeOutcome {
    const endpoint = this.get(path)
    if (!endpoint) throw new SchemaError(`unknown endpoint path '${path}'`)
    const tree = parseQuasiJson(text)
    if (endpoint.mode === 'table') {
      return { mode: 'table', endpoint, entries: decodeList(endpoint.schema, tree) }
    }
    return { mode: 'record', endpoint, record: decodeOne(endpoint.schema, tree) }
  }
}

export const registry = new EndpointRegistry()
