import { useState } from 'react'
import { registry } from '../lib/swos'
import type { Endpoint } from '../lib/swos'
import { describeField } from '../utils/format'

function EndpointCard({ endpoint }: { endpoint: Endpoint }) {
  const [open, setOpen] = useState(false)

  return (
    <div className="rounded border border-border-subtle bg-surface">
      <button
        onClick={() => setOpen(!open)}
        className="flex w-full items-center gap-3 px-4 py-2 text-left hover:bg-elevated/50"
      >
        <span className="w-3 text-center text-xs text-text-muted">{open ? '▼' : '▶'}</span>
        <span className="font-mono text-sm text-text-primary">{endpoint.path}</span>
        <span className="text-sm text-text-secondary">{endpoint.name}</span>
        {endpoint.alternates.length > 0 && (
          <span className="text-xs text-text-muted">also {endpoint.alternates.join(', ')}</span>
        )}
        <span className="ml-auto rounded bg-elevated px-2 py-0.5 text-xs text-info-text">
          {endpoint.mode === 'table' ? 'table' : 'record'}
        </span>
        <span className="text-xs text-text-muted">{endpoint.schema.fields.length} fields</span>
      </button>
      {open && (
        <table className="w-full text-xs">
          <thead>
            <tr className="border-b border-t border-border-subtle text-left text-text-muted uppercase tracking-wider">
              <th className="px-3 py-1.5">Field</th>
              <th className="px-3 py-1.5">Kind</th>
              <th className="px-3 py-1.5">Keys</th>
              <th className="px-3 py-1.5">Details</th>
            </tr>
          </thead>
          <tbody>
            {endpoint.schema.fields.map((field) => (
              <tr key={field.name} className="border-b border-border-subtle/50">
                <td className="px-3 py-1.5 font-mono text-text-primary">{field.name}</td>
                <td className="px-3 py-1.5 text-text-secondary">{field.kind}</td>
                <td className="px-3 py-1.5 font-mono text-text-secondary">{field.keys.join(', ')}</td>
                <td className="px-3 py-1.5 text-text-muted">{describeField(field)}</td>
              </tr>
            ))}
          </tbody>
        </table>
      )}
    </div>
  )
}

export default function Endpoints() {
  return (
    <div className="space-y-2">
      {registry.definitions().map((endpoint) => (
        <EndpointCard key={endpoint.path} endpoint={endpoint} />
      ))}
    </div>
  )
}
