import type { AnyRecord } from '../../lib/swos/types'
import { formatScalar, portLabels, splitRecord } from '../../utils/format'

interface Props {
  record: AnyRecord
}

export default function PortTableView({ record }: Props) {
  const { scalars, perPort } = splitRecord(record)
  const labels = portLabels(record)

  return (
    <div className="space-y-4">
      {scalars.length > 0 && (
        <table className="w-full text-xs">
          <thead>
            <tr className="border-b border-border-subtle text-left text-text-muted uppercase tracking-wider">
              <th className="px-3 py-1.5">Field</th>
              <th className="px-3 py-1.5">Value</th>
            </tr>
          </thead>
          <tbody>
            {scalars.map(([name, value]) => (
              <tr key={name} className="border-b border-border-subtle/50 hover:bg-elevated/50">
                <td className="px-3 py-1.5 text-text-secondary font-mono">{name}</td>
                <td className={`px-3 py-1.5 font-mono ${value === null ? 'text-text-muted' : 'text-text-primary'}`}>
                  {formatScalar(value)}
                </td>
              </tr>
            ))}
          </tbody>
        </table>
      )}

      {perPort.length > 0 && (
        <div className="overflow-x-auto">
          <table className="w-full text-xs">
            <thead>
              <tr className="border-b border-border-subtle text-left text-text-muted uppercase tracking-wider">
                <th className="px-3 py-1.5">Port</th>
                {perPort.map(([name]) => (
                  <th key={name} className="px-3 py-1.5 whitespace-nowrap">{name}</th>
                ))}
              </tr>
            </thead>
            <tbody>
              {labels.map((label, i) => (
                <tr key={i} className="border-b border-border-subtle/50 hover:bg-elevated/50">
                  <td className="px-3 py-1.5 text-text-secondary whitespace-nowrap">{label}</td>
                  {perPort.map(([name, values]) => (
                    <td key={name} className="px-3 py-1.5 font-mono text-text-primary whitespace-nowrap">
                      {i < values.length ? formatScalar(values[i]) : ''}
                    </td>
                  ))}
                </tr>
              ))}
            </tbody>
          </table>
        </div>
      )}
    </div>
  )
}
