import type { AnyRecord } from '../../lib/swos/types'
import { formatValue } from '../../utils/format'

interface Props {
  entries: AnyRecord[]
}

export default function EntryTableView({ entries }: Props) {
  if (entries.length === 0) {
    return <div className="py-8 text-center text-text-muted text-sm">No entries</div>
  }

  const columns = Object.keys(entries[0])

  return (
    <div className="overflow-x-auto">
      <table className="w-full text-xs">
        <thead>
          <tr className="border-b border-border-subtle text-left text-text-muted uppercase tracking-wider">
            <th className="px-3 py-1.5">#</th>
            {columns.map((name) => (
              <th key={name} className="px-3 py-1.5 whitespace-nowrap">{name}</th>
            ))}
          </tr>
        </thead>
        <tbody>
          {entries.map((entry, i) => (
            <tr key={i} className="border-b border-border-subtle/50 hover:bg-elevated/50">
              <td className="px-3 py-1.5 text-text-muted">{i + 1}</td>
              {columns.map((name) => (
                <td key={name} className="px-3 py-1.5 font-mono text-text-primary whitespace-nowrap">
                  {formatValue(entry[name] ?? null)}
                </td>
              ))}
            </tr>
          ))}
        </tbody>
      </table>
    </div>
  )
}
