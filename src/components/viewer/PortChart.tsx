import { useState } from 'react'
import { BarChart, Bar, XAxis, YAxis, ResponsiveContainer, Tooltip } from 'recharts'
import type { AnyRecord } from '../../lib/swos/types'
import { numericFields, portSeries } from '../../utils/format'

interface Props {
  record: AnyRecord
}

function formatTick(v: number): string {
  if (Math.abs(v) >= 1e9) return `${(v / 1e9).toFixed(1)}G`
  if (Math.abs(v) >= 1e6) return `${(v / 1e6).toFixed(1)}M`
  if (Math.abs(v) >= 1e3) return `${(v / 1e3).toFixed(1)}k`
  return String(v)
}

export default function PortChart({ record }: Props) {
  const fields = numericFields(record)
  const [chosen, setChosen] = useState<string | null>(null)
  const field = chosen !== null && fields.includes(chosen) ? chosen : fields[0]

  if (field === undefined) {
    return <div className="py-8 text-center text-text-muted text-sm">No numeric per-port fields to chart</div>
  }

  const data = portSeries(record, field)

  return (
    <div className="space-y-3">
      <select
        value={field}
        onChange={(e) => setChosen(e.target.value)}
        className="bg-elevated text-text-primary text-sm rounded px-2 py-1 border border-border-subtle focus:outline-none"
      >
        {fields.map((name) => (
          <option key={name} value={name}>{name}</option>
        ))}
      </select>
      <div className="h-72">
        <ResponsiveContainer width="100%" height="100%">
          <BarChart data={data} margin={{ top: 4, right: 8, bottom: 0, left: 0 }}>
            <XAxis dataKey="port" tick={{ fontSize: 10, fill: '#9ca3af' }} interval={0} angle={-45} textAnchor="end" height={50} />
            <YAxis tick={{ fontSize: 10, fill: '#9ca3af' }} tickFormatter={formatTick} width={50} />
            <Tooltip
              contentStyle={{ background: '#1f2937', border: '1px solid #374151', borderRadius: '6px', fontSize: '12px' }}
              labelStyle={{ color: '#d1d5db' }}
              cursor={{ fill: 'rgba(255,255,255,0.05)' }}
            />
            <Bar dataKey="value" name={field} fill="#3b82f6" isAnimationActive={false} />
          </BarChart>
        </ResponsiveContainer>
      </div>
    </div>
  )
}
