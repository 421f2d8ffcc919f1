import { useState } from 'react'
import type { AnyRecord, DecodedValue } from '../../lib/swos/types'
import { formatScalar, portLabels } from '../../utils/format'

interface Props {
  records: AnyRecord[]
  /** Group titles; defaults to "Entry N". */
  titles?: string[]
}

function FieldRow({ name, value, labels }: { name: string; value: DecodedValue; labels: string[] }) {
  const [open, setOpen] = useState(false)

  if (!Array.isArray(value)) {
    return (
      <div className="flex items-baseline gap-2 text-xs font-mono">
        <span className="w-3" />
        <span className="text-text-muted min-w-[160px] shrink-0">{name}</span>
        <span className={value === null ? 'text-text-muted' : 'text-text-primary'}>{formatScalar(value)}</span>
      </div>
    )
  }

  return (
    <div>
      <button
        onClick={() => setOpen(!open)}
        className="flex items-baseline gap-2 text-xs font-mono hover:text-text-primary"
      >
        <span className="w-3 text-center text-text-muted">{open ? '▼' : '▶'}</span>
        <span className="text-text-muted min-w-[160px] shrink-0 text-left">{name}</span>
        <span className="text-text-muted text-[10px]">{value.length} ports</span>
      </button>
      {open && (
        <div className="ml-8 mt-0.5 space-y-0.5">
          {value.map((v, i) => (
            <div key={i} className="flex items-baseline gap-2 text-xs font-mono">
              <span className="text-text-muted min-w-[80px] shrink-0">{labels[i] ?? i + 1}</span>
              <span className="text-text-primary">{formatScalar(v)}</span>
            </div>
          ))}
        </div>
      )}
    </div>
  )
}

function CollapsibleRecord({ title, record }: { title: string; record: AnyRecord }) {
  const [open, setOpen] = useState(true)
  const labels = portLabels(record)

  return (
    <div className="mb-2">
      <button
        onClick={() => setOpen(!open)}
        className="flex items-center gap-1.5 text-xs font-semibold text-text-secondary hover:text-text-primary py-1"
      >
        <span className="w-3 text-center">{open ? '▼' : '▶'}</span>
        {title}
      </button>
      {open && (
        <div className="ml-4 mt-1 space-y-0.5">
          {Object.entries(record).map(([name, value]) => (
            <FieldRow key={name} name={name} value={value} labels={labels} />
          ))}
        </div>
      )}
    </div>
  )
}

export default function RecordTreeView({ records, titles }: Props) {
  if (records.length === 0) {
    return <div className="py-8 text-center text-text-muted text-sm">Nothing decoded</div>
  }

  return (
    <div>
      {records.map((record, i) => (
        <CollapsibleRecord key={i} title={titles?.[i] ?? `Entry ${i + 1}`} record={record} />
      ))}
    </div>
  )
}
