import { Bird, ArrowSquareOut } from '@phosphor-icons/react'
import { useSpeciesImage } from '@/hooks/use-species-image'
import { todayIsoDate } from '@/lib/reconcile'
import { PHOTO_COLUMN, SOURCE_COLUMN, type UnifiedRow } from '@/lib/types'
import { presentText } from '@/lib/utils'
import { Button } from './button'

interface SightingRowProps {
  row: UnifiedRow
  onEdit: (seen: boolean, firstSeenDate: string | undefined, notes: string) => void
  metadataTimeoutMs?: number
}

const DETAIL_FIELDS = [
  ['Best time to see', 'Best time in Port Orchard'],
  ['Favorite foods', 'Favorite foods'],
  ['Typical habitat', 'Typical habitat'],
] as const

export function SightingRow({ row, onEdit, metadataTimeoutMs }: SightingRowProps) {
  const { cells } = row.record
  const { imageUrl } = useSpeciesImage(row.record, metadataTimeoutMs)
  const photoPage = presentText(cells[PHOTO_COLUMN])
  const sourcePage = presentText(cells[SOURCE_COLUMN])
  const title = row.speciesName || 'Unknown'
  const inputId = `sighting-${title.replace(/\W+/g, '-').toLowerCase()}`
  const currentDate = row.firstSeenDate || undefined

  return (
    <article className="grid gap-4 border-t border-border py-6 md:grid-cols-[1fr_2fr_2fr]">
      <div className="space-y-2">
        {imageUrl ? (
          <img src={imageUrl} alt={title} className="w-full rounded-lg object-cover bg-muted" />
        ) : (
          <div className="space-y-2">
            <div className="aspect-[4/3] w-full rounded-lg bg-muted flex items-center justify-center">
              <Bird size={28} className="text-muted-foreground/40" />
            </div>
            {photoPage && (
              <Button variant="outline" onClick={() => window.open(photoPage, '_blank', 'noopener')}>
                Open photo page <ArrowSquareOut size={14} />
              </Button>
            )}
          </div>
        )}
        {sourcePage && (
          <a href={sourcePage} target="_blank" rel="noreferrer" className="text-sm text-primary underline">
            Source
          </a>
        )}
      </div>

      <div className="space-y-2">
        <h2 className="font-serif text-xl font-semibold">{title}</h2>
        {cells.Description && <p className="text-sm text-foreground">{cells.Description}</p>}
        {DETAIL_FIELDS.map(([label, column]) => (
          <p key={column} className="text-sm">
            <span className="font-semibold">{label}:</span> {cells[column] ?? ''}
          </p>
        ))}
      </div>

      <div className="space-y-3">
        <label className="flex items-center gap-2 text-sm">
          <input
            type="checkbox"
            checked={row.seen}
            onChange={event => {
              const seen = event.target.checked
              onEdit(seen, seen ? currentDate ?? todayIsoDate() : undefined, row.notes)
            }}
          />
          Seen in my yard
        </label>

        {row.seen && (
          <label className="block space-y-1 text-sm" htmlFor={`${inputId}-date`}>
            <span>Date first seen</span>
            <input
              id={`${inputId}-date`}
              type="date"
              value={row.firstSeenDate}
              className="block w-full rounded-md border border-border bg-background px-2 py-1"
              onChange={event => onEdit(true, event.target.value || undefined, row.notes)}
            />
          </label>
        )}

        <label className="block space-y-1 text-sm" htmlFor={`${inputId}-notes`}>
          <span>Notes (where/how you saw it)</span>
          <textarea
            id={`${inputId}-notes`}
            value={row.notes}
            rows={3}
            className="block w-full rounded-md border border-border bg-background px-2 py-1"
            onChange={event => onEdit(row.seen, currentDate, event.target.value)}
          />
        </label>
      </div>
    </article>
  )
}
