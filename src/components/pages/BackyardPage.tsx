import { useState } from 'react'
import { Bird, CloudArrowUp, DownloadSimple, Eraser, Eye } from '@phosphor-icons/react'
import { Button } from '@/components/ui/button'
import { EmptyState } from '@/components/ui/empty-state'
import { SightingRow } from '@/components/ui/sighting-row'
import { StatCard } from '@/components/ui/stat-card'
import { useSightings } from '@/hooks/use-sightings'
import type { SessionContext } from '@/lib/session'

interface BackyardPageProps {
  session: SessionContext
}

export default function BackyardPage({ session }: BackyardPageProps) {
  const sightings = useSightings(session)
  const [pathDraft, setPathDraft] = useState(sightings.dataPath)

  const commitPath = () => {
    const next = pathDraft.trim()
    if (next && next !== sightings.dataPath) sightings.setDataPath(next)
  }

  return (
    <div className="mx-auto max-w-6xl px-4 sm:px-6 py-8 space-y-6">
      <header className="space-y-1">
        <h1 className="font-serif text-3xl font-bold">🕊️ Port Orchard Backyard Birds Tracker</h1>
        <p className="text-sm text-muted-foreground">
          Photos © their respective sources. Source links go to Audubon / All About Birds pages.
        </p>
      </header>

      <div className="flex flex-col gap-3 md:flex-row md:items-end md:justify-between">
        <label className="block space-y-1 text-sm md:w-96" htmlFor="data-path">
          <span>CSV data path</span>
          <input
            id="data-path"
            value={pathDraft}
            className="block w-full rounded-md border border-border bg-background px-2 py-1"
            onChange={event => setPathDraft(event.target.value)}
            onBlur={commitPath}
            onKeyDown={event => {
              if (event.key === 'Enter') commitPath()
            }}
          />
        </label>
        <div className="flex flex-wrap gap-2">
          <Button variant="outline" onClick={sightings.markAllSeen} disabled={sightings.rows.length === 0}>
            <Eye size={16} /> Mark all as seen (today)
          </Button>
          <Button variant="outline" onClick={sightings.clearAll} disabled={sightings.rows.length === 0}>
            <Eraser size={16} /> Clear all seen/dates
          </Button>
        </div>
      </div>

      <div className="grid grid-cols-3 gap-3">
        <StatCard value={sightings.summary.total} label="Species" />
        <StatCard value={sightings.summary.seen} label="Seen" accent="text-primary" />
        <StatCard value={sightings.summary.unseen} label="Still to spot" />
      </div>

      {sightings.isLoading ? (
        <p className="text-sm text-muted-foreground">Loading species…</p>
      ) : sightings.rows.length === 0 ? (
        <EmptyState icon={Bird} title="No species loaded" description={`Nothing found at ${sightings.dataPath}.`} />
      ) : (
        <section>
          {sightings.rows.map((row, index) => (
            <SightingRow
              key={`${index}-${row.speciesName}`}
              row={row}
              metadataTimeoutMs={session.config.metadataTimeoutMs}
              onEdit={(seen, firstSeenDate, notes) => sightings.editRow(index, seen, firstSeenDate, notes)}
            />
          ))}
        </section>
      )}

      <footer className="flex flex-col gap-3 border-t border-border pt-6 md:flex-row md:items-center">
        {sightings.syncEnabled ? (
          <>
            <Button onClick={() => void sightings.sync()} disabled={sightings.isSyncing || sightings.changedCount === 0}>
              <CloudArrowUp size={16} /> Sync to Supabase
              {sightings.changedCount > 0 && ` (${sightings.changedCount})`}
            </Button>
            <Button variant="ghost" onClick={() => void sightings.sync('all')} disabled={sightings.isSyncing}>
              Re-send all
            </Button>
          </>
        ) : (
          <p className="text-sm text-muted-foreground">
            Supabase syncing is disabled. Set VITE_SUPABASE_URL and VITE_SUPABASE_ANON_KEY to enable.
          </p>
        )}
        <Button variant="outline" onClick={sightings.exportCsv} disabled={sightings.rows.length === 0}>
          <DownloadSimple size={16} /> Download updated CSV
        </Button>
      </footer>
    </div>
  )
}
