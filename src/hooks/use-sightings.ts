import { useCallback, useEffect, useMemo, useRef, useState } from 'react'
import { toast } from 'sonner'
import {
  applyUserEdit,
  buildUnifiedView,
  clearAllSightings,
  diffChangedForPersist,
  diffForPersist,
  markAllSeen,
  summarizeSightings,
  toSpeciesRecords,
  todayIsoDate,
} from '@/lib/reconcile'
import { describeFetchError, errorMessage } from '@/lib/result'
import type { SessionContext } from '@/lib/session'
import { persistUpdates, type PersistReport } from '@/lib/sighting-store'
import { downloadCsv, exportSpeciesCsv, loadSpeciesDataset } from '@/lib/species-csv'
import type { Overlay, SpeciesDataset, UnifiedRow } from '@/lib/types'

export type SightingsState = ReturnType<typeof useSightings>

/** 'changed' sends rows edited since the last load or sync; 'all' re-sends every row */
export type SyncMode = 'changed' | 'all'

export function useSightings(session: SessionContext) {
  const [dataPath, setDataPath] = useState(session.config.speciesCsvPath)
  const [dataset, setDataset] = useState<SpeciesDataset | null>(null)
  const [rows, setRows] = useState<UnifiedRow[]>([])
  const [baseline, setBaseline] = useState<UnifiedRow[]>([])
  const [isLoading, setIsLoading] = useState(true)
  const [isSyncing, setIsSyncing] = useState(false)

  const rowsRef = useRef(rows)
  useEffect(() => {
    rowsRef.current = rows
  }, [rows])

  useEffect(() => {
    let cancelled = false
    setIsLoading(true)

    const load = async () => {
      const [datasetResult, overlayResult] = await Promise.all([
        loadSpeciesDataset(dataPath),
        session.store.fetchOverlay(session.userId),
      ])
      if (cancelled) return

      if (!datasetResult.ok) {
        toast.error(`Could not load species data: ${describeFetchError(datasetResult.error)}`)
        setDataset(null)
        setRows([])
        setBaseline([])
        setIsLoading(false)
        return
      }

      let overlay: Overlay = new Map()
      if (overlayResult.ok) {
        overlay = overlayResult.value
      } else {
        toast.warning(`Saved sightings unavailable (${overlayResult.error.message}). Showing the dataset only.`)
      }

      const view = buildUnifiedView(datasetResult.value.records, overlay)
      setDataset(datasetResult.value)
      setRows(view)
      setBaseline(view)
      setIsLoading(false)
    }

    load().catch((error: unknown) => {
      if (cancelled) return
      console.error('[use-sightings] Failed to load sightings', error)
      toast.error(`Could not load sightings: ${errorMessage(error)}`)
      setIsLoading(false)
    })

    return () => {
      cancelled = true
    }
  }, [dataPath, session])

  const editRow = useCallback((index: number, seen: boolean, firstSeenDate: string | undefined, notes: string) => {
    setRows(current => current.map((row, i) => (i === index ? applyUserEdit(row, seen, firstSeenDate, notes) : row)))
  }, [])

  const markAll = useCallback(() => {
    setRows(current => markAllSeen(current, todayIsoDate()))
  }, [])

  const clearAll = useCallback(() => {
    setRows(current => clearAllSightings(current))
  }, [])

  const changedCount = useMemo(
    () => diffChangedForPersist(rows, baseline, session.userId).length,
    [rows, baseline, session.userId]
  )

  const summary = useMemo(() => summarizeSightings(rows), [rows])

  const sync = useCallback(async (mode: SyncMode = 'changed'): Promise<PersistReport> => {
    const snapshot = rowsRef.current
    const records = mode === 'all'
      ? diffForPersist(snapshot, session.userId)
      : diffChangedForPersist(snapshot, baseline, session.userId)

    if (!session.store.enabled || records.length === 0) {
      if (session.store.enabled) toast.info('Nothing new to sync')
      return { saved: [], failed: [] }
    }

    setIsSyncing(true)
    const report = await persistUpdates(session.store, records)
    setIsSyncing(false)

    const saved = new Set(report.saved)
    const synced = new Map(snapshot.filter(row => saved.has(row.speciesName)).map(row => [row.speciesName, row]))
    setBaseline(current => current.map(row => synced.get(row.speciesName) ?? row))

    if (report.failed.length > 0) {
      const names = report.failed.map(failure => failure.speciesName).join(', ')
      toast.warning(`${report.failed.length} of ${records.length} species failed to sync: ${names}`)
    } else {
      toast.success(`Synced ${report.saved.length} species`)
    }
    return report
  }, [baseline, session])

  const exportCsv = useCallback(() => {
    if (!dataset) return
    downloadCsv(exportSpeciesCsv(dataset, toSpeciesRecords(rowsRef.current)))
  }, [dataset])

  return {
    dataPath,
    setDataPath,
    rows,
    summary,
    changedCount,
    isLoading,
    isSyncing,
    syncEnabled: session.store.enabled,
    editRow,
    markAllSeen: markAll,
    clearAll,
    sync,
    exportCsv,
  }
}
