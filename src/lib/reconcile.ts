import type {
  ObservationState,
  Overlay,
  OverlayEntry,
  SightingSummary,
  SpeciesRecord,
  UnifiedRow,
  UpdateRecord,
} from './types'

const EMPTY_OVERLAY: Overlay = new Map()

function isStoredSeen(value: string): boolean {
  return value.trim().toLowerCase() === 'yes'
}

/** Overlay text wins only when it is a non-empty string */
function overlayText(value: unknown): string | undefined {
  return typeof value === 'string' && value !== '' ? value : undefined
}

function mergeRow(record: SpeciesRecord, entry: OverlayEntry | undefined): UnifiedRow {
  // Field-level precedence: an empty or false overlay value never overrides the
  // dataset, so a stored "Yes" cannot be cleared through the overlay alone.
  const seen = entry?.seen === true || isStoredSeen(record.stored.seen)
  return {
    speciesName: record.speciesName,
    record,
    seen,
    firstSeenDate: overlayText(entry?.firstSeenDate) ?? record.stored.firstSeenDate,
    notes: overlayText(entry?.notes) ?? record.stored.notes,
  }
}

/**
 * Joins the reference dataset with a user's overlay on species name.
 * One row per reference record, in reference order; overlay entries for
 * species missing from the dataset are ignored.
 */
export function buildUnifiedView(
  reference: readonly SpeciesRecord[],
  overlay: Overlay = EMPTY_OVERLAY
): UnifiedRow[] {
  return reference.map(record => mergeRow(record, overlay.get(record.speciesName)))
}

/**
 * Replaces a row's observation state with exactly the given values.
 * The date is dropped whenever `seen` is false.
 */
export function applyUserEdit(
  row: UnifiedRow,
  seen: boolean,
  firstSeenDate: string | undefined,
  notes: string
): UnifiedRow {
  return {
    ...row,
    seen,
    firstSeenDate: seen ? firstSeenDate ?? '' : '',
    notes,
  }
}

function toUpdateRecord(row: UnifiedRow, userId: string, updatedAt: string): UpdateRecord {
  return {
    userId,
    speciesName: row.speciesName,
    seen: row.seen,
    firstSeenDate: row.seen && row.firstSeenDate ? row.firstSeenDate : null,
    notes: row.notes,
    updatedAt,
  }
}

/** One update record per row, changed or not. */
export function diffForPersist(
  rows: readonly UnifiedRow[],
  userId: string,
  now: Date = new Date()
): UpdateRecord[] {
  const updatedAt = now.toISOString()
  return rows.map(row => toUpdateRecord(row, userId, updatedAt))
}

function sameObservation(a: ObservationState, b: ObservationState): boolean {
  return a.seen === b.seen && a.firstSeenDate === b.firstSeenDate && a.notes === b.notes
}

/**
 * Update records for rows whose observation state differs from `baseline`
 * (the view as last loaded or synced). Rows missing from the baseline count
 * as changed.
 */
export function diffChangedForPersist(
  rows: readonly UnifiedRow[],
  baseline: readonly UnifiedRow[],
  userId: string,
  now: Date = new Date()
): UpdateRecord[] {
  const previous = new Map(baseline.map(row => [row.speciesName, row]))
  const updatedAt = now.toISOString()
  return rows
    .filter(row => {
      const before = previous.get(row.speciesName)
      return !before || !sameObservation(before, row)
    })
    .map(row => toUpdateRecord(row, userId, updatedAt))
}

export function toOverlay(rows: readonly UnifiedRow[]): Overlay {
  return new Map(
    rows.map(row => [
      row.speciesName,
      { seen: row.seen, firstSeenDate: row.firstSeenDate || null, notes: row.notes },
    ])
  )
}

/** Marks every species seen; first-seen dates already recorded are kept. */
export function markAllSeen(rows: readonly UnifiedRow[], today: string): UnifiedRow[] {
  return rows.map(row => applyUserEdit(row, true, row.firstSeenDate || today, row.notes))
}

/** Resets seen and first-seen date on every row. Notes stay. */
export function clearAllSightings(rows: readonly UnifiedRow[]): UnifiedRow[] {
  return rows.map(row => applyUserEdit(row, false, undefined, row.notes))
}

/**
 * Writes each row's observation state back into its record's stored cells.
 * Unseen rows never carry a date, even one the dataset stored.
 */
export function toSpeciesRecords(rows: readonly UnifiedRow[]): SpeciesRecord[] {
  return rows.map(row => ({
    ...row.record,
    stored: {
      seen: row.seen ? 'Yes' : '',
      firstSeenDate: row.seen ? row.firstSeenDate : '',
      notes: row.notes,
    },
  }))
}

export function summarizeSightings(rows: readonly UnifiedRow[]): SightingSummary {
  const seen = rows.filter(row => row.seen).length
  return { total: rows.length, seen, unseen: rows.length - seen }
}

/** Local calendar date as YYYY-MM-DD */
export function todayIsoDate(now: Date = new Date()): string {
  const pad = (n: number) => String(n).padStart(2, '0')
  return `${now.getFullYear()}-${pad(now.getMonth() + 1)}-${pad(now.getDate())}`
}
