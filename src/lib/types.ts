export const SPECIES_COLUMN = 'Species'
export const SEEN_COLUMN = 'Seen?'
export const DATE_COLUMN = 'Date first seen'
export const NOTES_COLUMN = 'Notes'
export const PHOTO_COLUMN = 'Photo (link)'
export const SOURCE_COLUMN = 'Source'
export const IMAGE_URL_COLUMN = 'Image URL'

/** Columns the tracker writes back to; created empty when a dataset omits them. */
export const OBSERVATION_COLUMNS = [SEEN_COLUMN, DATE_COLUMN, NOTES_COLUMN] as const

/** Observation cells exactly as a dataset stores them ("Yes" or "" for seen). */
export interface StoredObservation {
  seen: string
  firstSeenDate: string
  notes: string
}

/**
 * One species from the reference dataset. `cells` holds every column keyed by
 * header so export can write the row back untouched.
 */
export interface SpeciesRecord {
  speciesName: string
  cells: Readonly<Record<string, string>>
  stored: StoredObservation
}

export interface SpeciesDataset {
  headers: string[]
  records: SpeciesRecord[]
}

export interface ObservationState {
  seen: boolean
  /** YYYY-MM-DD, empty when not seen */
  firstSeenDate: string
  notes: string
}

export interface UnifiedRow extends ObservationState {
  speciesName: string
  record: SpeciesRecord
}

/** Observation state as read back from the remote store. Any field may be missing. */
export interface OverlayEntry {
  seen?: boolean | null
  firstSeenDate?: string | null
  notes?: string | null
}

export type Overlay = ReadonlyMap<string, OverlayEntry>

export interface UpdateRecord {
  userId: string
  speciesName: string
  seen: boolean
  firstSeenDate: string | null
  notes: string
  updatedAt: string
}

export interface SightingSummary {
  total: number
  seen: number
  unseen: number
}
