/**
 * Remote persistence for per-user observation state.
 *
 * Rows live in a Supabase table keyed by (user_id, species). When syncing is
 * not configured the disabled store stands in: it reads an empty overlay and
 * accepts writes without doing anything.
 */
import { createClient, type SupabaseClient } from '@supabase/supabase-js'
import type { SupabaseSettings } from './config'
import { err, errorMessage, ok, type Result } from './result'
import type { Overlay, OverlayEntry, UpdateRecord } from './types'

export type StoreOperation = 'fetchOverlay' | 'upsert'

export interface StoreError {
  operation: StoreOperation
  message: string
  speciesName?: string
}

export interface SightingStore {
  readonly enabled: boolean
  fetchOverlay(userId: string): Promise<Result<Overlay, StoreError>>
  upsert(record: UpdateRecord): Promise<Result<void, StoreError>>
}

/** Table row shape; column names match supabase/schema.sql */
export interface SightingRow {
  user_id: string
  species: string
  seen: boolean
  first_seen_date: string | null
  notes: string
  updated_at: string
}

type GatewayError = { message: string }

export interface SightingTableGateway {
  selectForUser(userId: string): Promise<{ data: unknown[] | null; error: GatewayError | null }>
  upsert(row: SightingRow): Promise<{ error: GatewayError | null }>
}

export const SIGHTING_CONFLICT_TARGET = 'user_id,species'

function isObject(value: unknown): value is Record<string, unknown> {
  return !!value && typeof value === 'object'
}

/**
 * Turn raw table rows into an overlay. Rows without a species are dropped and
 * mistyped fields read as "no value".
 */
export function parseOverlayRows(rows: readonly unknown[]): Map<string, OverlayEntry> {
  const overlay = new Map<string, OverlayEntry>()
  let dropped = 0

  for (const row of rows) {
    if (!isObject(row) || typeof row.species !== 'string' || !row.species.trim()) {
      dropped++
      continue
    }
    overlay.set(row.species, {
      seen: typeof row.seen === 'boolean' ? row.seen : null,
      firstSeenDate: typeof row.first_seen_date === 'string' ? row.first_seen_date : null,
      notes: typeof row.notes === 'string' ? row.notes : null,
    })
  }

  if (dropped > 0) {
    console.warn(`[sighting-store] Dropped ${dropped} malformed sighting row(s)`)
  }
  return overlay
}

export function toSightingRow(record: UpdateRecord): SightingRow {
  return {
    user_id: record.userId,
    species: record.speciesName,
    seen: record.seen,
    first_seen_date: record.firstSeenDate,
    notes: record.notes,
    updated_at: record.updatedAt,
  }
}

export class DisabledSightingStore implements SightingStore {
  readonly enabled = false

  async fetchOverlay(): Promise<Result<Overlay, StoreError>> {
    return ok(new Map())
  }

  async upsert(): Promise<Result<void, StoreError>> {
    return ok(undefined)
  }
}

export class RemoteSightingStore implements SightingStore {
  readonly enabled = true
  private readonly gateway: SightingTableGateway

  constructor(gateway: SightingTableGateway) {
    this.gateway = gateway
  }

  async fetchOverlay(userId: string): Promise<Result<Overlay, StoreError>> {
    try {
      const { data, error } = await this.gateway.selectForUser(userId)
      if (error) {
        console.warn(`[sighting-store] Failed to load sightings: ${error.message}`)
        return err({ operation: 'fetchOverlay', message: error.message })
      }
      return ok(parseOverlayRows(data ?? []))
    } catch (error) {
      console.warn('[sighting-store] Failed to load sightings', error)
      return err({ operation: 'fetchOverlay', message: errorMessage(error) })
    }
  }

  async upsert(record: UpdateRecord): Promise<Result<void, StoreError>> {
    try {
      const { error } = await this.gateway.upsert(toSightingRow(record))
      if (error) {
        return err({ operation: 'upsert', message: error.message, speciesName: record.speciesName })
      }
      return ok(undefined)
    } catch (error) {
      return err({ operation: 'upsert', message: errorMessage(error), speciesName: record.speciesName })
    }
  }
}

export function createSupabaseGateway(client: SupabaseClient, table: string): SightingTableGateway {
  return {
    async selectForUser(userId) {
      const { data, error } = await client
        .from(table)
        .select('species, seen, first_seen_date, notes')
        .eq('user_id', userId)
      return { data, error }
    },
    async upsert(row) {
      const { error } = await client.from(table).upsert(row, { onConflict: SIGHTING_CONFLICT_TARGET })
      return { error }
    },
  }
}

export function createSupabaseClient(settings: SupabaseSettings, fetchImpl?: typeof fetch): SupabaseClient {
  return createClient(settings.url, settings.anonKey, {
    auth: {
      persistSession: false,
      autoRefreshToken: false,
      detectSessionInUrl: false,
    },
    ...(fetchImpl ? { global: { fetch: fetchImpl } } : {}),
  })
}

export function createSightingStore(settings: SupabaseSettings | null, fetchImpl?: typeof fetch): SightingStore {
  if (!settings) return new DisabledSightingStore()
  return new RemoteSightingStore(createSupabaseGateway(createSupabaseClient(settings, fetchImpl), settings.table))
}

export interface PersistReport {
  saved: string[]
  failed: StoreError[]
}

/**
 * Upsert records one at a time. A failed record is reported and the rest are
 * still attempted.
 */
export async function persistUpdates(
  store: SightingStore,
  records: readonly UpdateRecord[]
): Promise<PersistReport> {
  const report: PersistReport = { saved: [], failed: [] }
  if (!store.enabled) return report

  for (const record of records) {
    const result = await store.upsert(record)
    if (result.ok) {
      report.saved.push(record.speciesName)
    } else {
      console.warn(`[sighting-store] Upsert failed for "${record.speciesName}": ${result.error.message}`)
      report.failed.push(result.error)
    }
  }

  return report
}
