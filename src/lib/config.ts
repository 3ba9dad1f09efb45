import { DEFAULT_METADATA_TIMEOUT_MS } from './og-image'

export const DEFAULT_SIGHTINGS_TABLE = 'bird_sightings'
export const DEFAULT_SPECIES_CSV_PATH = '/birds_db.csv'

export interface SupabaseSettings {
  url: string
  anonKey: string
  table: string
}

export interface AppConfig {
  /** null when remote syncing is not configured */
  supabase: SupabaseSettings | null
  speciesCsvPath: string
  metadataTimeoutMs: number
}

export interface ConfigEnv {
  VITE_SUPABASE_URL?: string
  VITE_SUPABASE_ANON_KEY?: string
  VITE_SUPABASE_TABLE?: string
  VITE_SPECIES_CSV_PATH?: string
  VITE_METADATA_TIMEOUT_MS?: string
}

function readViteEnv(): ConfigEnv {
  return {
    VITE_SUPABASE_URL: import.meta.env.VITE_SUPABASE_URL,
    VITE_SUPABASE_ANON_KEY: import.meta.env.VITE_SUPABASE_ANON_KEY,
    VITE_SUPABASE_TABLE: import.meta.env.VITE_SUPABASE_TABLE,
    VITE_SPECIES_CSV_PATH: import.meta.env.VITE_SPECIES_CSV_PATH,
    VITE_METADATA_TIMEOUT_MS: import.meta.env.VITE_METADATA_TIMEOUT_MS,
  }
}

function readSupabaseSettings(env: ConfigEnv): SupabaseSettings | null {
  const url = env.VITE_SUPABASE_URL?.trim()
  const anonKey = env.VITE_SUPABASE_ANON_KEY?.trim()
  if (!url || !anonKey) return null

  try {
    new URL(url)
  } catch {
    console.warn(`[config] Ignoring invalid VITE_SUPABASE_URL "${url}"; syncing disabled.`)
    return null
  }

  return { url, anonKey, table: env.VITE_SUPABASE_TABLE?.trim() || DEFAULT_SIGHTINGS_TABLE }
}

function readTimeout(raw: string | undefined): number {
  if (!raw?.trim()) return DEFAULT_METADATA_TIMEOUT_MS
  const parsed = Number(raw)
  if (!Number.isFinite(parsed) || parsed <= 0) {
    console.warn(`[config] Ignoring invalid VITE_METADATA_TIMEOUT_MS "${raw}".`)
    return DEFAULT_METADATA_TIMEOUT_MS
  }
  return parsed
}

export function loadConfig(env: ConfigEnv = readViteEnv()): AppConfig {
  return {
    supabase: readSupabaseSettings(env),
    speciesCsvPath: env.VITE_SPECIES_CSV_PATH?.trim() || DEFAULT_SPECIES_CSV_PATH,
    metadataTimeoutMs: readTimeout(env.VITE_METADATA_TIMEOUT_MS),
  }
}
