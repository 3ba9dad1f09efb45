import type { AppConfig } from './config'
import { createSightingStore, type SightingStore } from './sighting-store'

/** Everything one browser session needs; passed down instead of module-level singletons. */
export interface SessionContext {
  userId: string
  store: SightingStore
  config: AppConfig
}

export function createSession(
  config: AppConfig,
  userId: string,
  store: SightingStore = createSightingStore(config.supabase)
): SessionContext {
  return { userId, store, config }
}
