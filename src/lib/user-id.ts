const USER_ID_KEY = 'backyard_birds_user_id'

type StorageLike = Pick<Storage, 'getItem' | 'setItem'>

function readStoredId(storage: StorageLike): string | null {
  const stored = storage.getItem(USER_ID_KEY)?.trim()
  return stored ? stored : null
}

/**
 * Anonymous identifier for this browser. Sightings are stored under it, so it
 * must survive reloads; storage failures fall back to a fresh per-load ID.
 */
export function getStableUserId(storage?: StorageLike): string {
  try {
    const target = storage ?? window.localStorage
    const existing = readStoredId(target)
    if (existing) return existing

    const generated = crypto.randomUUID()
    target.setItem(USER_ID_KEY, generated)
    return generated
  } catch (error) {
    console.warn('[user-id] localStorage unavailable; using a temporary user id', error)
    return crypto.randomUUID()
  }
}
