import { afterEach, beforeEach, describe, expect, test, vi } from 'vitest'

import { getStableUserId } from '@/lib/user-id'

function createStorage(initial: Record<string, string> = {}) {
  const data = new Map(Object.entries(initial))
  return {
    getItem: (key: string) => data.get(key) ?? null,
    setItem: (key: string, value: string) => {
      data.set(key, value)
    },
  }
}

const UUID_SHAPE = /^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/

describe('getStableUserId', () => {
  beforeEach(() => {
    vi.spyOn(console, 'warn').mockImplementation(() => {})
  })

  afterEach(() => {
    vi.restoreAllMocks()
  })

  test('uses the persisted ID when present', () => {
    const storage = createStorage({ backyard_birds_user_id: 'stored-user' })
    expect(getStableUserId(storage)).toBe('stored-user')
  })

  test('generates a random UUID and persists it when missing', () => {
    const storage = createStorage()
    const first = getStableUserId(storage)
    const second = getStableUserId(storage)

    expect(first).toMatch(UUID_SHAPE)
    expect(second).toBe(first)
    expect(storage.getItem('backyard_birds_user_id')).toBe(first)
  })

  test('gives separate browsers separate IDs', () => {
    expect(getStableUserId(createStorage())).not.toBe(getStableUserId(createStorage()))
  })

  test('regenerates when the persisted value is blank', () => {
    const storage = createStorage({ backyard_birds_user_id: '  ' })
    const id = getStableUserId(storage)
    expect(id).toMatch(UUID_SHAPE)
    expect(storage.getItem('backyard_birds_user_id')).toBe(id)
  })

  test('still returns an ID when storage throws', () => {
    const storage = {
      getItem: () => {
        throw new Error('SecurityError')
      },
      setItem: () => {},
    }
    expect(getStableUserId(storage)).toMatch(UUID_SHAPE)
    expect(console.warn).toHaveBeenCalledWith(
      '[user-id] localStorage unavailable; using a temporary user id',
      expect.any(Error)
    )
  })
})
