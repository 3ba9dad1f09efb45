import { useState, useEffect } from 'react'
import { resolveSpeciesImage } from '@/lib/og-image'
import { describeFetchError } from '@/lib/result'
import type { SpeciesRecord } from '@/lib/types'

/**
 * Hook to resolve the photo for a species row.
 * Returns undefined while loading and when no image could be found.
 */
export function useSpeciesImage(record: SpeciesRecord, timeoutMs?: number): {
  imageUrl: string | undefined
  loading: boolean
} {
  const [imageUrl, setImageUrl] = useState<string | undefined>()
  const [loading, setLoading] = useState(true)

  useEffect(() => {
    let cancelled = false
    setLoading(true)

    void resolveSpeciesImage(record, { timeoutMs }).then(result => {
      if (cancelled) return
      if (result.ok) {
        setImageUrl(result.value)
      } else {
        console.warn(`[og-image] ${describeFetchError(result.error)}`)
        setImageUrl(undefined)
      }
      setLoading(false)
    })

    return () => { cancelled = true }
  }, [record, timeoutMs])

  return { imageUrl, loading }
}
