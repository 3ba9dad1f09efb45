/**
 * Best-effort lookup of a species photo from the pages the dataset links to.
 * Reads the OpenGraph (`og:image`) or Twitter card image of a page. Failures
 * come back as a FetchError so the page can decide how to degrade.
 */
import { IMAGE_URL_COLUMN, PHOTO_COLUMN, SOURCE_COLUMN, type SpeciesRecord } from './types'
import { err, errorMessage, ok, type FetchError, type Result } from './result'

export const DEFAULT_METADATA_TIMEOUT_MS = 10_000

const imageCache = new Map<string, string | null>()
const imageInFlight = new Map<string, Promise<Result<string | undefined, FetchError>>>()

export interface OgImageOptions {
  timeoutMs?: number
  fetchImpl?: typeof fetch
}

const META_TAG = /<meta\b[^>]*>/gi
const ATTRIBUTE = /([^\s"'=<>/]+)\s*=\s*(?:"([^"]*)"|'([^']*)'|([^\s"'>]+))/g

function decodeEntities(value: string): string {
  return value
    .replace(/&quot;/g, '"')
    .replace(/&#39;|&apos;/g, "'")
    .replace(/&lt;/g, '<')
    .replace(/&gt;/g, '>')
    .replace(/&amp;/g, '&')
}

function parseAttributes(tag: string): Map<string, string> {
  const attributes = new Map<string, string>()
  for (const match of tag.matchAll(ATTRIBUTE)) {
    const value = match[2] ?? match[3] ?? match[4] ?? ''
    attributes.set(match[1].toLowerCase(), decodeEntities(value))
  }
  return attributes
}

/** Image URL from og:image, falling back to twitter:image */
export function extractOgImage(html: string): string | undefined {
  const found = new Map<string, string>()

  for (const [tag] of html.matchAll(META_TAG)) {
    const attributes = parseAttributes(tag)
    const key = (attributes.get('property') ?? attributes.get('name'))?.toLowerCase()
    const content = attributes.get('content')?.trim()
    if (!key || !content || found.has(key)) continue
    found.set(key, content)
  }

  return found.get('og:image') ?? found.get('twitter:image')
}

function isTimeout(error: unknown): boolean {
  return error instanceof Error && (error.name === 'TimeoutError' || error.name === 'AbortError')
}

async function lookupOgImage(
  url: string,
  timeoutMs: number,
  fetchImpl: typeof fetch
): Promise<Result<string | undefined, FetchError>> {
  try {
    const res = await fetchImpl(url, {
      signal: AbortSignal.timeout(timeoutMs),
    })
    if (!res.ok) {
      return err({ kind: 'http', url, status: res.status })
    }
    return ok(extractOgImage(await res.text()))
  } catch (error) {
    if (isTimeout(error)) return err({ kind: 'timeout', url, timeoutMs })
    return err({ kind: 'network', url, message: errorMessage(error) })
  }
}

/**
 * Fetch a page and return its preview image. Hits and misses are cached per
 * URL; errors are not, so a later render retries.
 */
export async function fetchOgImage(
  url: string,
  options: OgImageOptions = {}
): Promise<Result<string | undefined, FetchError>> {
  const { timeoutMs = DEFAULT_METADATA_TIMEOUT_MS, fetchImpl = fetch } = options

  try {
    const protocol = new URL(url).protocol
    if (protocol !== 'http:' && protocol !== 'https:') return err({ kind: 'invalid-url', url })
  } catch {
    return err({ kind: 'invalid-url', url })
  }

  if (imageCache.has(url)) {
    return ok(imageCache.get(url) ?? undefined)
  }

  const inFlight = imageInFlight.get(url)
  if (inFlight) return inFlight

  const lookupPromise = lookupOgImage(url, timeoutMs, fetchImpl).then(result => {
    if (result.ok) imageCache.set(url, result.value ?? null)
    return result
  })

  imageInFlight.set(url, lookupPromise)
  try {
    return await lookupPromise
  } finally {
    imageInFlight.delete(url)
  }
}

/**
 * Photo for a species: the dataset's own Image URL when present, otherwise the
 * preview image of the photo page, otherwise of the source page.
 */
export async function resolveSpeciesImage(
  record: SpeciesRecord,
  options: OgImageOptions = {}
): Promise<Result<string | undefined, FetchError>> {
  const direct = record.cells[IMAGE_URL_COLUMN]?.trim()
  if (direct) return ok(direct)

  const photoPage = record.cells[PHOTO_COLUMN]?.trim()
  if (photoPage) return fetchOgImage(photoPage, options)

  const sourcePage = record.cells[SOURCE_COLUMN]?.trim()
  if (sourcePage) return fetchOgImage(sourcePage, options)

  return ok(undefined)
}
