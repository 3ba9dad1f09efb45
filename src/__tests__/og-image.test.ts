import { describe, it, expect, vi } from 'vitest'
import { extractOgImage, fetchOgImage, resolveSpeciesImage } from '@/lib/og-image'
import type { SpeciesRecord } from '@/lib/types'

function htmlPage(head: string) {
  return `<!doctype html><html><head>${head}</head><body></body></html>`
}

function pageResponse(head: string) {
  return new Response(htmlPage(head), { status: 200, headers: { 'Content-Type': 'text/html' } })
}

function record(cells: Record<string, string>): SpeciesRecord {
  return {
    speciesName: 'Test Bird',
    cells: { Species: 'Test Bird', ...cells },
    stored: { seen: '', firstSeenDate: '', notes: '' },
  }
}

describe('extractOgImage', () => {
  it('reads og:image from a property attribute', () => {
    const html = htmlPage('<meta property="og:image" content="https://cdn.example.org/robin.jpg">')
    expect(extractOgImage(html)).toBe('https://cdn.example.org/robin.jpg')
  })

  it('accepts og:image declared with name and attributes in any order', () => {
    const html = htmlPage("<meta content='https://cdn.example.org/jay.jpg' name='og:image' />")
    expect(extractOgImage(html)).toBe('https://cdn.example.org/jay.jpg')
  })

  it('prefers og:image over twitter:image regardless of order', () => {
    const html = htmlPage([
      '<meta name="twitter:image" content="https://cdn.example.org/twitter.jpg">',
      '<meta property="og:image" content="https://cdn.example.org/og.jpg">',
    ].join(''))
    expect(extractOgImage(html)).toBe('https://cdn.example.org/og.jpg')
  })

  it('falls back to twitter:image', () => {
    const html = htmlPage('<meta property="twitter:image" content="https://cdn.example.org/card.jpg">')
    expect(extractOgImage(html)).toBe('https://cdn.example.org/card.jpg')
  })

  it('skips tags with empty content and decodes entities', () => {
    const html = htmlPage([
      '<meta property="og:image" content="  ">',
      '<meta name="twitter:image" content="https://cdn.example.org/a.jpg?w=600&amp;h=400">',
    ].join(''))
    expect(extractOgImage(html)).toBe('https://cdn.example.org/a.jpg?w=600&h=400')
  })

  it('returns undefined when the page has no preview image', () => {
    expect(extractOgImage(htmlPage('<meta name="description" content="A bird">'))).toBeUndefined()
  })
})

describe('fetchOgImage', () => {
  it('returns the preview image of the fetched page', async () => {
    const fetchImpl = vi.fn(async () => pageResponse('<meta property="og:image" content="https://cdn.example.org/1.jpg">'))

    const result = await fetchOgImage('https://birds.example.org/page-1', { fetchImpl })
    expect(result).toEqual({ ok: true, value: 'https://cdn.example.org/1.jpg' })
    expect(fetchImpl).toHaveBeenCalledTimes(1)
  })

  it('sends only a timeout signal, no browser-forbidden headers', async () => {
    const fetchImpl = vi.fn(async (_input: RequestInfo | URL, _init?: RequestInit) =>
      pageResponse('<meta property="og:image" content="https://cdn.example.org/8.jpg">')
    )

    await fetchOgImage('https://birds.example.org/page-8', { fetchImpl })
    expect(fetchImpl).toHaveBeenCalledWith('https://birds.example.org/page-8', { signal: expect.any(AbortSignal) })
  })

  it('caches hits per URL', async () => {
    const fetchImpl = vi.fn(async () => pageResponse('<meta property="og:image" content="https://cdn.example.org/2.jpg">'))

    await fetchOgImage('https://birds.example.org/page-2', { fetchImpl })
    const second = await fetchOgImage('https://birds.example.org/page-2', { fetchImpl })
    expect(second).toEqual({ ok: true, value: 'https://cdn.example.org/2.jpg' })
    expect(fetchImpl).toHaveBeenCalledTimes(1)
  })

  it('caches misses too', async () => {
    const fetchImpl = vi.fn(async () => pageResponse('<title>No image</title>'))

    await fetchOgImage('https://birds.example.org/page-3', { fetchImpl })
    const second = await fetchOgImage('https://birds.example.org/page-3', { fetchImpl })
    expect(second).toEqual({ ok: true, value: undefined })
    expect(fetchImpl).toHaveBeenCalledTimes(1)
  })

  it('shares one request between concurrent lookups', async () => {
    const fetchImpl = vi.fn(async () => pageResponse('<meta property="og:image" content="https://cdn.example.org/4.jpg">'))

    const [a, b] = await Promise.all([
      fetchOgImage('https://birds.example.org/page-4', { fetchImpl }),
      fetchOgImage('https://birds.example.org/page-4', { fetchImpl }),
    ])
    expect(a).toEqual(b)
    expect(fetchImpl).toHaveBeenCalledTimes(1)
  })

  it('reports HTTP errors without caching them', async () => {
    vi.spyOn(console, 'warn').mockImplementation(() => {})
    const fetchImpl = vi.fn()
      .mockResolvedValueOnce(new Response('gone', { status: 503 }))
      .mockResolvedValueOnce(pageResponse('<meta property="og:image" content="https://cdn.example.org/5.jpg">'))

    const first = await fetchOgImage('https://birds.example.org/page-5', { fetchImpl })
    expect(first).toEqual({ ok: false, error: { kind: 'http', url: 'https://birds.example.org/page-5', status: 503 } })

    const second = await fetchOgImage('https://birds.example.org/page-5', { fetchImpl })
    expect(second).toEqual({ ok: true, value: 'https://cdn.example.org/5.jpg' })
  })

  it('classifies timeouts', async () => {
    const fetchImpl = vi.fn(async () => {
      throw new DOMException('The operation timed out.', 'TimeoutError')
    })

    const result = await fetchOgImage('https://birds.example.org/page-6', { fetchImpl, timeoutMs: 250 })
    expect(result).toEqual({
      ok: false,
      error: { kind: 'timeout', url: 'https://birds.example.org/page-6', timeoutMs: 250 },
    })
  })

  it('classifies network failures', async () => {
    const fetchImpl = vi.fn(async () => {
      throw new TypeError('fetch failed')
    })

    const result = await fetchOgImage('https://birds.example.org/page-7', { fetchImpl })
    expect(result).toEqual({
      ok: false,
      error: { kind: 'network', url: 'https://birds.example.org/page-7', message: 'fetch failed' },
    })
  })

  it('rejects URLs that are not http(s) without fetching', async () => {
    const fetchImpl = vi.fn()

    expect(await fetchOgImage('not a url', { fetchImpl })).toEqual({
      ok: false,
      error: { kind: 'invalid-url', url: 'not a url' },
    })
    expect(await fetchOgImage('ftp://birds.example.org/x', { fetchImpl })).toEqual({
      ok: false,
      error: { kind: 'invalid-url', url: 'ftp://birds.example.org/x' },
    })
    expect(fetchImpl).not.toHaveBeenCalled()
  })
})

describe('resolveSpeciesImage', () => {
  it('uses the Image URL cell directly when present', async () => {
    const fetchImpl = vi.fn()

    const result = await resolveSpeciesImage(
      record({ 'Image URL': ' https://cdn.example.org/direct.jpg ', 'Photo (link)': 'https://birds.example.org/photo-a' }),
      { fetchImpl }
    )
    expect(result).toEqual({ ok: true, value: 'https://cdn.example.org/direct.jpg' })
    expect(fetchImpl).not.toHaveBeenCalled()
  })

  it('falls back to the photo page before the source page', async () => {
    const fetchImpl = vi.fn(async (_input: RequestInfo | URL) =>
      pageResponse('<meta property="og:image" content="https://cdn.example.org/photo-b.jpg">')
    )

    await resolveSpeciesImage(
      record({ 'Photo (link)': 'https://birds.example.org/photo-b', Source: 'https://birds.example.org/source-b' }),
      { fetchImpl }
    )
    expect(fetchImpl).toHaveBeenCalledTimes(1)
    expect(fetchImpl.mock.calls[0][0]).toBe('https://birds.example.org/photo-b')
  })

  it('uses the source page when there is no photo page', async () => {
    const fetchImpl = vi.fn(async () => pageResponse('<meta property="og:image" content="https://cdn.example.org/source-c.jpg">'))

    const result = await resolveSpeciesImage(record({ Source: 'https://birds.example.org/source-c' }), { fetchImpl })
    expect(result).toEqual({ ok: true, value: 'https://cdn.example.org/source-c.jpg' })
  })

  it('returns no image when the record links nowhere', async () => {
    expect(await resolveSpeciesImage(record({}))).toEqual({ ok: true, value: undefined })
  })
})
