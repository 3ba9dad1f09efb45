export type Result<T, E> =
  | { ok: true; value: T }
  | { ok: false; error: E }

export function ok<T>(value: T): Result<T, never> {
  return { ok: true, value }
}

export function err<E>(error: E): Result<never, E> {
  return { ok: false, error }
}

/** Failure of a best-effort HTTP call made on behalf of the page. */
export type FetchError =
  | { kind: 'invalid-url'; url: string }
  | { kind: 'http'; url: string; status: number }
  | { kind: 'timeout'; url: string; timeoutMs: number }
  | { kind: 'network'; url: string; message: string }

export function describeFetchError(error: FetchError): string {
  switch (error.kind) {
    case 'invalid-url':
      return `Invalid URL "${error.url}"`
    case 'http':
      return `${error.url} responded with ${error.status}`
    case 'timeout':
      return `${error.url} did not respond within ${error.timeoutMs / 1000}s`
    case 'network':
      return `Could not reach ${error.url}: ${error.message}`
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}
