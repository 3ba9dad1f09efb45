import type { FallbackProps } from 'react-error-boundary'
import { Button } from '@/components/ui/button'

export function ErrorFallback({ error, resetErrorBoundary }: FallbackProps) {
  const message = error instanceof Error ? error.message : String(error)

  return (
    <div className="min-h-screen flex items-center justify-center p-4">
      <div className="max-w-md w-full space-y-4 text-center">
        <h1 className="text-lg font-semibold">Something went wrong</h1>
        <pre className="text-xs text-muted-foreground bg-muted p-3 rounded-md overflow-auto max-h-32">
          {message}
        </pre>
        <Button variant="outline" onClick={resetErrorBoundary}>
          Try again
        </Button>
      </div>
    </div>
  )
}
