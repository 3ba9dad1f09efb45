import { useMemo } from 'react'
import { Toaster } from 'sonner'
import BackyardPage from '@/components/pages/BackyardPage'
import { loadConfig } from '@/lib/config'
import { createSession } from '@/lib/session'
import { getStableUserId } from '@/lib/user-id'

function App() {
  const session = useMemo(() => createSession(loadConfig(), getStableUserId()), [])

  return (
    <>
      <BackyardPage session={session} />
      <Toaster position="bottom-center" richColors />
    </>
  )
}

export default App
