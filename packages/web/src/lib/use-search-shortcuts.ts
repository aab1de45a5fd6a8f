import { useEffect } from 'react'
import type { SearchController } from './search-controller'

/** Cmd/Ctrl+K opens the overlay, Escape closes it. */
export function useSearchShortcuts(controller: SearchController): void {
  useEffect(() => {
    const handleKeyDown = (event: KeyboardEvent) => {
      if ((event.metaKey || event.ctrlKey) && event.key.toLowerCase() === 'k') {
        event.preventDefault()
        controller.open()
        return
      }
      if (event.key === 'Escape') {
        controller.close()
      }
    }

    document.addEventListener('keydown', handleKeyDown)
    return () => document.removeEventListener('keydown', handleKeyDown)
  }, [controller])
}
