import { useSyncExternalStore } from 'react'
import type { SearchController, SearchControllerState } from './search-controller'

export function useSearchController(controller: SearchController): SearchControllerState {
  return useSyncExternalStore(
    (cb) => controller.subscribe(cb),
    () => controller.getSnapshot()
  )
}
