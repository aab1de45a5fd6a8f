import {
  idlePayload,
  render,
  search,
  type DisplayPayload,
  type SearchConfig,
  type SearchIndex,
} from '@chapter-search/search'
import { useMemo } from 'react'

/**
 * `null` means nothing has been typed since the overlay opened, which shows
 * the idle hint instead of the short-query prompt.
 */
export function useChapterSearch(
  index: SearchIndex,
  query: string | null,
  config: SearchConfig
): DisplayPayload {
  return useMemo(() => {
    if (query === null) return idlePayload(config)
    return render(search(index, query, { minQueryLength: config.minQueryLength }), config)
  }, [index, query, config])
}
