import type { SearchController } from '../lib/search-controller'

declare global {
  interface Window {
    __CHAPTER_SEARCH__?: SearchController
  }
}

export {}
