import { createSearchIndex, parseSearchManifest, type SearchIndex } from '@chapter-search/search'
import androidManifest from '../books/android.json'
import iosManifest from '../books/ios.json'
import swiftuiManifest from '../books/swiftui.json'

export const BOOK_IDS = ['ios', 'swiftui', 'android'] as const

export type BookId = (typeof BOOK_IDS)[number]

const MANIFESTS: Record<BookId, unknown> = {
  ios: iosManifest,
  swiftui: swiftuiManifest,
  android: androidManifest,
}

const indexCache = new Map<BookId, SearchIndex>()

export function isBookId(value: string): value is BookId {
  return BOOK_IDS.some((id) => id === value)
}

/** Validates the bundled manifest on first use and reuses the index afterwards. */
export function getBookIndex(book: BookId): SearchIndex {
  const cached = indexCache.get(book)
  if (cached) return cached

  const index = createSearchIndex(parseSearchManifest(MANIFESTS[book]))
  indexCache.set(book, index)
  return index
}
