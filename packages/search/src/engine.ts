import type {
  DocumentRecord,
  SearchIndex,
  SearchIndexEntry,
  SearchOptions,
  SearchOutcome,
} from './types.js'

export const DEFAULT_MIN_QUERY_LENGTH = 2

export function foldCase(input: string): string {
  return input.toLowerCase()
}

export function toSearchIndexEntry(record: DocumentRecord): SearchIndexEntry {
  return Object.freeze({
    record: Object.freeze({ ...record }),
    foldedTitle: foldCase(record.title),
    foldedKeywords: foldCase(record.keywords),
  })
}

/** Builds the read-only index once; entry order is result order. */
export function createSearchIndex(records: readonly DocumentRecord[]): SearchIndex {
  return Object.freeze({
    entries: Object.freeze(records.map(toSearchIndexEntry)),
  })
}

export function isEntryMatch(entry: SearchIndexEntry, needle: string): boolean {
  return entry.foldedTitle.includes(needle) || entry.foldedKeywords.includes(needle)
}

export function search(
  index: SearchIndex,
  query: string,
  options: SearchOptions = {}
): SearchOutcome {
  const minQueryLength = options.minQueryLength ?? DEFAULT_MIN_QUERY_LENGTH
  // the raw length decides, whitespace included
  if (query.length === 0 || query.length < minQueryLength) {
    return { type: 'prompt' }
  }

  const needle = foldCase(query)
  const matches: DocumentRecord[] = []

  for (const entry of index.entries) {
    if (isEntryMatch(entry, needle)) matches.push(entry.record)
  }

  if (matches.length === 0) {
    return { type: 'no-results', query }
  }

  return { type: 'results', query, matches }
}
