export interface DocumentRecord {
  title: string
  url: string
  /** Space-delimited search terms */
  keywords: string
  /** Short label shown above the title, never matched */
  chapter?: string
}

export interface SearchIndexEntry {
  record: DocumentRecord
  foldedTitle: string
  foldedKeywords: string
}

export interface SearchIndex {
  readonly entries: readonly SearchIndexEntry[]
}

export interface SearchOptions {
  minQueryLength?: number
}

export type SearchOutcome =
  | { type: 'prompt' }
  | { type: 'no-results'; query: string }
  | { type: 'results'; query: string; matches: readonly DocumentRecord[] }

export interface HighlightSegment {
  text: string
  highlighted: boolean
}

export interface ResultEntry {
  url: string
  href: string
  chapter?: string
  title: HighlightSegment[]
  summary: string
}

export type MessageVariant = 'idle' | 'prompt' | 'no-results'

export type DisplayPayload =
  | { kind: 'message'; variant: MessageVariant; title: string; hint: string }
  | { kind: 'results'; query: string; entries: ResultEntry[] }
