export { resolveBasePath, resolveSearchConfig } from './config.js'

export {
  createSearchIndex,
  DEFAULT_MIN_QUERY_LENGTH,
  foldCase,
  isEntryMatch,
  search,
  toSearchIndexEntry,
} from './engine.js'

export {
  escapeForLiteralMatch,
  escapeHtml,
  highlightHtml,
  highlightSegments,
  segmentsToHtml,
} from './highlight.js'

export { parseSearchManifest, SearchManifestError } from './manifest.js'

export { SEARCH_MESSAGES, type SearchMessages } from './messages.js'

export {
  DocumentRecordSchema,
  SearchConfigSchema,
  SearchLocaleSchema,
  SearchManifestSchema,
  type DocumentRecordInput,
  type SearchConfig,
  type SearchConfigInput,
  type SearchLocale,
  type SearchManifest,
} from './protocol.js'

export {
  DEFAULT_SUMMARY_TOKEN_LIMIT,
  idlePayload,
  render,
  renderHtml,
  summarizeKeywords,
} from './render.js'

export type {
  DisplayPayload,
  DocumentRecord,
  HighlightSegment,
  MessageVariant,
  ResultEntry,
  SearchIndex,
  SearchIndexEntry,
  SearchOptions,
  SearchOutcome,
} from './types.js'
