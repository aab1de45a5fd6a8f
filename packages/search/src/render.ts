import { resolveSearchConfig } from './config.js'
import { escapeHtml, highlightSegments, segmentsToHtml } from './highlight.js'
import { SEARCH_MESSAGES } from './messages.js'
import type { SearchConfigInput } from './protocol.js'
import type { DisplayPayload, DocumentRecord, ResultEntry, SearchOutcome } from './types.js'

export const DEFAULT_SUMMARY_TOKEN_LIMIT = 5

export function summarizeKeywords(keywords: string, limit = DEFAULT_SUMMARY_TOKEN_LIMIT): string {
  return keywords
    .split(/\s+/)
    .filter((token) => token.length > 0)
    .slice(0, limit)
    .join(', ')
}

function toResultEntry(
  record: DocumentRecord,
  query: string,
  basePath: string,
  summaryTokenLimit: number
): ResultEntry {
  const entry: ResultEntry = {
    url: record.url,
    href: `${basePath}${record.url}`,
    title: highlightSegments(record.title, query),
    summary: summarizeKeywords(record.keywords, summaryTokenLimit),
  }
  if (record.chapter) entry.chapter = record.chapter
  return entry
}

/** The message shown before anything has been typed. */
export function idlePayload(options: SearchConfigInput = {}): DisplayPayload {
  const messages = SEARCH_MESSAGES[resolveSearchConfig(options).locale]
  return { kind: 'message', variant: 'idle', title: messages.promptTitle, hint: messages.idleHint }
}

export function render(outcome: SearchOutcome, options: SearchConfigInput = {}): DisplayPayload {
  const config = resolveSearchConfig(options)
  const messages = SEARCH_MESSAGES[config.locale]

  switch (outcome.type) {
    case 'prompt':
      return {
        kind: 'message',
        variant: 'prompt',
        title: messages.promptTitle,
        hint: messages.promptHint(config.minQueryLength),
      }
    case 'no-results':
      return {
        kind: 'message',
        variant: 'no-results',
        title: messages.noResultsTitle,
        hint: messages.noResultsHint,
      }
    case 'results':
      return {
        kind: 'results',
        query: outcome.query,
        entries: outcome.matches.map((record) =>
          toResultEntry(record, outcome.query, config.basePath, config.summaryTokenLimit)
        ),
      }
  }
}

/**
 * Serialises a payload for hosts that write `innerHTML` directly.
 * Every interpolated value is HTML-escaped.
 */
export function renderHtml(payload: DisplayPayload): string {
  if (payload.kind === 'message') {
    return (
      `<div class="search-empty">` +
      `<p>${escapeHtml(payload.title)}</p>` +
      `<p class="search-hint">${escapeHtml(payload.hint)}</p>` +
      `</div>`
    )
  }

  return payload.entries
    .map((entry) => {
      const chapter = entry.chapter
        ? `<span class="search-result-chapter">${escapeHtml(entry.chapter)}</span>`
        : ''
      return (
        `<a href="${escapeHtml(entry.href)}" class="search-result-item">` +
        chapter +
        `<span class="search-result-title">${segmentsToHtml(entry.title)}</span>` +
        `<span class="search-result-keywords">${escapeHtml(entry.summary)}</span>` +
        `</a>`
      )
    })
    .join('')
}
