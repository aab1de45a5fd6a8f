import type { HighlightSegment } from './types.js'

const PATTERN_SYNTAX = /[.*+?^${}()|[\]\\]/g

const HTML_ENTITIES: Record<string, string> = {
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;',
  '"': '&quot;',
  "'": '&#39;',
}

/** Backslash-escapes RegExp syntax so the result matches `input` literally. */
export function escapeForLiteralMatch(input: string): string {
  return input.replace(PATTERN_SYNTAX, '\\$&')
}

export function escapeHtml(input: string): string {
  return input.replace(/[&<>"']/g, (char) => HTML_ENTITIES[char] ?? char)
}

/**
 * Splits `text` around every case-insensitive occurrence of `query`.
 *
 * Matched segments keep the casing found in `text`; concatenating all
 * segment texts gives back `text`.
 */
export function highlightSegments(text: string, query: string): HighlightSegment[] {
  if (!text) return []
  if (!query) return [{ text, highlighted: false }]

  const matcher = new RegExp(`(${escapeForLiteralMatch(query)})`, 'gi')
  // with one capture group, odd indices are the matches
  return text
    .split(matcher)
    .map((part, index) => ({ text: part, highlighted: index % 2 === 1 }))
    .filter((segment) => segment.text.length > 0)
}

export function segmentsToHtml(segments: readonly HighlightSegment[]): string {
  return segments
    .map((segment) =>
      segment.highlighted ? `<mark>${escapeHtml(segment.text)}</mark>` : escapeHtml(segment.text)
    )
    .join('')
}

export function highlightHtml(text: string, query: string): string {
  return segmentsToHtml(highlightSegments(text, query))
}
