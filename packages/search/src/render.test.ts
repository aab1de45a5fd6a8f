import { describe, expect, it } from 'vitest'
import { createSearchIndex, search } from './engine.js'
import { idlePayload, render, renderHtml, summarizeKeywords } from './render.js'
import type { DocumentRecord } from './types.js'

const testing: DocumentRecord = {
  title: 'Testing Guide',
  url: 'chapters/11-testing.html',
  keywords: 'unit tests xctest mock',
}

describe('summarizeKeywords', () => {
  it('keeps the first five whitespace-delimited tokens', () => {
    expect(summarizeKeywords('a b c d e f g')).toBe('a, b, c, d, e')
    expect(summarizeKeywords('  swift   ui ')).toBe('swift, ui')
  })

  it('accepts a custom limit', () => {
    expect(summarizeKeywords('a b c', 2)).toBe('a, b')
  })

  it('degrades to an empty summary', () => {
    expect(summarizeKeywords('')).toBe('')
    expect(summarizeKeywords('   ')).toBe('')
  })
})

describe('render', () => {
  it('renders the short-query prompt', () => {
    expect(render({ type: 'prompt' })).toEqual({
      kind: 'message',
      variant: 'prompt',
      title: 'Введите запрос для поиска',
      hint: 'Минимум 2 символа',
    })
    expect(render({ type: 'prompt' }, { locale: 'en', minQueryLength: 3 })).toEqual({
      kind: 'message',
      variant: 'prompt',
      title: 'Type to search',
      hint: 'Minimum 3 characters',
    })
  })

  it('renders the empty-result message', () => {
    expect(render({ type: 'no-results', query: 'zzz' }, { locale: 'en' })).toEqual({
      kind: 'message',
      variant: 'no-results',
      title: 'Nothing found',
      hint: 'Try another query',
    })
  })

  it('renders matches with highlighted titles and summaries', () => {
    const outcome = search(createSearchIndex([testing]), 'test')

    expect(render(outcome, { basePath: '../' })).toEqual({
      kind: 'results',
      query: 'test',
      entries: [
        {
          url: 'chapters/11-testing.html',
          href: '../chapters/11-testing.html',
          title: [
            { text: 'Test', highlighted: true },
            { text: 'ing Guide', highlighted: false },
          ],
          summary: 'unit, tests, xctest, mock',
        },
      ],
    })
  })

  it('carries the chapter label when the record has one', () => {
    const payload = render({
      type: 'results',
      query: 'swift',
      matches: [{ title: 'Основы Swift', url: 'chapters/02.html', keywords: '', chapter: 'Глава 2' }],
    })

    expect(payload.kind === 'results' ? payload.entries[0]?.chapter : undefined).toBe('Глава 2')
    expect(payload.kind === 'results' ? payload.entries[0]?.summary : undefined).toBe('')
  })

  it('leaves a title without an occurrence unmarked', () => {
    const payload = render({ type: 'results', query: 'xctest', matches: [testing] })

    expect(payload.kind === 'results' ? payload.entries[0]?.title : undefined).toEqual([
      { text: 'Testing Guide', highlighted: false },
    ])
  })
})

describe('idlePayload', () => {
  it('describes what can be searched', () => {
    expect(idlePayload()).toEqual({
      kind: 'message',
      variant: 'idle',
      title: 'Введите запрос для поиска',
      hint: 'Поиск по названиям глав и ключевым словам',
    })
  })
})

describe('renderHtml', () => {
  it('renders a message block', () => {
    expect(renderHtml(render({ type: 'no-results', query: 'zz' }, { locale: 'en' }))).toBe(
      '<div class="search-empty"><p>Nothing found</p><p class="search-hint">Try another query</p></div>'
    )
  })

  it('renders escaped result anchors', () => {
    const payload = render(
      {
        type: 'results',
        query: 'a &',
        matches: [{ title: 'A & B', url: 'x.html?a=1&b=2', keywords: 'one two', chapter: 'Глава 1' }],
      },
      { basePath: '../' }
    )

    expect(renderHtml(payload)).toBe(
      '<a href="../x.html?a=1&amp;b=2" class="search-result-item">' +
        '<span class="search-result-chapter">Глава 1</span>' +
        '<span class="search-result-title"><mark>A &amp;</mark> B</span>' +
        '<span class="search-result-keywords">one, two</span>' +
        '</a>'
    )
  })
})
