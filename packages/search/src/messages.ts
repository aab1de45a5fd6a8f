import type { SearchLocale } from './protocol.js'

export interface SearchMessages {
  placeholder: string
  promptTitle: string
  promptHint: (minQueryLength: number) => string
  idleHint: string
  noResultsTitle: string
  noResultsHint: string
  closeLabel: string
}

export const SEARCH_MESSAGES: Record<SearchLocale, SearchMessages> = {
  ru: {
    placeholder: 'Поиск по книге...',
    promptTitle: 'Введите запрос для поиска',
    promptHint: (n) => `Минимум ${n} символа`,
    idleHint: 'Поиск по названиям глав и ключевым словам',
    noResultsTitle: 'Ничего не найдено',
    noResultsHint: 'Попробуйте другой запрос',
    closeLabel: 'Закрыть поиск',
  },
  en: {
    placeholder: 'Search the book...',
    promptTitle: 'Type to search',
    promptHint: (n) => `Minimum ${n} characters`,
    idleHint: 'Search chapter titles and keywords',
    noResultsTitle: 'Nothing found',
    noResultsHint: 'Try another query',
    closeLabel: 'Close search',
  },
}
