import { SEARCH_MESSAGES, type SearchConfig, type SearchIndex } from '@chapter-search/search'
import { HighlightedText } from '@/components/highlighted-text'
import type { SearchController } from '@/lib/search-controller'
import { useChapterSearch } from '@/lib/use-chapter-search'
import { useSearchController } from '@/lib/use-search-controller'
import { useSearchShortcuts } from '@/lib/use-search-shortcuts'
import { Search } from 'lucide-react'
import { useEffect, useRef, useState, type KeyboardEvent } from 'react'

interface SearchDialogProps {
  controller: SearchController
  index: SearchIndex
  config: SearchConfig
}

export function SearchDialog({ controller, index, config }: SearchDialogProps) {
  const { open } = useSearchController(controller)
  const [query, setQuery] = useState<string | null>(null)
  const inputRef = useRef<HTMLInputElement>(null)
  const resultsRef = useRef<HTMLDivElement>(null)
  const payload = useChapterSearch(index, query, config)
  const messages = SEARCH_MESSAGES[config.locale]

  useSearchShortcuts(controller)

  useEffect(() => {
    if (!open) {
      setQuery(null)
      return
    }

    inputRef.current?.focus()
    const previousOverflow = document.body.style.overflow
    document.body.style.overflow = 'hidden'
    return () => {
      document.body.style.overflow = previousOverflow
    }
  }, [open])

  const handleArrowKeys = (event: KeyboardEvent<HTMLDivElement>) => {
    if (event.key !== 'ArrowDown' && event.key !== 'ArrowUp') return
    event.preventDefault()

    const items: HTMLAnchorElement[] = Array.from(
      resultsRef.current?.querySelectorAll<HTMLAnchorElement>('.search-result-item') ?? []
    )
    const current = items.findIndex((item) => item === document.activeElement)

    if (event.key === 'ArrowDown') {
      if (current < 0) {
        items[0]?.focus()
      } else if (current < items.length - 1) {
        items[current + 1]?.focus()
      }
      return
    }

    if (current > 0) {
      items[current - 1]?.focus()
    } else if (current === 0) {
      inputRef.current?.focus()
    }
  }

  if (!open) return null

  return (
    <div
      className="search-overlay fixed inset-0 z-50 flex items-start justify-center bg-black/50 pt-[12vh]"
      onClick={() => controller.close()}
    >
      <div
        role="dialog"
        aria-modal="true"
        aria-label={messages.placeholder}
        className="search-modal bg-background mx-4 flex max-h-[70vh] w-full max-w-xl flex-col overflow-hidden rounded-lg border shadow-xl"
        onClick={(event) => event.stopPropagation()}
        onKeyDown={handleArrowKeys}
      >
        <div className="search-header border-border flex shrink-0 items-center gap-2 border-b px-4 py-3">
          <Search className="text-muted-foreground h-5 w-5 shrink-0" />
          <input
            ref={inputRef}
            type="text"
            value={query ?? ''}
            onChange={(event) => setQuery(event.target.value)}
            placeholder={messages.placeholder}
            autoComplete="off"
            className="search-input min-w-0 flex-1 bg-transparent text-sm focus:outline-none"
          />
          <button
            type="button"
            onClick={() => controller.close()}
            aria-label={messages.closeLabel}
            className="search-close hover:bg-muted rounded p-1"
          >
            <kbd className="text-muted-foreground text-xs">Esc</kbd>
          </button>
        </div>

        <div ref={resultsRef} className="search-results min-h-0 flex-1 overflow-y-auto">
          {payload.kind === 'message' ? (
            <div className="search-empty text-muted-foreground p-8 text-center">
              <p>{payload.title}</p>
              <p className="search-hint mt-1 text-sm">{payload.hint}</p>
            </div>
          ) : (
            payload.entries.map((entry, position) => (
              <a
                key={`${position}:${entry.href}`}
                href={entry.href}
                className="search-result-item hover:bg-muted/50 focus:bg-muted/50 border-border block border-b px-4 py-3 last:border-0 focus:outline-none"
              >
                {entry.chapter && (
                  <span className="search-result-chapter text-muted-foreground block text-[11px] uppercase">
                    {entry.chapter}
                  </span>
                )}
                <span className="search-result-title block font-medium">
                  <HighlightedText segments={entry.title} />
                </span>
                <span className="search-result-keywords text-muted-foreground mt-1 block text-sm">
                  {entry.summary}
                </span>
              </a>
            ))
          )}
        </div>
      </div>
    </div>
  )
}
