import { SearchLocaleSchema, type SearchConfigInput } from '@chapter-search/search'
import './styles.css'
import { mountChapterSearch } from './mount'

export { mountChapterSearch, unmountChapterSearch } from './mount'

/**
 * `<script src="chapter-search.js" data-book="swiftui" data-locale="ru">`
 * mounts the overlay as soon as the page is ready.
 */
function main() {
  const script = document.currentScript
  if (!(script instanceof HTMLScriptElement)) return

  const book = script.dataset.book
  if (!book) return

  const locale = SearchLocaleSchema.safeParse(script.dataset.locale)
  const config: SearchConfigInput = locale.success ? { locale: locale.data } : {}
  const start = () => {
    mountChapterSearch({ book, config })
  }

  if (document.readyState === 'loading') {
    document.addEventListener('DOMContentLoaded', start)
  } else {
    start()
  }
}

main()
