import {
  resolveBasePath,
  resolveSearchConfig,
  type SearchConfigInput,
} from '@chapter-search/search'
import { createRoot, type Root } from 'react-dom/client'
import { SearchDialog } from './components/search-dialog'
import { getBookIndex, isBookId } from './lib/books'
import { SearchController } from './lib/search-controller'

export const ROOT_ELEMENT_ID = 'chapter-search-root'

export interface MountOptions {
  book: string
  container?: HTMLElement
  config?: SearchConfigInput
}

interface Mounted {
  controller: SearchController
  root: Root
  element: HTMLElement
}

let mounted: Mounted | null = null

/**
 * Renders the search overlay into the page once and returns its controller.
 * Later calls return the existing controller.
 */
export function mountChapterSearch(options: MountOptions): SearchController | null {
  if (mounted) return mounted.controller

  const { book } = options
  if (!isBookId(book)) {
    throw new Error(`Unknown book "${book}"`)
  }

  const host = options.container ?? document.body
  if (!host) {
    console.error('Chapter search: document has no body to mount into')
    return null
  }

  const config = resolveSearchConfig({
    basePath: resolveBasePath(window.location.pathname),
    ...options.config,
  })
  const index = getBookIndex(book)
  const controller = new SearchController()

  const element = document.createElement('div')
  element.id = ROOT_ELEMENT_ID
  host.appendChild(element)

  const root = createRoot(element)
  root.render(<SearchDialog controller={controller} index={index} config={config} />)

  mounted = { controller, root, element }
  window.__CHAPTER_SEARCH__ = controller
  return controller
}

export function unmountChapterSearch(): void {
  if (!mounted) return
  mounted.root.unmount()
  mounted.element.remove()
  mounted = null
  delete window.__CHAPTER_SEARCH__
}
