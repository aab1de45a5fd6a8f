export { SearchDialog } from './components/search-dialog'
export { HighlightedText } from './components/highlighted-text'
export { BOOK_IDS, getBookIndex, isBookId, type BookId } from './lib/books'
export { SearchController, type SearchControllerState } from './lib/search-controller'
export { useChapterSearch } from './lib/use-chapter-search'
export { mountChapterSearch, unmountChapterSearch, ROOT_ELEMENT_ID, type MountOptions } from './mount'
