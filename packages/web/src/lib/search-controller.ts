export interface SearchControllerState {
  open: boolean
}

/**
 * Open/closed state of the search overlay, shared between the React tree
 * and host-page buttons that call `window.__CHAPTER_SEARCH__.open()`.
 */
export class SearchController {
  private listeners = new Set<() => void>()
  private state: SearchControllerState = { open: false }

  open(): void {
    this.setOpen(true)
  }

  close(): void {
    this.setOpen(false)
  }

  toggle(): void {
    this.setOpen(!this.state.open)
  }

  subscribe(listener: () => void): () => void {
    this.listeners.add(listener)
    return () => {
      this.listeners.delete(listener)
    }
  }

  getSnapshot(): SearchControllerState {
    return this.state
  }

  private setOpen(open: boolean): void {
    if (this.state.open === open) return
    this.state = { open }
    for (const listener of this.listeners) {
      listener()
    }
  }
}
